import { IsNotEmpty, IsString } from 'class-validator';

export class AnalyzeRequestDto {
  @IsString()
  @IsNotEmpty()
  file_id!: string;
}
