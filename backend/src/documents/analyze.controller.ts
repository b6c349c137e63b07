import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { AnalyzeRequestDto } from './dto/analyze-request.dto';
import { DocumentsService } from './documents.service';

@Controller('analyze')
export class AnalyzeController {
  constructor(private readonly documents: DocumentsService) {}

  // Stub payload for any stored document; unknown ids are 404.
  @Post()
  @HttpCode(HttpStatus.OK)
  analyze(@Body() body: AnalyzeRequestDto) {
    return this.documents.analyze(body.file_id);
  }
}
