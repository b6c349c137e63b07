import 'reflect-metadata';
import { plainToInstance } from 'class-transformer';
import { IsIn, IsInt, IsOptional, IsString, Max, Min, validateSync } from 'class-validator';

export const NODE_ENVIRONMENTS = ['development', 'production', 'test'] as const;

export type NodeEnvironment = (typeof NODE_ENVIRONMENTS)[number];

export class EnvironmentVariables {
  @IsIn(NODE_ENVIRONMENTS)
  NODE_ENV: NodeEnvironment = 'development';

  @IsInt()
  @Min(0)
  @Max(65535)
  PORT: number = 3000;

  @IsString()
  CORS_ORIGIN: string = 'http://localhost:8501';

  @IsInt()
  @Min(1)
  UPLOAD_MAX_BYTES: number = 15 * 1024 * 1024;

  // Google Cloud settings, read but not yet used by any request path.
  @IsOptional()
  @IsString()
  PROJECT_ID?: string;

  @IsString()
  LOCATION: string = 'us-central1';

  @IsOptional()
  @IsString()
  PROCESSOR_ID?: string;

  @IsString()
  MODEL_ID: string = 'gemini-1.5-pro';

  @IsOptional()
  @IsString()
  GOOGLE_APPLICATION_CREDENTIALS?: string;

  @IsString()
  RAW_BUCKET: string = 'legal-ai-docs';
}

export function validateEnv(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const problems = errors
      .flatMap((e) => Object.values(e.constraints ?? {}))
      .join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }
  return validated;
}
