import { INestApplication, LoggerService, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import helmet from 'helmet';
import morgan from 'morgan';
import { EnvironmentVariables } from './config/env.validation';
import { HttpExceptionFilter } from './shared/filters/http-exception.filter';

/** Global middleware, pipes and filters shared by the server and the e2e tests. */
export function configureApp(app: INestApplication, logger: LoggerService) {
  const config = app.get<ConfigService<EnvironmentVariables, true>>(ConfigService);

  app.enableCors({
    origin: config.get('CORS_ORIGIN', { infer: true }),
    credentials: true,
  });

  app.use(helmet());
  if (config.get('NODE_ENV', { infer: true }) !== 'test') {
    app.use(morgan('combined'));
  }

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      transformOptions: { enableImplicitConversion: true },
      forbidUnknownValues: false,
    }),
  );
  app.useGlobalFilters(new HttpExceptionFilter(logger));

  return app;
}
