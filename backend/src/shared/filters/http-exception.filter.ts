import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  LoggerService,
} from '@nestjs/common';
import { Request, Response } from 'express';

type HttpErrorBody = {
  message?: string | string[];
  error?: string;
};

export type ErrorResponse = {
  error: {
    code: string;
    message: string;
    details?: string[];
  };
};

function isHttpErrorBody(value: unknown): value is HttpErrorBody {
  return typeof value === 'object' && value !== null;
}

export function toErrorResponse(exception: unknown): { status: number; body: ErrorResponse } {
  const status =
    exception instanceof HttpException ? exception.getStatus() : HttpStatus.INTERNAL_SERVER_ERROR;
  const errorResponse =
    exception instanceof HttpException ? exception.getResponse() : 'Internal server error';

  let code = HttpStatus[status] || 'ERROR';
  let message = 'Unexpected error';
  let details: string[] | undefined;

  if (typeof errorResponse === 'string') {
    message = errorResponse;
  } else if (isHttpErrorBody(errorResponse)) {
    if (errorResponse.error) code = errorResponse.error;
    if (Array.isArray(errorResponse.message)) {
      // class-validator reports one message per failed constraint
      message = 'Validation failed';
      details = errorResponse.message;
    } else if (errorResponse.message) {
      message = errorResponse.message;
    }
  }

  return {
    status,
    body: { error: { code, message, ...(details ? { details } : {}) } },
  };
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  constructor(private readonly logger: LoggerService) {}

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const { status, body } = toErrorResponse(exception);
    const line = `Request failed: ${request.method} ${request.url} -> ${status} ${body.error.message}`;

    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(line, exception instanceof Error ? exception.stack : undefined);
    } else {
      this.logger.warn(line);
    }

    response.status(status).json(body);
  }
}
