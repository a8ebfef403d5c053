import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { ZodError } from 'zod';
import { RetrievalError, type RetrievalErrorCode } from './retrieval.errors.js';

const STATUS_BY_CODE: Record<RetrievalErrorCode, HttpStatus> = {
  INVALID_ARGUMENT: HttpStatus.BAD_REQUEST,
  NOT_FOUND: HttpStatus.NOT_FOUND,
  EMPTY_INPUT: HttpStatus.BAD_REQUEST,
};

export interface ErrorResponseBody {
  statusCode: number;
  code: RetrievalErrorCode | 'BAD_REQUEST';
  message: string;
}

export const toErrorResponse = (
  error: RetrievalError | ZodError,
): ErrorResponseBody => {
  if (error instanceof ZodError) {
    const message = error.errors
      .map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`)
      .join('; ');
    return {
      statusCode: HttpStatus.BAD_REQUEST,
      code: 'BAD_REQUEST',
      message,
    };
  }

  return {
    statusCode: STATUS_BY_CODE[error.code],
    code: error.code,
    message: error.message,
  };
};

@Catch(RetrievalError, ZodError)
export class RetrievalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(RetrievalExceptionFilter.name);

  catch(error: RetrievalError | ZodError, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const body = toErrorResponse(error);

    if (process.env.NODE_ENV === 'development') {
      this.logger.debug(`Request rejected [${body.code}]: ${body.message}`);
    }

    response.status(body.statusCode).json(body);
  }
}
