import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Response } from 'express';
import {
  DuplicateValueError,
  InvalidEntityError,
  NotFoundError,
} from '../errors/catalog.errors';

export interface ErrorResponseBody {
  statusCode: number;
  detail: string;
}

const INTERNAL_ERROR_DETAIL = 'Internal server error';

/**
 * Single translation point from thrown errors to `{ statusCode, detail }`.
 * Domain errors get their status here; Nest's HttpExceptions keep theirs.
 */
@Catch()
export class CatalogExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(CatalogExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const body = this.toResponseBody(exception);

    if (body.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      const stack = exception instanceof Error ? exception.stack : undefined;
      this.logger.error(`Unhandled error: ${describe(exception)}`, stack);
    } else {
      this.logger.warn(`Request failed with ${body.statusCode}: ${body.detail}`);
    }

    response.status(body.statusCode).json(body);
  }

  toResponseBody(exception: unknown): ErrorResponseBody {
    if (exception instanceof NotFoundError) {
      return { statusCode: HttpStatus.NOT_FOUND, detail: exception.message };
    }
    if (exception instanceof InvalidEntityError) {
      return { statusCode: HttpStatus.UNPROCESSABLE_ENTITY, detail: exception.message };
    }
    if (exception instanceof DuplicateValueError) {
      return { statusCode: HttpStatus.CONFLICT, detail: exception.message };
    }
    if (exception instanceof HttpException) {
      const statusCode = exception.getStatus();
      if (statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
        return { statusCode, detail: INTERNAL_ERROR_DETAIL };
      }
      return { statusCode, detail: extractHttpDetail(exception) };
    }
    return { statusCode: HttpStatus.INTERNAL_SERVER_ERROR, detail: INTERNAL_ERROR_DETAIL };
  }
}

function extractHttpDetail(exception: HttpException): string {
  const response = exception.getResponse();
  if (typeof response === 'string') {
    return response;
  }
  if (typeof response === 'object' && response !== null && 'message' in response) {
    const message = response.message;
    if (Array.isArray(message)) {
      return message.map(String).join('; ');
    }
    if (typeof message === 'string') {
      return message;
    }
  }
  return exception.message;
}

function describe(exception: unknown): string {
  return exception instanceof Error ? exception.message : String(exception);
}
