import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { ErrorKind } from '../enums/error-kind.enum';
import { isRecord } from '../utils/error.utils';

export interface ApiErrorBody {
  error: ErrorKind;
  message: string;
}

const KIND_BY_STATUS: Partial<Record<number, ErrorKind>> = {
  [HttpStatus.BAD_REQUEST]: ErrorKind.VALIDATION_ERROR,
  [HttpStatus.UNAUTHORIZED]: ErrorKind.UNAUTHORIZED,
  [HttpStatus.FORBIDDEN]: ErrorKind.PERMISSION_DENIED,
  [HttpStatus.NOT_FOUND]: ErrorKind.NOT_FOUND,
  [HttpStatus.CONFLICT]: ErrorKind.CONFLICT,
};

const INTERNAL_MESSAGE = 'Internal server error';

export function toApiError(exception: unknown): {
  status: number;
  body: ApiErrorBody;
} {
  if (!(exception instanceof HttpException)) {
    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      body: { error: ErrorKind.INTERNAL, message: INTERNAL_MESSAGE },
    };
  }

  const status = exception.getStatus();
  const kind =
    KIND_BY_STATUS[status] ??
    (status >= 500 ? ErrorKind.INTERNAL : ErrorKind.VALIDATION_ERROR);

  return { status, body: { error: kind, message: readMessage(exception) } };
}

// Nest wraps messages as { message: string | string[] } in getResponse().
function readMessage(exception: HttpException): string {
  const response = exception.getResponse();

  if (typeof response === 'string') {
    return response;
  }

  if (isRecord(response)) {
    const message = response.message;

    if (typeof message === 'string') {
      return message;
    }

    if (Array.isArray(message)) {
      return message.filter((m) => typeof m === 'string').join('; ');
    }
  }

  return exception.message;
}

@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(ApiExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const res = host.switchToHttp().getResponse<Response>();
    const { status, body } = toApiError(exception);

    if (status >= 500) {
      const err =
        exception instanceof Error ? exception : new Error(String(exception));
      this.logger.error(`Unhandled error: ${err.message}`, err.stack);
    }

    res.status(status).json(body);
  }
}
