import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Response } from 'express';
import { types } from 'util';

/** Error body every endpoint returns */
export interface ApiErrorBody {
  ok: false;
  error: string;
}

/**
 * Terminus answers a failed check with `{ status, info, error, details }`,
 * where `error` maps each failing indicator to its status object.
 */
function describeFailedChecks(failures: object): string {
  return Object.entries(failures)
    .map(([key, check]: [string, unknown]) => {
      const detail =
        typeof check === 'object' &&
        check !== null &&
        'detail' in check &&
        typeof check.detail === 'string'
          ? ` (${check.detail})`
          : '';
      return `${key} down${detail}`;
    })
    .join('; ');
}

/**
 * Extracts a single human-readable message from an HttpException body.
 * ValidationPipe reports `message` as an array of constraint messages.
 */
export function messageOf(exception: HttpException): string {
  const body = exception.getResponse();
  if (typeof body === 'string') return body;

  if ('message' in body) {
    const { message } = body;
    if (Array.isArray(message)) return message.map(String).join('; ');
    if (typeof message === 'string') return message;
  }

  if ('error' in body && typeof body.error === 'object' && body.error !== null) {
    const failed = describeFailedChecks(body.error);
    if (failed) return failed;
  }
  return exception.message;
}

/**
 * ApiExceptionFilter — renders every error as `{ ok: false, error }`.
 *
 *   HttpException → its status and message
 *   anything else → 500 "Internal server error" (logged with stack)
 */
@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(ApiExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const res = host.switchToHttp().getResponse<Response>();

    let status: number;
    let body: ApiErrorBody;
    if (exception instanceof HttpException) {
      status = exception.getStatus();
      body = { ok: false, error: messageOf(exception) };
    } else {
      const error =
        types.isNativeError(exception) ? exception : new Error(String(exception));
      this.logger.error(`Unhandled error: ${error.message}`, error.stack);
      status = HttpStatus.INTERNAL_SERVER_ERROR;
      body = { ok: false, error: 'Internal server error' };
    }

    // A stream failing mid-download has already sent its headers
    if (res.headersSent) {
      res.end();
      return;
    }

    res.status(status).json(body);
  }
}
