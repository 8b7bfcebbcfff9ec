import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Thrown when DELETE /cleanup/:jobId names a job with no workspace
 * (never existed, already cleaned up, purged, or a malformed id).
 * Maps to HTTP 404 Not Found.
 */
export class JobNotFoundException extends HttpException {
  constructor(jobId: string) {
    super(
      {
        statusCode: HttpStatus.NOT_FOUND,
        error: 'Not Found',
        message: `Job ${jobId} not found`,
      },
      HttpStatus.NOT_FOUND,
    );
  }
}
