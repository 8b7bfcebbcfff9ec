import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Thrown for every failed download lookup: unknown job, missing file,
 * malformed job id, or a rejected filename. The body is identical in all
 * cases so a traversal probe learns nothing about the filesystem.
 * Maps to HTTP 404 Not Found.
 */
export class FileNotFoundException extends HttpException {
  constructor() {
    super(
      {
        statusCode: HttpStatus.NOT_FOUND,
        error: 'Not Found',
        message: 'File not found',
      },
      HttpStatus.NOT_FOUND,
    );
  }
}
