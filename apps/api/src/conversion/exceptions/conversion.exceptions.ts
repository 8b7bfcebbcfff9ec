import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Thrown when `fmt`, `dpi` or the declared filename is unacceptable.
 * Raised before any workspace is created. Maps to HTTP 400 Bad Request.
 */
export class InvalidParameterException extends HttpException {
  constructor(message: string) {
    super(
      {
        statusCode: HttpStatus.BAD_REQUEST,
        error: 'Bad Request',
        message,
      },
      HttpStatus.BAD_REQUEST,
    );
  }
}

/**
 * Thrown when no document is attached to the upload request.
 * Maps to HTTP 400 Bad Request.
 */
export class MissingFileException extends HttpException {
  constructor() {
    super(
      {
        statusCode: HttpStatus.BAD_REQUEST,
        error: 'Bad Request',
        message: 'A PDF must be attached to the "pdf" multipart field',
      },
      HttpStatus.BAD_REQUEST,
    );
  }
}

/**
 * Thrown when the uploaded document exceeds the configured size limit.
 * Maps to HTTP 413 Content Too Large.
 */
export class FileTooLargeException extends HttpException {
  constructor(maxSizeMb: number) {
    super(
      {
        statusCode: HttpStatus.PAYLOAD_TOO_LARGE,
        error: 'Payload Too Large',
        message: `File exceeds the maximum allowed size of ${maxSizeMb} MB`,
      },
      HttpStatus.PAYLOAD_TOO_LARGE,
    );
  }
}

/**
 * Thrown when the engine rejects the document (corrupt, not a PDF,
 * password-protected). The message is the engine's own diagnostic.
 * Maps to HTTP 422 Unprocessable Entity.
 */
export class DocumentRasterizationException extends HttpException {
  constructor(diagnostic: string, cause: Error) {
    super(
      {
        statusCode: HttpStatus.UNPROCESSABLE_ENTITY,
        error: 'Unprocessable Entity',
        message: diagnostic,
      },
      HttpStatus.UNPROCESSABLE_ENTITY,
      { cause },
    );
  }
}

/**
 * Thrown when the engine finished without writing a single page.
 * Maps to HTTP 422 Unprocessable Entity.
 */
export class NoPagesProducedException extends HttpException {
  constructor() {
    super(
      {
        statusCode: HttpStatus.UNPROCESSABLE_ENTITY,
        error: 'Unprocessable Entity',
        message: 'No images generated from PDF',
      },
      HttpStatus.UNPROCESSABLE_ENTITY,
    );
  }
}

/**
 * Thrown when the engine was killed for exceeding the wall-clock limit.
 * The caller may retry. Maps to HTTP 504 Gateway Timeout.
 */
export class ConversionTimeoutException extends HttpException {
  constructor(timeoutMs: number, cause: Error) {
    super(
      {
        statusCode: HttpStatus.GATEWAY_TIMEOUT,
        error: 'Gateway Timeout',
        message: `PDF conversion timed out (${Math.round(timeoutMs / 1000)} seconds)`,
      },
      HttpStatus.GATEWAY_TIMEOUT,
      { cause },
    );
  }
}

/**
 * Thrown when the engine binary cannot be found on this host.
 * Maps to HTTP 503 Service Unavailable.
 */
export class EngineUnavailableException extends HttpException {
  constructor(cause: Error) {
    super(
      {
        statusCode: HttpStatus.SERVICE_UNAVAILABLE,
        error: 'Service Unavailable',
        message: cause.message,
      },
      HttpStatus.SERVICE_UNAVAILABLE,
      { cause },
    );
  }
}

/**
 * Thrown when the workspace cannot be written or read (disk full,
 * permissions). Wraps the filesystem error without leaking paths.
 * Maps to HTTP 500 Internal Server Error.
 */
export class WorkspaceIoException extends HttpException {
  constructor(cause: Error) {
    super(
      {
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        error: 'Internal Server Error',
        message: 'Conversion failed while storing its output. Please try again.',
      },
      HttpStatus.INTERNAL_SERVER_ERROR,
      { cause },
    );
  }
}
