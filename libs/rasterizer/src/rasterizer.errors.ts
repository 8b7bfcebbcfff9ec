/**
 * Domain errors raised by the rasterizer.
 *
 * These are transport-agnostic: the HTTP layer maps them onto
 * HttpException subclasses at the orchestration boundary.
 */
export abstract class RasterizationError extends Error {
  abstract readonly kind: 'timeout' | 'engine-failure' | 'engine-unavailable';

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class RasterizationTimeoutError extends RasterizationError {
  readonly kind = 'timeout';

  constructor(readonly timeoutMs: number) {
    super(`PDF conversion timed out after ${Math.round(timeoutMs / 1000)} seconds`);
  }
}

/**
 * The engine ran and reported failure. `diagnostic` is the engine's own
 * stderr text (e.g. "Syntax Error: Couldn't find trailer dictionary").
 */
export class RasterEngineFailureError extends RasterizationError {
  readonly kind = 'engine-failure';

  constructor(
    readonly diagnostic: string,
    readonly exitCode: number | null,
  ) {
    super(diagnostic);
  }
}

export class RasterEngineUnavailableError extends RasterizationError {
  readonly kind = 'engine-unavailable';

  constructor(readonly binary: string, cause?: unknown) {
    super(`${binary} not found. Install poppler-utils.`, { cause });
  }
}

/** Raised before the engine is spawned when the request itself is unusable */
export class InvalidRasterRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRasterRequestError';
  }
}
