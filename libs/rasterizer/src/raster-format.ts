/** Output formats the engine is allowed to produce. */
export const RASTER_FORMATS = ['png', 'jpeg'] as const;

export type RasterFormat = (typeof RASTER_FORMATS)[number];

export const DEFAULT_FORMAT: RasterFormat = 'png';

/** Accepted resolution range, inclusive on both ends. */
export const MIN_DPI = 72;
export const MAX_DPI = 600;
export const DEFAULT_DPI = 300;

export function isRasterFormat(value: unknown): value is RasterFormat {
  return (
    typeof value === 'string' &&
    (RASTER_FORMATS as readonly string[]).includes(value)
  );
}

export function isValidDpi(value: unknown): value is number {
  return (
    typeof value === 'number' &&
    Number.isInteger(value) &&
    value >= MIN_DPI &&
    value <= MAX_DPI
  );
}

/**
 * File extension pdftoppm writes for a format.
 * JPEG output is written as `.jpg`.
 */
export function extensionFor(format: RasterFormat): 'png' | 'jpg' {
  return format === 'png' ? 'png' : 'jpg';
}
