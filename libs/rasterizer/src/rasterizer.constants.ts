/**
 * Injection tokens for the rasterizer library.
 *
 * RASTER_ENGINE is bound to PdftoppmEngine by RasterizerModule.forRoot().
 * Tests override it with an in-process fake that writes page files.
 */
export const RASTER_ENGINE = 'RASTER_ENGINE';
export const RASTERIZER_OPTIONS = 'RASTERIZER_OPTIONS';

/** Wall-clock ceiling for a single engine run (5 minutes) */
export const DEFAULT_TIMEOUT_MS = 5 * 60 * 1000;

/** Timeout for the `pdftoppm -v` availability probe */
export const PROBE_TIMEOUT_MS = 5_000;

export const DEFAULT_MAX_CONCURRENCY = 4;

/** High quality keeps small glyphs legible for OCR */
export const DEFAULT_JPEG_QUALITY = 95;

/** pdftoppm appends `-<n>.<ext>` to this prefix */
export const OUTPUT_PREFIX = 'page';
