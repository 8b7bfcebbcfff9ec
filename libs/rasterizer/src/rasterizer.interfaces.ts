import { RasterFormat } from './raster-format';

export interface RasterizeRequest {
  /** Absolute path of the source document */
  documentPath: string;
  /** Directory the engine writes page files into */
  outputDir: string;
  format: RasterFormat;
  dpi: number;
}

export interface RasterizeResult {
  durationMs: number;
}

export interface EngineProbe {
  available: boolean;
  version?: string;
  detail?: string;
}

/**
 * RasterEngine — the page rasterization capability.
 *
 * An implementation renders every page of `documentPath` into `outputDir`
 * as `page-<n>.<ext>` files and resolves once the files are on disk.
 * Implementations throw a RasterizationError subclass on failure.
 */
export interface RasterEngine {
  rasterize(request: RasterizeRequest): Promise<RasterizeResult>;
  probe(): Promise<EngineProbe>;
}

export interface RasterizerOptions {
  /** Engine executable, resolved through PATH when not absolute */
  binary: string;
  timeoutMs: number;
  maxConcurrency: number;
  jpegQuality: number;
}
