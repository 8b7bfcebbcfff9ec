/**
 * @pdfimg/rasterizer
 *
 * Page rasterization for the conversion service.
 *
 * Exports:
 *   - RasterizerModule.forRoot()  — import once in AppModule
 *   - RasterizerService           — admission-gated rasterize() + engine probe
 *   - RasterEngine / RASTER_ENGINE — capability interface and its token
 *   - PdftoppmEngine              — poppler-backed implementation
 *   - RasterizationError family   — timeout / engine failure / engine missing
 */
export { RasterizerModule } from './rasterizer.module';
export { RasterizerService } from './rasterizer.service';
export { PdftoppmEngine } from './pdftoppm.engine';
export { buildPdftoppmArgs } from './pdftoppm.args';
export {
  RASTER_ENGINE,
  DEFAULT_TIMEOUT_MS,
  OUTPUT_PREFIX,
} from './rasterizer.constants';
export type {
  EngineProbe,
  RasterEngine,
  RasterizeRequest,
  RasterizeResult,
  RasterizerOptions,
} from './rasterizer.interfaces';
export {
  RasterizationError,
  RasterizationTimeoutError,
  RasterEngineFailureError,
  RasterEngineUnavailableError,
  InvalidRasterRequestError,
} from './rasterizer.errors';
export {
  RASTER_FORMATS,
  DEFAULT_FORMAT,
  DEFAULT_DPI,
  MIN_DPI,
  MAX_DPI,
  extensionFor,
  isRasterFormat,
  isValidDpi,
} from './raster-format';
export type { RasterFormat } from './raster-format';
