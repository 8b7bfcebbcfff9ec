import { join } from 'path';
import { OUTPUT_PREFIX } from './rasterizer.constants';
import { RasterizeRequest } from './rasterizer.interfaces';

/**
 * Translates a rasterize request into pdftoppm's argument vector.
 *
 *   pdftoppm -png -r 300 /jobs/<id>/source.pdf /jobs/<id>/page
 *   pdftoppm -jpeg -jpegopt quality=95 -r 150 /jobs/<id>/source.pdf /jobs/<id>/page
 *
 * pdftoppm writes `page-<n>.png` / `page-<n>.jpg`, zero-padding `<n>` to
 * the width of the document's page count.
 */
export function buildPdftoppmArgs(
  request: RasterizeRequest,
  jpegQuality: number,
): string[] {
  const formatArgs =
    request.format === 'png'
      ? ['-png']
      : ['-jpeg', '-jpegopt', `quality=${jpegQuality}`];

  return [
    ...formatArgs,
    '-r',
    String(request.dpi),
    request.documentPath,
    join(request.outputDir, OUTPUT_PREFIX),
  ];
}
