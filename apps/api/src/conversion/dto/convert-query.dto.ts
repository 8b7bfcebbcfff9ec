import { Type } from 'class-transformer';
import { IsIn, IsInt, IsOptional, Max, Min } from 'class-validator';
import {
  DEFAULT_DPI,
  DEFAULT_FORMAT,
  MAX_DPI,
  MIN_DPI,
  RASTER_FORMATS,
  RasterFormat,
} from '@pdfimg/rasterizer';

/**
 * Query string of POST /pdf-to-images.
 *
 *   ?fmt=png|jpeg   (default png)
 *   &dpi=72..600    (default 300)
 */
export class ConvertQueryDto {
  @IsOptional()
  @IsIn(RASTER_FORMATS)
  fmt: RasterFormat = DEFAULT_FORMAT;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(MIN_DPI)
  @Max(MAX_DPI)
  dpi: number = DEFAULT_DPI;
}
