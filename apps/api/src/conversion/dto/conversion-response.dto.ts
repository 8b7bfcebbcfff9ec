import { RasterFormat } from '@pdfimg/rasterizer';
import { Manifest } from '../interfaces/manifest.interface';

/**
 * Response body for POST /pdf-to-images (HTTP 200).
 *
 * Field names are snake_case to match the public wire contract.
 */
export class ConversionResponseDto {
  ok!: true;

  /** UUID of the job, the first path segment of every download URL */
  job_id!: string;

  format!: RasterFormat;

  dpi!: number;

  /** Number of pages rendered; always equals files.length */
  count!: number;

  /** Page images in page order: page-1.png, page-2.png, ... */
  files!: string[];

  /** e.g. "/download/3f0c.../" */
  download_base!: string;

  static fromManifest(manifest: Manifest): ConversionResponseDto {
    return {
      ok: true,
      job_id: manifest.jobId,
      format: manifest.format,
      dpi: manifest.dpi,
      count: manifest.count,
      files: manifest.files,
      download_base: manifest.downloadBase,
    };
  }
}
