import { RasterFormat } from '@pdfimg/rasterizer';

/**
 * Manifest — result of a successful conversion.
 *
 * Invariants:
 *   - count === files.length
 *   - files[i] === `page-${i + 1}.<ext>`
 *   - files is exactly the content of the job directory at return time
 */
export interface Manifest {
  jobId: string;
  format: RasterFormat;
  dpi: number;
  count: number;
  files: string[];
  /** Prefix clients append a filename to, e.g. `/download/<jobId>/` */
  downloadBase: string;
}
