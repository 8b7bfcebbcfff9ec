import { Readable } from 'stream';

/** An uploaded document as the orchestrator receives it */
export interface UploadedDocument {
  /** Client-declared filename. Checked for a `.pdf` suffix, never used for paths */
  originalName: string;
  size: number;
  content: Readable;
}

export interface ConversionParams {
  format: string;
  dpi: number;
}
