import { Readable } from 'stream';

export interface DownloadableFile {
  filename: string;
  contentType: string;
  /** Size in bytes at the moment the file was opened */
  size: number;
  stream: Readable;
}
