import { ConfigService } from '@nestjs/config';

export const BYTES_PER_MB = 1024 * 1024;

export const DEFAULT_MAX_UPLOAD_MB = 100;

/** UPLOAD_MAX_FILE_SIZE_MB, in bytes */
export function maxUploadBytes(configService: ConfigService): number {
  const maxMb = Number(
    configService.get<number>('UPLOAD_MAX_FILE_SIZE_MB', DEFAULT_MAX_UPLOAD_MB),
  );
  return maxMb * BYTES_PER_MB;
}
