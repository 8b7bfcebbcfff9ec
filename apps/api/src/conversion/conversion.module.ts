import { Logger, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { MulterModule, MulterModuleOptions } from '@nestjs/platform-express';
import { memoryStorage } from 'multer';
import { ConversionController } from './conversion.controller';
import { ConversionService } from './conversion.service';
import { BYTES_PER_MB, maxUploadBytes } from './upload-limits';

/**
 * ConversionModule — upload → rasterize → manifest.
 *
 * Multer keeps the upload in memory and stops reading it once it passes
 * UPLOAD_MAX_FILE_SIZE_MB; ConversionService streams the buffer into the
 * job workspace. WorkspaceService and RasterizerService come from the global
 * WorkspaceModule and RasterizerModule registered in AppModule.
 */
@Module({
  imports: [
    ConfigModule,
    MulterModule.registerAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService): MulterModuleOptions => {
        const fileSize = maxUploadBytes(configService);
        new Logger(ConversionModule.name).log(
          `Upload limit ${fileSize / BYTES_PER_MB} MB`,
        );
        return {
          storage: memoryStorage(),
          limits: { fileSize, files: 1 },
        };
      },
    }),
  ],
  controllers: [ConversionController],
  providers: [ConversionService],
})
export class ConversionModule {}
