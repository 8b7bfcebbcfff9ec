import { Module } from '@nestjs/common';
import { DownloadsController } from './downloads.controller';
import { RetrievalService } from './retrieval.service';

@Module({
  controllers: [DownloadsController],
  providers: [RetrievalService],
  exports: [RetrievalService],
})
export class DownloadsModule {}
