import { Controller, Delete, Param } from '@nestjs/common';
import { CleanupService } from './cleanup.service';

/**
 * Routes:
 *   DELETE /cleanup/:jobId  — remove a job's images before retention does
 */
@Controller('cleanup')
export class CleanupController {
  constructor(private readonly cleanupService: CleanupService) {}

  @Delete(':jobId')
  async cleanup(
    @Param('jobId') jobId: string,
  ): Promise<{ ok: true; message: string }> {
    const ack = await this.cleanupService.cleanup(jobId);
    return { ok: true, message: ack.message };
  }
}
