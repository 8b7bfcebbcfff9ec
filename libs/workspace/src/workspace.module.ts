import { DynamicModule, Module, Provider } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { tmpdir } from 'os';
import { join } from 'path';
import { performance } from 'perf_hooks';
import {
  DEFAULT_ROOT_DIRNAME,
  WORKSPACE_CLOCK,
  WORKSPACE_OPTIONS,
} from './workspace.constants';
import { WorkspaceClock, WorkspaceOptions } from './workspace.interfaces';
import { JobRegistry } from './job-registry';
import { WorkspaceService } from './workspace.service';

export const systemClock: WorkspaceClock = {
  monotonic: () => performance.now(),
  now: () => Date.now(),
};

/**
 * WorkspaceModule — global provider of WorkspaceService.
 *
 * Usage:
 *   WorkspaceModule.forRoot()  — in AppModule
 *
 * WORKSPACE_ROOT selects the root directory (default: {tmpdir}/pdf2img).
 * Global because the job registry must be a single instance shared by the
 * conversion, download and cleanup modules.
 */
@Module({})
export class WorkspaceModule {
  static forRoot(): DynamicModule {
    const optionsProvider: Provider = {
      provide: WORKSPACE_OPTIONS,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): WorkspaceOptions => ({
        root: configService.get<string>(
          'WORKSPACE_ROOT',
          join(tmpdir(), DEFAULT_ROOT_DIRNAME),
        ),
      }),
    };

    const clockProvider: Provider = {
      provide: WORKSPACE_CLOCK,
      useValue: systemClock,
    };

    return {
      module: WorkspaceModule,
      imports: [ConfigModule],
      providers: [optionsProvider, clockProvider, JobRegistry, WorkspaceService],
      exports: [WorkspaceService],
      global: true,
    };
  }
}
