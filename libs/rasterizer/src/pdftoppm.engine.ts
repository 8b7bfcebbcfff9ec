import { Inject, Injectable, Logger } from '@nestjs/common';
import execa, { ExecaError } from 'execa';
import { types } from 'util';
import { buildPdftoppmArgs } from './pdftoppm.args';
import { PROBE_TIMEOUT_MS, RASTERIZER_OPTIONS } from './rasterizer.constants';
import {
  EngineProbe,
  RasterEngine,
  RasterizeRequest,
  RasterizeResult,
  RasterizerOptions,
} from './rasterizer.interfaces';
import {
  RasterEngineFailureError,
  RasterEngineUnavailableError,
  RasterizationTimeoutError,
} from './rasterizer.errors';

const UNKNOWN_FAILURE = 'pdftoppm failed with unknown error';

// Spawn errors come from Node's own realm, so neither guard uses instanceof.
function isExecaError(error: unknown): error is ExecaError {
  return (
    typeof error === 'object' &&
    error !== null &&
    'timedOut' in error &&
    'exitCode' in error
  );
}

function isMissingBinary(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

/**
 * PdftoppmEngine — RasterEngine backed by poppler's `pdftoppm`.
 *
 * One child process per call. The process reads the document and writes the
 * page images straight into the output directory; only stderr is buffered.
 * The wall-clock timeout is enforced by execa, which SIGKILLs the process.
 */
@Injectable()
export class PdftoppmEngine implements RasterEngine {
  private readonly logger = new Logger(PdftoppmEngine.name);

  constructor(
    @Inject(RASTERIZER_OPTIONS)
    private readonly options: RasterizerOptions,
  ) {}

  async rasterize(request: RasterizeRequest): Promise<RasterizeResult> {
    const args = buildPdftoppmArgs(request, this.options.jpegQuality);
    const startedAt = Date.now();

    this.logger.debug(`Spawning ${this.options.binary} ${args.join(' ')}`);

    try {
      await execa(this.options.binary, args, {
        timeout: this.options.timeoutMs,
        killSignal: 'SIGKILL',
        stdin: 'ignore',
        stdout: 'ignore',
      });
    } catch (error) {
      throw this.classify(error);
    }

    return { durationMs: Date.now() - startedAt };
  }

  /**
   * Runs `pdftoppm -v`. poppler prints its version banner to stderr and
   * exits 0; anything else counts as unavailable.
   */
  async probe(): Promise<EngineProbe> {
    try {
      const result = await execa(this.options.binary, ['-v'], {
        timeout: PROBE_TIMEOUT_MS,
        reject: false,
        stdin: 'ignore',
      });

      if (result.failed || result.exitCode !== 0) {
        return {
          available: false,
          detail: result.stderr.trim() || `exit code ${result.exitCode}`,
        };
      }

      const banner = `${result.stderr}\n${result.stdout}`;
      const version = /version\s+([\w.-]+)/i.exec(banner)?.[1];
      return { available: true, version };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { available: false, detail: message };
    }
  }

  // ── Helpers ────────────────────────────────────────────────

  private classify(error: unknown): Error {
    if (isMissingBinary(error)) {
      return new RasterEngineUnavailableError(this.options.binary, error);
    }

    if (isExecaError(error)) {
      if (error.timedOut) {
        this.logger.warn(
          `${this.options.binary} killed after ${this.options.timeoutMs} ms`,
        );
        return new RasterizationTimeoutError(this.options.timeoutMs);
      }

      const diagnostic = error.stderr?.trim() || UNKNOWN_FAILURE;
      const exitCode =
        typeof error.exitCode === 'number' ? error.exitCode : null;
      return new RasterEngineFailureError(diagnostic, exitCode);
    }

    return types.isNativeError(error) ? error : new Error(String(error));
  }
}
