/**
 * Build Driver
 *
 * Incremental rebuild of the toolchain after a patch. A failed build is an
 * ordinary outcome for a candidate; only a timeout is thrown.
 */

import { BuildTimeout } from './errors.js';
import { Logger, silentLogger } from './logger.js';
import { CommandRunner, runCommand } from './process.js';
import { BuildResult } from './types.js';

export interface BuildDriverOptions {
  tool: string;
  buildDir: string;
  runner?: CommandRunner;
  logger?: Logger;
}

const ERROR_LINE_LIMIT = 10;

/**
 * Pick the first few compiler/linker error lines out of build output, or the
 * tail of the output when no error marker is present.
 */
export function summarizeBuildErrors(output: string, limit = ERROR_LINE_LIMIT): string {
  const lines = output
    .trim()
    .split('\n')
    .filter((line) => line.trim().length > 0);
  const errorLines = lines.filter((line) => line.toLowerCase().includes('error:'));
  const picked = errorLines.length > 0 ? errorLines.slice(0, limit) : lines.slice(-limit);
  return picked.join('\n');
}

export class BuildDriver {
  private tool: string;
  private buildDir: string;
  private runner: CommandRunner;
  private logger: Logger;

  constructor(options: BuildDriverOptions) {
    this.tool = options.tool;
    this.buildDir = options.buildDir;
    this.runner = options.runner ?? runCommand;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Build the given targets, throwing BuildTimeout if the tool overruns
   */
  async build(targets: readonly string[], timeoutMs: number): Promise<BuildResult> {
    const args = ['-C', this.buildDir, ...targets];
    this.logger.info('Building', { tool: this.tool, targets });

    const result = await this.runner(this.tool, args, { timeoutMs });
    const elapsedMs = Math.round(result.elapsedMs);

    if (result.timedOut) {
      this.logger.warn('Build timed out', { timeoutMs });
      throw new BuildTimeout(timeoutMs);
    }

    if (result.exitCode !== 0) {
      const errorSummary = summarizeBuildErrors(`${result.stdout}\n${result.stderr}`);
      this.logger.warn('Build failed', { exitCode: result.exitCode, elapsedMs });
      return { success: false, elapsedMs, errorSummary: errorSummary || `exit code ${result.exitCode}` };
    }

    this.logger.info('Build succeeded', { elapsedMs });
    return { success: true, elapsedMs, errorSummary: null };
  }
}
