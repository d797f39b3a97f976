/**
 * Harness error taxonomy
 *
 * Fatal errors abort the current iteration (after cleanup). Benchmark and
 * tuner-trial failures never appear here: they are recorded as data on the
 * measurement or trial.
 */

export type HarnessErrorCode =
  | 'PATCH_FAILURE'
  | 'BUILD_FAILURE'
  | 'BUILD_TIMEOUT'
  | 'BRIDGE_TIMEOUT'
  | 'MALFORMED_RESPONSE'
  | 'BRIDGE_CANCELLED'
  | 'REQUEST_EXISTS'
  | 'RESTORE_FAILURE'
  | 'PIPELINE_BUSY'
  | 'CONFIG_ERROR';

export class HarnessError extends Error {
  readonly code: HarnessErrorCode;
  readonly fatal: boolean;

  constructor(code: HarnessErrorCode, message: string, fatal: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.fatal = fatal;
  }
}

export class PatchFailure extends HarnessError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PATCH_FAILURE', message, true, options);
  }
}

export class BuildFailure extends HarnessError {
  readonly errorSummary: string;

  constructor(errorSummary: string) {
    super('BUILD_FAILURE', `Build failed: ${errorSummary}`, false);
    this.errorSummary = errorSummary;
  }
}

export class BuildTimeout extends HarnessError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super('BUILD_TIMEOUT', `Build timed out (${timeoutMs}ms)`, false);
    this.timeoutMs = timeoutMs;
  }
}

export class BridgeTimeout extends HarnessError {
  readonly requestId: number;

  constructor(requestId: number, timeoutMs: number) {
    super('BRIDGE_TIMEOUT', `No response for request ${requestId} within ${timeoutMs}ms`, true);
    this.requestId = requestId;
  }
}

export class MalformedResponse extends HarnessError {
  readonly requestId: number;

  constructor(requestId: number, reason: string) {
    super('MALFORMED_RESPONSE', `Response for request ${requestId} is malformed: ${reason}`, true);
    this.requestId = requestId;
  }
}

export class BridgeCancelled extends HarnessError {
  constructor(requestId: number) {
    super('BRIDGE_CANCELLED', `Waiting for request ${requestId} was cancelled`, true);
  }
}

export class RequestExists extends HarnessError {
  constructor(requestPath: string) {
    super('REQUEST_EXISTS', `Request already exists: ${requestPath}`, true);
  }
}

/**
 * The source tree may be left patched. Everything after this is suspect.
 */
export class RestoreFailure extends HarnessError {
  readonly targetPath: string;

  constructor(targetPath: string, options?: { cause?: unknown }) {
    super('RESTORE_FAILURE', `Failed to restore ${targetPath}; source tree is inconsistent`, true, options);
    this.targetPath = targetPath;
  }
}

export class PipelineBusy extends HarnessError {
  constructor() {
    super('PIPELINE_BUSY', 'An evaluation is already in flight', true);
  }
}

export class ConfigError extends HarnessError {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super('CONFIG_ERROR', `Invalid ${source}:\n  ${issues.join('\n  ')}`, true);
    this.issues = issues;
  }
}

export function isHarnessError(value: unknown, code?: HarnessErrorCode): value is HarnessError {
  return value instanceof HarnessError && (code === undefined || value.code === code);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
