export enum SetupErrorCode {
  VALIDATION_FAILED = "VALIDATION_FAILED",
  PREREQUISITE_FAILED = "PREREQUISITE_FAILED",
  INSTALL_FAILED = "INSTALL_FAILED",
  CONFIG_ROLLED_BACK = "CONFIG_ROLLED_BACK",
  INTERRUPTED = "INTERRUPTED",
}

export class SetupError extends Error {
  readonly code: SetupErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: SetupErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "SetupError";
    this.code = code;
    this.context = context;
  }
}

/** Bad operator input. Caught at the prompt that produced it, which asks again. */
export class ValidationError extends SetupError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(SetupErrorCode.VALIDATION_FAILED, message, context);
    this.name = "ValidationError";
  }
}

/** Missing sudo, network or package manager. Terminates the run. */
export class PrerequisiteError extends SetupError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(SetupErrorCode.PREREQUISITE_FAILED, message, context);
    this.name = "PrerequisiteError";
  }
}

/** A single component failed; the orchestrator records it and moves on. */
export class InstallFailure extends SetupError {
  readonly component: string;
  readonly remediation: string[];

  constructor(component: string, message: string, options?: { remediation?: string[]; context?: Record<string, unknown> }) {
    super(SetupErrorCode.INSTALL_FAILED, message, options?.context);
    this.name = "InstallFailure";
    this.component = component;
    this.remediation = options?.remediation ?? [];
  }
}

/** A written configuration file failed validation and was removed again. */
export class ConfigurationRollback extends SetupError {
  readonly path: string;

  constructor(path: string, message: string, context?: Record<string, unknown>) {
    super(SetupErrorCode.CONFIG_ROLLED_BACK, message, { path, ...context });
    this.name = "ConfigurationRollback";
    this.path = path;
  }
}

export class InterruptedError extends SetupError {
  readonly signal: NodeJS.Signals | null;

  constructor(message: string, signal: NodeJS.Signals | null = null) {
    super(SetupErrorCode.INTERRUPTED, message, signal ? { signal } : undefined);
    this.name = "InterruptedError";
    this.signal = signal;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
