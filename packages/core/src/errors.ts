/**
 * Base error class for all idslab errors.
 *
 * `fatal` errors abort the whole run before any trial starts; everything else
 * is scoped to a single iteration and is reported through its outcome.
 */
export class IdsLabError extends Error {
  public readonly code: string;
  public readonly fatal: boolean;

  constructor(message: string, code: string, fatal: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'IdsLabError';
    this.code = code;
    this.fatal = fatal;
  }
}

/**
 * The orchestrator was not started with elevated privilege.
 */
export class PrivilegeError extends IdsLabError {
  constructor(message: string, code: string = 'PRIVILEGE_REQUIRED', options?: { cause?: unknown }) {
    super(message, code, true, options);
    this.name = 'PrivilegeError';
  }
}

/**
 * The configuration document failed validation.
 */
export class ConfigError extends IdsLabError {
  constructor(message: string, code: string = 'CONFIG_INVALID', options?: { cause?: unknown }) {
    super(message, code, true, options);
    this.name = 'ConfigError';
  }
}

/**
 * A readiness probe gave up before its predicate held.
 */
export class ReadinessTimeoutError extends IdsLabError {
  public readonly probe: string;
  public readonly elapsedMs: number;

  constructor(probe: string, elapsedMs: number, options?: { cause?: unknown }) {
    super(`${probe} not ready after ${elapsedMs}ms`, 'READINESS_TIMEOUT', false, options);
    this.name = 'ReadinessTimeoutError';
    this.probe = probe;
    this.elapsedMs = elapsedMs;
  }
}

/**
 * A supervised process could not be started or died right after starting.
 */
export class ProcessStartError extends IdsLabError {
  constructor(message: string, code: string = 'PROCESS_START_FAILED', options?: { cause?: unknown }) {
    super(message, code, false, options);
    this.name = 'ProcessStartError';
  }
}

/**
 * A required artifact (the ground truth) is missing.
 */
export class ArtifactError extends IdsLabError {
  constructor(message: string, code: string = 'ARTIFACT_MISSING', options?: { cause?: unknown }) {
    super(message, code, false, options);
    this.name = 'ArtifactError';
  }
}

/**
 * The external metrics collaborator reported failure.
 */
export class MetricsError extends IdsLabError {
  constructor(message: string, code: string = 'METRICS_FAILED', options?: { cause?: unknown }) {
    super(message, code, false, options);
    this.name = 'MetricsError';
  }
}

/**
 * The operator interrupted the run.
 */
export class AbortedError extends IdsLabError {
  constructor(message: string = 'Interrupted by operator', code: string = 'ABORTED', options?: { cause?: unknown }) {
    super(message, code, false, options);
    this.name = 'AbortedError';
  }
}

/** Normalize anything thrown into an Error. */
export function toError(error: unknown): Error {
  if (error instanceof Error) return error;
  try {
    return new Error(JSON.stringify(error));
  } catch {
    return new Error(String(error));
  }
}
