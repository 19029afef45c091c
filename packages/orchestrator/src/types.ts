import type { IterationState } from '@idslab/core';

/** Result of running an external command. A missing binary reports exit code 127. */
export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface ExecOptions {
  cwd?: string;
  timeoutMs?: number;
}

/**
 * Abstraction over running short-lived external commands, for testability.
 */
export interface CommandExecutor {
  /** Run `file` with `args` (no shell). Never rejects. */
  exec(file: string, args: readonly string[], options?: ExecOptions): Promise<ExecResult>;
}

/**
 * A named, addressable execution context that outlives the call that created
 * it (a tmux session in production).
 */
export interface SessionBackend {
  /** Start `command` in a new detached session, piping its output to `logPath`. */
  create(session: string, command: string, cwd: string, logPath: string): Promise<void>;

  /** Whether the session exists (its leader process is still alive). */
  exists(session: string): Promise<boolean>;

  /** PID of the session's leader process, or null if unknown. */
  leaderPid(session: string): Promise<number | null>;

  /** Tear the session down. A missing session is not an error. */
  kill(session: string): Promise<void>;

  /** Type `text` followed by Enter into the session. */
  send(session: string, text: string): Promise<void>;

  /** Recent output of the session's terminal. Empty string if the session is gone. */
  capture(session: string): Promise<string>;
}

/** Time source and suspension primitive; a virtual clock replaces it in tests. */
export interface Clock {
  now(): number;
  /** Resolves after `ms`, or early (without rejecting) once `signal` aborts. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

/** Inputs handed to the external metrics collaborator. */
export interface MetricsRequest {
  groundTruthPath: string;
  eventLogPath: string;
  outputPath: string;
  testType: string;
  iteration: number;
}

export interface MetricsResult {
  ok: boolean;
  output: string;
}

/**
 * The external detection-metrics collaborator.
 */
export interface MetricsComputer {
  compute(request: MetricsRequest): Promise<MetricsResult>;
}

/** Outcome of one state of the iteration state machine. */
export type StepResult = { ok: true } | { ok: false; error: Error };

/** Outcome of one trial as reported to the driver. */
export interface IterationOutcome {
  testType: string;
  iteration: number;
  ok: boolean;
  /** First state that failed, if any. */
  failedState?: IterationState;
  error?: Error;
  /** States that ran, in order. */
  states: IterationState[];
  durationMs: number;
  resultsDirectory: string;
}
