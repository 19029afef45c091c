import { mkdir, writeFile } from 'node:fs/promises';
import * as path from 'node:path';

import { ProcessStartError, toError } from '@idslab/core';
import type { Logger } from 'pino';

import type { CommandExecutor, SessionBackend } from './types.js';

/** A supervised external process. One per logical name at any time. */
export interface ProcessHandle {
  readonly logicalName: string;
  readonly sessionId: string;
  readonly logPath: string;
  readonly startedAt: Date;
}

export interface ProcessSupervisorOptions {
  backend: SessionBackend;
  executor: CommandExecutor;
  /** Logical name → session id. Unlisted names use the logical name itself. */
  sessions: Readonly<Record<string, string>>;
  /** `pkill -f` patterns for processes that outlive their session. */
  danglingPatterns: readonly string[];
  log: Logger;
}

/**
 * Starts and stops named external processes inside addressable sessions.
 * `stop` and `stopAll` never throw.
 */
export class ProcessSupervisor {
  private readonly handles = new Map<string, ProcessHandle>();
  private readonly backend: SessionBackend;
  private readonly executor: CommandExecutor;
  private readonly sessions: Readonly<Record<string, string>>;
  private readonly danglingPatterns: readonly string[];
  private readonly log: Logger;

  constructor(opts: ProcessSupervisorOptions) {
    this.backend = opts.backend;
    this.executor = opts.executor;
    this.sessions = opts.sessions;
    this.danglingPatterns = opts.danglingPatterns;
    this.log = opts.log;
  }

  sessionId(name: string): string {
    return this.handles.get(name)?.sessionId ?? this.sessions[name] ?? name;
  }

  handle(name: string): ProcessHandle | undefined {
    return this.handles.get(name);
  }

  /**
   * Launch `command` detached, in a fresh session, with its output appended
   * to `logPath`. Any prior process of the same name is stopped and its log
   * truncated first.
   */
  async start(name: string, command: string, workingDirectory: string, logPath: string): Promise<ProcessHandle> {
    await this.stop(name);

    const sessionId = this.sessionId(name);
    try {
      await mkdir(path.dirname(logPath), { recursive: true });
      await writeFile(logPath, '');
      await this.backend.create(sessionId, command, workingDirectory, logPath);
    } catch (err) {
      throw new ProcessStartError(`Failed to start ${name}: ${toError(err).message}`, 'PROCESS_START_FAILED', {
        cause: err,
      });
    }

    const handle: ProcessHandle = Object.freeze({
      logicalName: name,
      sessionId,
      logPath,
      startedAt: new Date(),
    });
    this.handles.set(name, handle);
    this.log.info({ process: name, session: sessionId, log: logPath }, `Started ${name}`);
    return handle;
  }

  /** Terminate every process reachable from the named session. No-op when it is gone. */
  async stop(name: string): Promise<void> {
    const sessionId = this.sessionId(name);
    this.handles.delete(name);
    try {
      if (!(await this.backend.exists(sessionId))) return;
      const pid = await this.backend.leaderPid(sessionId);
      await this.backend.kill(sessionId);
      if (pid !== null) {
        await this.executor.exec('pkill', ['-KILL', '-s', String(pid)]);
      }
      this.log.debug({ process: name, session: sessionId }, `Stopped ${name}`);
    } catch (err) {
      this.log.warn({ process: name, err: toError(err).message }, `Failed to stop ${name}`);
    }
  }

  /** Stop every known and configured session, then kill dangling processes. */
  async stopAll(): Promise<void> {
    const names = new Set<string>([...this.handles.keys(), ...Object.keys(this.sessions)]);
    for (const name of names) {
      await this.stop(name);
    }
    for (const pattern of this.danglingPatterns) {
      const result = await this.executor.exec('pkill', ['-9', '-f', pattern]);
      if (result.exitCode === 0) {
        this.log.debug({ pattern }, 'Killed dangling processes');
      }
    }
  }

  async isAlive(name: string): Promise<boolean> {
    try {
      return await this.backend.exists(this.sessionId(name));
    } catch {
      return false;
    }
  }

  /** Type a line into the session's interactive control channel. */
  async send(name: string, text: string): Promise<void> {
    await this.backend.send(this.sessionId(name), text);
  }

  /** Recent terminal output of the session. */
  async capture(name: string): Promise<string> {
    try {
      return await this.backend.capture(this.sessionId(name));
    } catch {
      return '';
    }
  }
}
