import { access } from 'node:fs/promises';

import type { GroundTruthLocator } from './ground-truth.js';
import type { ProcessSupervisor } from './process-supervisor.js';
import type { Predicate } from './readiness-probe.js';
import type { CommandExecutor } from './types.js';

/** A TCP socket is listening on `port` (any local address). */
export function portListening(executor: CommandExecutor, port: number): Predicate {
  return async () => {
    const result = await executor.exec('ss', ['-ltnH']);
    if (result.exitCode !== 0) return false;
    return result.stdout
      .split('\n')
      .some((line) => line.trim().split(/\s+/)[3]?.endsWith(`:${port}`) ?? false);
  };
}

/** The network interface `name` exists. */
export function interfaceExists(executor: CommandExecutor, name: string): Predicate {
  return async () => (await executor.exec('ip', ['link', 'show', name])).exitCode === 0;
}

export function fileExists(file: string): Predicate {
  return async () => {
    try {
      await access(file);
      return true;
    } catch {
      return false;
    }
  };
}

/** Some process's command line matches `pattern`. */
export function processRunning(executor: CommandExecutor, pattern: string): Predicate {
  return async () => (await executor.exec('pgrep', ['-f', pattern])).exitCode === 0;
}

export function sessionAlive(supervisor: ProcessSupervisor, name: string): Predicate {
  return () => supervisor.isAlive(name);
}

/** The session's captured terminal output contains `marker`. */
export function sessionOutputContains(supervisor: ProcessSupervisor, name: string, marker: string): Predicate {
  return async () => (await supervisor.capture(name)).includes(marker);
}

/** A ground-truth file newer than the `baseline` count exists and carries the end-of-run field. */
export function newGroundTruthComplete(locator: GroundTruthLocator, baseline: number): Predicate {
  return async () => {
    if ((await locator.snapshot()) <= baseline) return false;
    const newest = await locator.newest();
    return newest !== null && (await locator.hasEndMarker(newest));
  };
}

/** True when every predicate holds; stops at the first that does not. */
export function allOf(...predicates: Predicate[]): Predicate {
  return async () => {
    for (const predicate of predicates) {
      if (!(await predicate())) return false;
    }
    return true;
  };
}

/** True when any predicate holds. Every predicate is evaluated on each call. */
export function anyOf(...predicates: Predicate[]): Predicate {
  return async () => {
    const results = await Promise.all(
      predicates.map(async (predicate) => {
        try {
          return await predicate();
        } catch {
          return false;
        }
      }),
    );
    return results.includes(true);
  };
}
