import { mkdirSync, writeFileSync } from 'node:fs';
import * as path from 'node:path';

import pino, { type DestinationStream, type Logger } from 'pino';

import { COMPONENT_NAMES, type ComponentName } from './types.js';

/** Root logger instance. Respects the `LOG_LEVEL` environment variable (default: `info`). */
export const logger = pino({ level: process.env['LOG_LEVEL'] ?? 'info' });

/** Create a child logger tagged with `component`. */
export function createLogger(name: string) {
  return logger.child({ component: name });
}

/**
 * The unified run log plus one log per supervised component.
 *
 * `run` goes to stdout and the run log; `component(name)` goes to the run log
 * and that component's own file, which is also where the supervised
 * process's output is captured.
 */
export interface RunLogs {
  readonly run: Logger;
  component(name: ComponentName): Logger;
  componentPath(name: ComponentName): string;
  flush(): void;
}

export interface RunLogsOptions {
  logDir: string;
  runLog: string;
  componentLogs: Record<ComponentName, string>;
  level?: string;
  /** Truncate existing files first. */
  fresh?: boolean;
  /** Mirror the run log to stdout (default: true). */
  stdout?: boolean;
}

function openDestination(file: string) {
  return pino.destination({ dest: file, append: true, sync: true, mkdir: true });
}

/** Open the run log and the per-component logs. */
export function createRunLogs(opts: RunLogsOptions): RunLogs {
  const level = opts.level ?? process.env['LOG_LEVEL'] ?? 'info';

  mkdirSync(opts.logDir, { recursive: true });
  mkdirSync(path.dirname(opts.runLog), { recursive: true });
  if (opts.fresh) {
    writeFileSync(opts.runLog, '');
    for (const name of COMPONENT_NAMES) {
      writeFileSync(opts.componentLogs[name], '');
    }
  }

  const runDestination = openDestination(opts.runLog);
  const runStreams: pino.StreamEntry[] = [{ level: 'trace', stream: runDestination }];
  if (opts.stdout !== false) {
    runStreams.push({ level: 'trace', stream: process.stdout });
  }
  const run = pino(
    { level, timestamp: pino.stdTimeFunctions.isoTime },
    pino.multistream(runStreams),
  );

  const destinations: Array<{ flushSync(): void }> = [runDestination];
  const components = new Map<ComponentName, Logger>();
  for (const name of COMPONENT_NAMES) {
    const componentDestination = openDestination(opts.componentLogs[name]);
    destinations.push(componentDestination);
    const streams: DestinationStream = pino.multistream([
      { level: 'trace', stream: runDestination },
      { level: 'trace', stream: componentDestination },
    ]);
    components.set(
      name,
      pino({ level, timestamp: pino.stdTimeFunctions.isoTime, base: { component: name } }, streams),
    );
  }

  return {
    run,
    component(name) {
      return components.get(name) ?? run.child({ component: name });
    },
    componentPath(name) {
      return opts.componentLogs[name];
    },
    flush() {
      for (const destination of destinations) {
        destination.flushSync();
      }
    },
  };
}

/** A RunLogs that discards everything; used when only the shape is needed. */
export function createSilentRunLogs(componentLogs: Record<ComponentName, string>): RunLogs {
  const silent = pino({ level: 'silent' });
  return {
    run: silent,
    component: () => silent,
    componentPath: (name) => componentLogs[name],
    flush: () => undefined,
  };
}
