import { appendFile, mkdir, writeFile } from 'node:fs/promises';
import * as path from 'node:path';

import { componentLogPaths, createSilentRunLogs, parseConfig } from '@idslab/core';
import type { ExperimentConfigInput, FrozenConfig, RunLogs } from '@idslab/core';
import pino from 'pino';

import type {
  Clock,
  CommandExecutor,
  ExecResult,
  MetricsComputer,
  MetricsRequest,
  SessionBackend,
} from '../types.js';

export const silentLogger = pino({ level: 'silent' });

// --- Virtual clock ---

/** A clock whose sleeps advance time instantly. */
export class VirtualClock implements Clock {
  private current: number;
  readonly sleeps: number[] = [];
  /** Called after every sleep with the new time. */
  onSleep: ((now: number) => void) | undefined;

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return;
    this.sleeps.push(ms);
    this.current += ms;
    this.onSleep?.(this.current);
    await Promise.resolve();
  }
}

// --- Executor ---

export interface ExecCall {
  file: string;
  args: readonly string[];
}

export type ExecHandler = (file: string, args: readonly string[]) => ExecResult | undefined;

export function ok(stdout = ''): ExecResult {
  return { stdout, stderr: '', exitCode: 0 };
}

export function fail(exitCode = 1, stderr = ''): ExecResult {
  return { stdout: '', stderr, exitCode };
}

/** Records every call; unanswered commands exit 127. */
export function createMockExecutor(handler: ExecHandler = () => undefined): CommandExecutor & { calls: ExecCall[] } {
  const calls: ExecCall[] = [];
  return {
    calls,
    async exec(file, args) {
      calls.push({ file, args });
      return handler(file, args) ?? { stdout: '', stderr: 'command not found', exitCode: 127 };
    },
  };
}

// --- Session backend ---

export interface FakeSession {
  command: string;
  cwd: string;
  logPath: string;
  output: string;
  pid: number;
  sent: string[];
}

export class FakeSessionBackend implements SessionBackend {
  readonly sessions = new Map<string, FakeSession>();
  readonly created: string[] = [];
  readonly killed: string[] = [];
  private nextPid = 1000;
  onCreate: ((session: string, state: FakeSession) => Promise<void> | void) | undefined;
  onSend: ((session: string, text: string, state: FakeSession) => Promise<void> | void) | undefined;

  async create(session: string, command: string, cwd: string, logPath: string): Promise<void> {
    const state: FakeSession = { command, cwd, logPath, output: '', pid: this.nextPid++, sent: [] };
    this.sessions.set(session, state);
    this.created.push(session);
    await this.onCreate?.(session, state);
  }

  async exists(session: string): Promise<boolean> {
    return this.sessions.has(session);
  }

  async leaderPid(session: string): Promise<number | null> {
    return this.sessions.get(session)?.pid ?? null;
  }

  async kill(session: string): Promise<void> {
    if (this.sessions.delete(session)) this.killed.push(session);
  }

  async send(session: string, text: string): Promise<void> {
    const state = this.sessions.get(session);
    if (!state) return;
    state.sent.push(text);
    state.output += `${text}\n`;
    await this.onSend?.(session, text, state);
  }

  async capture(session: string): Promise<string> {
    return this.sessions.get(session)?.output ?? '';
  }
}

// --- Lab simulation ---

export interface FakeLabOptions {
  /** Whether the n-th detector start (1-based) produces its alert log. */
  detectorHealthy?: (start: number) => boolean;
  /** Whether the attack generator finishes, for every launch or the n-th (1-based). */
  attackCompletes?: boolean | ((launch: number) => boolean);
  /** Alert lines the detector writes to its alert log. */
  alertLines?: number;
  /** Detection metrics written by the metrics collaborator. */
  metricsDocument?: (request: MetricsRequest) => unknown;
  metricsOk?: boolean;
  config?: ExperimentConfigInput;
}

export const DEFAULT_METRICS = {
  attacks: {
    http_flood: {
      detected: true,
      time_to_detect_seconds: 3.1,
      total_alerts: 16,
      packets_sent: 500,
      detection_rate_percent: 3,
    },
    port_scan: { detected: false, packets_sent: 1000 },
  },
  summary: { total_alerts: 16 },
};

/** Lab paths rooted in a temporary directory. */
export function labConfig(root: string, overrides: ExperimentConfigInput = {}): FrozenConfig {
  return parseConfig({
    matrix: [{ testType: 'traditional', iterations: 1 }],
    ...overrides,
    paths: {
      resultsRoot: path.join(root, 'results'),
      sharedDir: path.join(root, 'shared'),
      detectorLogDir: path.join(root, 'detector'),
      logDir: path.join(root, 'logs'),
      runLog: path.join(root, 'run.log'),
      scratchDir: path.join(root, 'scratch'),
      pointerFile: path.join(root, 'scratch', 'last_attack_stats.txt'),
      attackOutputFile: path.join(root, 'scratch', 'attack_output.txt'),
      ...overrides.paths,
    },
  });
}

/**
 * In-process stand-in for the network emulator, controller, detector,
 * attack generator and metrics collaborator, driven through the fake
 * executor and session backend.
 */
export class FakeLab {
  readonly config: FrozenConfig;
  readonly clock = new VirtualClock(Date.UTC(2026, 0, 1));
  readonly backend = new FakeSessionBackend();
  readonly executor: CommandExecutor & { calls: ExecCall[] };
  readonly metrics: MetricsComputer & { requests: MetricsRequest[] };
  readonly logs: RunLogs;
  detectorStarts = 0;
  attacksLaunched = 0;
  httpServerRunning = false;

  constructor(root: string, private readonly opts: FakeLabOptions = {}) {
    this.config = labConfig(root, opts.config);
    this.logs = createSilentRunLogs(componentLogPaths(this.config));
    this.executor = createMockExecutor((file, args) => this.exec(file, args));

    const requests: MetricsRequest[] = [];
    this.metrics = {
      requests,
      compute: async (request) => {
        requests.push(request);
        if (opts.metricsOk === false) return { ok: false, output: 'metrics failed' };
        const document = opts.metricsDocument ? opts.metricsDocument(request) : DEFAULT_METRICS;
        await writeFile(request.outputPath, JSON.stringify(document, null, 2));
        return { ok: true, output: '' };
      },
    };

    this.backend.onCreate = (session) => this.onCreate(session);
    this.backend.onSend = (session, text, state) => this.onSend(session, text, state);
  }

  async prepare(): Promise<void> {
    await mkdir(this.config.paths.sharedDir, { recursive: true });
    await mkdir(this.config.paths.scratchDir, { recursive: true });
    await mkdir(this.config.paths.detectorLogDir, { recursive: true });
  }

  private has(session: string): boolean {
    return this.backend.sessions.has(session);
  }

  private exec(file: string, args: readonly string[]): ExecResult | undefined {
    const { sessions, controller, network } = this.config;
    switch (file) {
      case 'ss':
        return ok(this.has(sessions.controller) ? `LISTEN 0 128 0.0.0.0:${controller.port} 0.0.0.0:*\n` : '');
      case 'ip':
        return this.has(sessions.network) ? ok() : fail(1);
      case 'pgrep': {
        const pattern = args[1] ?? '';
        if (pattern.includes(`http.server ${network.httpPort}`)) return this.httpServerRunning ? ok('4242\n') : fail(1);
        if (pattern === this.config.detector.processPattern) return this.has(sessions.detector) ? ok('4343\n') : fail(1);
        return fail(1);
      }
      case 'pkill':
        return fail(1);
      case 'mn':
        this.httpServerRunning = false;
        return ok();
      default:
        return undefined;
    }
  }

  private async onCreate(session: string): Promise<void> {
    const { sessions, network, detector, paths } = this.config;
    if (session === sessions.network) {
      const state = this.backend.sessions.get(session);
      if (state) state.output += `*** Starting CLI:\n${network.promptMarker} `;
    }
    if (session === sessions.detector) {
      this.detectorStarts++;
      const healthy = this.opts.detectorHealthy?.(this.detectorStarts) ?? true;
      if (healthy) {
        const lines = this.opts.alertLines ?? 16;
        const alerts = Array.from({ length: lines }, (_, i) => `alert ${i + 1}\n`).join('');
        await writeFile(path.join(paths.detectorLogDir, detector.alertLog), alerts);
        await writeFile(path.join(paths.detectorLogDir, detector.eventLog), '{"event_type":"alert"}\n');
      }
    }
  }

  private async onSend(session: string, text: string, state: FakeSession): Promise<void> {
    const { sessions, network, attack, paths } = this.config;
    if (session !== sessions.network) return;

    if (text.startsWith(`${network.victimHost} `)) {
      this.httpServerRunning = true;
    } else if (text === 'exit') {
      this.backend.sessions.delete(session);
    } else if (text.includes(attack.script)) {
      this.attacksLaunched++;
      await appendFile(paths.attackOutputFile, `[attack] suite ${this.attacksLaunched} started\n`);
      const { attackCompletes = true } = this.opts;
      const completes =
        typeof attackCompletes === 'function' ? attackCompletes(this.attacksLaunched) : attackCompletes;
      if (!completes) return;
      const groundTruth = {
        start_time: 1_767_225_600,
        end_time: 1_767_225_642,
        attacks: { http_flood: { attack_type: 'HTTP Flood', packets_sent: 500 } },
        totals: { total_packets_sent: 500, total_duration: 42 },
      };
      await writeFile(
        path.join(paths.scratchDir, `${paths.groundTruthPrefix}${this.attacksLaunched}.json`),
        JSON.stringify(groundTruth),
      );
      await appendFile(paths.attackOutputFile, `[attack] suite ${this.attacksLaunched} done\n`);
      state.output += `${attack.completionMarker}\n${network.promptMarker} `;
    }
  }
}
