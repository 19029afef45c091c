import { chmod, mkdir, readdir, rm, stat, writeFile } from 'node:fs/promises';
import * as path from 'node:path';

import {
  AbortedError,
  NO_CONTROLLER,
  ProcessStartError,
  ReadinessTimeoutError,
  createIterationContext,
  formatDuration,
  getTestConfiguration,
  getTracer,
  toError,
  withSpan,
} from '@idslab/core';
import type {
  ComponentName,
  FrozenConfig,
  IterationContext,
  IterationState,
  RunLogs,
  TestConfiguration,
} from '@idslab/core';
import type { Logger } from 'pino';

import type { ArtifactCollector } from './artifact-collector.js';
import type { GroundTruthLocator } from './ground-truth.js';
import { LogFollower } from './log-follower.js';
import {
  allOf,
  anyOf,
  fileExists,
  interfaceExists,
  newGroundTruthComplete,
  portListening,
  processRunning,
  sessionAlive,
  sessionOutputContains,
} from './predicates.js';
import type { ProcessSupervisor } from './process-supervisor.js';
import { awaitReady } from './readiness-probe.js';
import type { Predicate, ReadinessOutcome } from './readiness-probe.js';
import { shellQuote } from './tmux-backend.js';
import type { Clock, CommandExecutor, IterationOutcome, StepResult } from './types.js';

const tracer = getTracer('idslab-orchestrator');

const ERROR_PATTERN = /error|traceback|exception|failed/i;

/** Component whose log a state's diagnostics belong in. */
const STATE_COMPONENT: Partial<Record<IterationState, ComponentName>> = {
  CONTROLLER: 'controller',
  NETWORK: 'network',
  DETECTOR: 'detector',
  ATTACK: 'attack',
};

export interface IterationRunnerOptions {
  config: FrozenConfig;
  supervisor: ProcessSupervisor;
  executor: CommandExecutor;
  collector: ArtifactCollector;
  groundTruth: GroundTruthLocator;
  clock: Clock;
  logs: RunLogs;
  signal?: AbortSignal;
}

interface Failure {
  state: IterationState;
  error: Error;
}

/**
 * Runs one trial through
 * CLEAN → CONTROLLER → NETWORK → DETECTOR → ATTACK → METRICS → TEARDOWN → COOLDOWN.
 *
 * The first failing state skips the rest up to TEARDOWN. Errors never
 * escape `run`; they are reported in the returned outcome.
 */
export class IterationRunner {
  private readonly config: FrozenConfig;
  private readonly supervisor: ProcessSupervisor;
  private readonly executor: CommandExecutor;
  private readonly collector: ArtifactCollector;
  private readonly groundTruth: GroundTruthLocator;
  private readonly clock: Clock;
  private readonly logs: RunLogs;
  private readonly signal: AbortSignal | undefined;

  constructor(opts: IterationRunnerOptions) {
    this.config = opts.config;
    this.supervisor = opts.supervisor;
    this.executor = opts.executor;
    this.collector = opts.collector;
    this.groundTruth = opts.groundTruth;
    this.clock = opts.clock;
    this.logs = opts.logs;
    this.signal = opts.signal;
  }

  async run(testType: string, iteration: number): Promise<IterationOutcome> {
    const startedAt = this.clock.now();
    const ctx = createIterationContext(this.config, testType, iteration);
    const log = this.logs.run;
    const states: IterationState[] = [];
    const trial: { failure?: Failure; test?: TestConfiguration } = {};

    log.info({ testType, iteration }, `TEST: ${testType} - ITERATION ${iteration}`);

    const attempt = async (state: IterationState, fn: () => Promise<void>): Promise<void> => {
      if (trial.failure) return;
      if (this.signal?.aborted) {
        trial.failure = { state, error: new AbortedError() };
        return;
      }
      states.push(state);
      const result = await this.step(state, ctx, fn);
      if (!result.ok) trial.failure = { state, error: result.error };
    };

    await attempt('CLEAN', async () => {
      await this.clean();
      trial.test = getTestConfiguration(this.config, testType);
    });
    const { test } = trial;
    if (test && test.controller !== NO_CONTROLLER) {
      const controller = test.controller;
      await attempt('CONTROLLER', () => this.startController(controller));
    }
    if (test) {
      const resolved = test;
      await attempt('NETWORK', () => this.startNetwork(resolved));
      await attempt('DETECTOR', () => this.startDetector(resolved));
    }
    await attempt('ATTACK', () => this.runAttack());
    await attempt('METRICS', () => this.collectMetrics(ctx));

    states.push('TEARDOWN');
    await this.step('TEARDOWN', ctx, () => this.teardown(ctx, trial.failure !== undefined));

    if (!this.signal?.aborted) {
      states.push('COOLDOWN');
      await this.step('COOLDOWN', ctx, async () => {
        this.logs.run.info(`Cooldown period (${formatDuration(this.config.timeouts.cooldown)})...`);
        await this.clock.sleep(this.config.timeouts.cooldown, this.signal);
      });
    }

    const durationMs = this.clock.now() - startedAt;
    const { failure } = trial;
    if (failure) {
      log.error(
        { testType, iteration, state: failure.state, err: failure.error.message },
        `TEST FAILED: ${testType} - ITERATION ${iteration} (${failure.state}: ${failure.error.message})`,
      );
    } else {
      log.info({ testType, iteration, durationMs }, `TEST COMPLETE: ${testType} - ITERATION ${iteration}`);
    }

    return {
      testType,
      iteration,
      ok: failure === undefined,
      ...(failure ? { failedState: failure.state, error: failure.error } : {}),
      states,
      durationMs,
      resultsDirectory: ctx.resultsDirectory,
    };
  }

  /**
   * Stop every supervised process and delete transient per-run files.
   * Safe to call at any time; never throws.
   */
  async clean(): Promise<void> {
    const log = this.logs.run;
    log.info('Cleaning up all processes...');
    const { paths, network } = this.config;

    const [cleanupFile, ...cleanupArgs] = network.cleanupCommand;
    if (cleanupFile) {
      await this.executor.exec(cleanupFile, cleanupArgs);
    }
    await this.supervisor.stopAll();

    await this.quietly('clear detector logs', () => this.clearDetectorLogs());
    await this.quietly('clear ground truth', () => this.groundTruth.clear());
    await this.quietly('remove attack output', () => rm(paths.attackOutputFile, { force: true }));

    await this.clock.sleep(this.config.timeouts.cleanupGrace);
    log.info('Cleanup complete');
  }

  private async step(state: IterationState, ctx: IterationContext, fn: () => Promise<void>): Promise<StepResult> {
    return withSpan(
      tracer,
      `iteration.${state.toLowerCase()}`,
      { 'test.type': ctx.testType, 'test.iteration': ctx.iteration },
      async (): Promise<StepResult> => {
        try {
          await fn();
          return { ok: true };
        } catch (err) {
          const error = toError(err);
          const component = STATE_COMPONENT[state];
          const log = component ? this.logs.component(component) : this.logs.run;
          log.error({ state, err: error.message }, `ERROR in ${state}: ${error.message}`);
          return { ok: false, error };
        }
      },
      (result) => (result.ok ? undefined : result.error.message),
    );
  }

  private async quietly(what: string, fn: () => Promise<unknown>): Promise<void> {
    try {
      await fn();
    } catch (err) {
      this.logs.run.warn({ err: toError(err).message }, `Failed to ${what}`);
    }
  }

  private async clearDetectorLogs(): Promise<void> {
    const dir = this.config.paths.detectorLogDir;
    let names: string[];
    try {
      names = await readdir(dir);
    } catch {
      return;
    }
    for (const name of names) {
      if (name.endsWith('.log') || name.endsWith('.json')) {
        await rm(path.join(dir, name), { force: true });
      }
    }
  }

  private async probe(
    name: string,
    predicate: Predicate,
    timeoutMs: number,
    pollIntervalMs: number,
    extra: { progressIntervalMs?: number; onProgress?: (elapsedMs: number) => Promise<void> } = {},
  ): Promise<void> {
    const outcome: ReadinessOutcome = await awaitReady(predicate, {
      timeoutMs,
      pollIntervalMs,
      clock: this.clock,
      signal: this.signal,
      ...extra,
    });
    if (outcome.ready) return;
    if (outcome.reason === 'aborted') throw new AbortedError();
    throw new ReadinessTimeoutError(name, outcome.elapsedMs);
  }

  private async startController(script: string): Promise<void> {
    const log = this.logs.component('controller');
    const { timeouts, controller, paths } = this.config;
    log.info(`Starting controller: ${script}`);
    await this.supervisor.start(
      'controller',
      `./${script}`,
      paths.sharedDir,
      this.logs.componentPath('controller'),
    );
    log.info(`Waiting for controller to be ready (port ${controller.port})...`);
    await this.probe('controller', portListening(this.executor, controller.port), timeouts.controllerReady, timeouts.fastPoll);
    log.info(`Controller ready! (port ${controller.port} listening)`);
  }

  private async startNetwork(test: TestConfiguration): Promise<void> {
    const log = this.logs.component('network');
    const { timeouts, network, paths } = this.config;
    log.info({ testType: test.name, topology: test.topology }, `Starting network: ${test.topology}`);

    await this.supervisor.start(
      'network',
      `${network.command} ${shellQuote(path.join(paths.sharedDir, test.topology))}`,
      paths.sharedDir,
      this.logs.componentPath('network'),
    );
    await this.clock.sleep(timeouts.networkStartup, this.signal);
    if (!(await this.supervisor.isAlive('network'))) {
      throw new ProcessStartError('Network session died immediately; the topology script failed to start');
    }

    log.info('Waiting for network to be ready...');
    try {
      await this.probe(
        'network',
        allOf(
          sessionOutputContains(this.supervisor, 'network', network.promptMarker),
          interfaceExists(this.executor, test.interface),
        ),
        timeouts.networkReady,
        timeouts.fastPoll,
      );
    } catch (err) {
      const output = await this.supervisor.capture('network');
      log.error({ output: lastLines(output, 20) }, 'Network startup timeout; last session output attached');
      throw err;
    }
    log.info(`Network CLI ready and interface ${test.interface} present`);
    await this.clock.sleep(timeouts.networkStabilize, this.signal);

    if (test.controller !== NO_CONTROLLER) {
      log.info('SDN network: establishing connectivity with pingall...');
      await this.supervisor.send('network', 'pingall');
      await this.clock.sleep(timeouts.connectivityWarmup, this.signal);
      await this.supervisor.send('network', '');
      await this.clock.sleep(timeouts.networkStabilize, this.signal);
    }

    const server = `python3 -m http.server ${network.httpPort}`;
    log.info(`Starting HTTP server on ${network.victimHost}...`);
    await this.supervisor.send('network', `${network.victimHost} ${server} >/dev/null 2>&1 &`);
    await this.supervisor.send('network', '');
    await this.probe('http server', processRunning(this.executor, server), timeouts.auxServiceReady, timeouts.fastPoll);
    log.info(`HTTP server verified (port ${network.httpPort}); network ready`);
  }

  private async startDetector(test: TestConfiguration): Promise<void> {
    const log = this.logs.component('detector');
    const { timeouts, detector, paths } = this.config;
    log.info({ interface: test.interface }, `Starting detector on interface ${test.interface}`);

    await this.clearDetectorLogs();
    await mkdir(paths.detectorLogDir, { recursive: true });
    await this.supervisor.start(
      'detector',
      `${shellQuote(path.join(paths.sharedDir, detector.script))} ${shellQuote(test.interface)}`,
      paths.sharedDir,
      this.logs.componentPath('detector'),
    );

    log.info('Waiting for detector to be ready...');
    await this.probe(
      'detector',
      allOf(
        sessionAlive(this.supervisor, 'detector'),
        processRunning(this.executor, detector.processPattern),
        fileExists(path.join(paths.detectorLogDir, detector.alertLog)),
      ),
      timeouts.detectorReady,
      timeouts.fastPoll,
    );
    log.info('Detector ready and logging');
  }

  private async runAttack(): Promise<void> {
    const log = this.logs.component('attack');
    const { timeouts, attack, paths } = this.config;

    await this.groundTruth.clear();
    await writeFile(paths.attackOutputFile, '');
    await chmod(paths.attackOutputFile, 0o666);
    await writeFile(this.logs.componentPath('attack'), '');
    const baseline = await this.groundTruth.snapshot();

    const follower = new LogFollower(
      paths.attackOutputFile,
      this.logs.componentPath('attack'),
      timeouts.followInterval,
      log,
    );
    follower.start();
    try {
      const scriptPath = path.join(paths.sharedDir, attack.script);
      log.info(`Executing attacks from ${attack.attackerHost} (target: ${attack.target})...`);
      await this.supervisor.send('network', `${attack.attackerHost} ${attack.command} ${scriptPath} ${attack.target}`);
      await this.clock.sleep(timeouts.attackAccept, this.signal);
      await this.checkAccepted(log);

      log.info('Waiting for attack suite to complete...');
      await this.probe(
        'attack suite',
        anyOf(
          sessionOutputContains(this.supervisor, 'network', attack.completionMarker),
          newGroundTruthComplete(this.groundTruth, baseline),
        ),
        timeouts.attackComplete,
        timeouts.attackPoll,
        {
          progressIntervalMs: timeouts.attackProgress,
          onProgress: (elapsedMs) => this.reportAttackProgress(log, elapsedMs, baseline),
        },
      );
      log.info('Attack suite completed');

      const groundTruth = await this.groundTruth.newest();
      if (groundTruth) {
        await this.groundTruth.writePointer(groundTruth);
        const totals = await this.groundTruth.readTotals(groundTruth);
        log.info(
          { groundTruth, ...totals },
          `Ground truth saved: ${groundTruth} (packets: ${totals.totalPacketsSent ?? 'unknown'}, duration: ${totals.totalDurationSeconds ?? 'unknown'}s)`,
        );
      } else {
        log.warn('Ground truth file not found, but attack completed');
      }

      log.info('Waiting for detector to process all packets...');
      await this.clock.sleep(timeouts.detectorSettle, this.signal);
    } finally {
      try {
        await follower.stop();
      } catch (err) {
        log.warn({ err: toError(err).message }, 'Failed to flush attack output');
      }
    }
  }

  /** Best-effort check that the network CLI took the attack command. */
  private async checkAccepted(log: Logger): Promise<void> {
    const { attack } = this.config;
    const response = lastLines(await this.supervisor.capture('network'), attack.acceptCheckLines);
    log.info(`Network CLI output (last ${attack.acceptCheckLines} lines):`);
    for (const line of response.split('\n')) {
      log.info(`  ${line}`);
    }
    if (ERROR_PATTERN.test(response)) {
      log.warn('Detected error in network CLI response');
    }
    if (response.includes(attack.script)) {
      log.info('Attack command appears in output');
    } else {
      log.warn('Attack command NOT visible in output');
    }
  }

  private async reportAttackProgress(log: Logger, elapsedMs: number, baseline: number): Promise<void> {
    const { paths, attack } = this.config;
    log.info(`Still running... ${formatDuration(elapsedMs)} elapsed`);
    try {
      const size = (await stat(paths.attackOutputFile)).size;
      log.info(`Attack output file size: ${size} bytes`);
    } catch {
      log.info("Attack output file doesn't exist yet");
    }
    log.info(`Ground truth files found: ${await this.groundTruth.snapshot()} (before: ${baseline})`);
    const running = await processRunning(this.executor, `${attack.script} ${attack.target}`)();
    if (running) {
      log.info('Attack process is running');
    } else {
      log.warn('Attack process not found');
    }
  }

  private async collectMetrics(ctx: IterationContext): Promise<void> {
    const pointer = await this.groundTruth.readPointer();
    await this.collector.collect(ctx, pointer);
  }

  private async teardown(ctx: IterationContext, failed: boolean): Promise<void> {
    this.logs.run.info('Stopping all processes...');
    try {
      await this.supervisor.send('network', 'exit');
    } catch (err) {
      this.logs.run.debug({ err: toError(err).message }, 'Graceful network exit not delivered');
    }
    await this.clock.sleep(this.config.timeouts.gracefulExit, this.signal);
    if (failed) {
      this.logs.flush();
      const preserved = await this.collector.preserveLogs(ctx);
      this.logs.run.info({ preserved }, `Component logs preserved in ${ctx.resultsDirectory}`);
    }
    await this.clean();
  }
}

function lastLines(text: string, count: number): string {
  const lines = text.replace(/\n+$/, '').split('\n');
  return lines.slice(-count).join('\n');
}
