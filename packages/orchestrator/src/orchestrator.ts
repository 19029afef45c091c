/**
 * Composition root: builds the supervisor, runner, driver and report
 * aggregator for one configuration. Collaborators default to the real
 * implementations and can be replaced individually.
 */
import { invokingUser } from '@idslab/core';
import type { FrozenConfig, RunLogs } from '@idslab/core';

import { ArtifactCollector } from './artifact-collector.js';
import { systemClock } from './clock.js';
import { ExperimentDriver } from './experiment-driver.js';
import { createCommandExecutor } from './executor.js';
import { GroundTruthLocator } from './ground-truth.js';
import { IterationRunner } from './iteration-runner.js';
import { ExternalMetricsComputer } from './metrics-computer.js';
import { ProcessSupervisor } from './process-supervisor.js';
import { ReportAggregator } from './report-aggregator.js';
import { createTmuxBackend } from './tmux-backend.js';
import type { Clock, CommandExecutor, MetricsComputer, SessionBackend } from './types.js';

export interface OrchestratorOptions {
  config: FrozenConfig;
  logs: RunLogs;
  executor?: CommandExecutor;
  backend?: SessionBackend;
  metrics?: MetricsComputer;
  clock?: Clock;
  signal?: AbortSignal;
}

export interface Orchestrator {
  supervisor: ProcessSupervisor;
  groundTruth: GroundTruthLocator;
  collector: ArtifactCollector;
  runner: IterationRunner;
  driver: ExperimentDriver;
  report: ReportAggregator;
}

/** Test types in matrix order, each once. */
function reportedTestTypes(config: FrozenConfig): string[] {
  return [...new Set(config.matrix.map((entry) => entry.testType))];
}

/** The configured session owner, else the user who invoked sudo. */
export function resolveSessionUser(config: FrozenConfig, env: NodeJS.ProcessEnv = process.env): string | undefined {
  return config.sessionUser ?? invokingUser(env);
}

export function createOrchestrator(opts: OrchestratorOptions): Orchestrator {
  const { config, logs, signal } = opts;
  const clock = opts.clock ?? systemClock;
  const executor = opts.executor ?? createCommandExecutor(config.timeouts.commandTimeout);
  const backend = opts.backend ?? createTmuxBackend(executor, { sessionUser: resolveSessionUser(config) });
  const metrics =
    opts.metrics ??
    new ExternalMetricsComputer(executor, {
      command: config.metrics.command,
      args: config.metrics.args,
      cwd: config.paths.sharedDir,
      timeoutMs: config.timeouts.metricsCompute,
    });

  const supervisor = new ProcessSupervisor({
    backend,
    executor,
    sessions: config.sessions,
    danglingPatterns: config.danglingPatterns,
    log: logs.run,
  });
  const groundTruth = new GroundTruthLocator({
    scratchDir: config.paths.scratchDir,
    prefix: config.paths.groundTruthPrefix,
    pointerFile: config.paths.pointerFile,
    endMarkerField: config.attack.endMarkerField,
  });
  const collector = new ArtifactCollector({ config, metrics, clock, log: logs.run });
  const runner = new IterationRunner({ config, supervisor, executor, collector, groundTruth, clock, logs, signal });
  const driver = new ExperimentDriver({ config, runner, log: logs.run, signal });
  const report = new ReportAggregator({
    resultsRoot: config.paths.resultsRoot,
    reportFile: config.paths.reportFile,
    testTypes: reportedTestTypes(config),
    log: logs.run,
  });

  return { supervisor, groundTruth, collector, runner, driver, report };
}
