import { Command, InvalidArgumentError } from 'commander';
import {
  IdsLabError,
  assertPrivileged,
  componentLogPaths,
  createLogger,
  createRunLogs,
  initTelemetry,
  loadConfig,
  shutdownTelemetry,
  totalIterations,
  withIterationOverrides,
} from '@idslab/core';
import type { FrozenConfig, RunLogs, UidSource } from '@idslab/core';
import { ReportAggregator, createOrchestrator } from '@idslab/orchestrator';
import type { OrchestratorOptions } from '@idslab/orchestrator';

import { formatMatrix, formatRunSummary } from './summary-formatter.js';

/** Exit status of a run stopped by SIGINT or SIGTERM. */
export const INTERRUPTED_EXIT_CODE = 130;

type SignalListener = (signal: NodeJS.Signals) => void;

/** Delivers SIGINT and SIGTERM to a running experiment; `process` by default. */
export interface SignalSource {
  once(event: NodeJS.Signals, listener: SignalListener): unknown;
  removeListener(event: NodeJS.Signals, listener: SignalListener): unknown;
}

export interface ProgramOptions {
  /** Replacements for the real lab collaborators. */
  collaborators?: Pick<OrchestratorOptions, 'executor' | 'backend' | 'metrics' | 'clock'>;
  getUid?: UidSource;
  /** Mirror the run log to stdout (default: true). */
  logToStdout?: boolean;
  print?: (text: string) => void;
  now?: () => Date;
  signals?: SignalSource;
}

interface ConfigOptions {
  config?: string;
  iterations: Record<string, number>;
}

interface RunOptions extends ConfigOptions {
  logLevel?: string;
  otlpEndpoint?: string;
}

/** Accumulate repeated `--iterations <type>=<count>` flags. */
export function collectIterationOverride(value: string, previous: Record<string, number>): Record<string, number> {
  const match = /^([\w-]+)=(\d+)$/.exec(value.trim());
  const testType = match?.[1];
  const count = match?.[2];
  if (testType === undefined || count === undefined) {
    throw new InvalidArgumentError('Expected <type>=<count>.');
  }
  return { ...previous, [testType]: Number.parseInt(count, 10) };
}

/** Print fatal idslab errors and set a failing exit status; rethrow anything else. */
function reportFailure(err: unknown): void {
  if (err instanceof IdsLabError) {
    console.error(`Error: ${err.message}`);
    process.exitCode = 1;
    return;
  }
  throw err;
}

async function resolveConfig(opts: ConfigOptions): Promise<FrozenConfig> {
  const config = await loadConfig(opts.config);
  return Object.keys(opts.iterations).length > 0 ? withIterationOverrides(config, opts.iterations) : config;
}

function openRunLogs(config: FrozenConfig, fresh: boolean, stdout: boolean, level?: string): RunLogs {
  return createRunLogs({
    logDir: config.paths.logDir,
    runLog: config.paths.runLog,
    componentLogs: componentLogPaths(config),
    fresh,
    stdout,
    ...(level ? { level } : {}),
  });
}

export function createProgram(options: ProgramOptions = {}): Command {
  const print = options.print ?? ((text: string) => console.log(text));
  const now = options.now ?? (() => new Date());
  const logToStdout = options.logToStdout ?? true;
  const signals: SignalSource = options.signals ?? process;

  const program = new Command();
  program.name('idslab').description('IDS detection experiment orchestrator').version('0.1.0');

  const withConfig = (command: Command) =>
    command
      .option('-c, --config <file>', 'experiment configuration (JSON)')
      .option(
        '-i, --iterations <type=count>',
        'override the iteration count of a test type (repeatable)',
        collectIterationOverride,
        {},
      );

  // ----- run -----

  withConfig(program.command('run'))
    .description('Run the experiment matrix and write the comparison report')
    .option('--log-level <level>', 'run log level')
    .option('--otlp-endpoint <url>', 'OTLP gRPC endpoint for traces')
    .action(async (opts: RunOptions) => {
      let config: FrozenConfig;
      try {
        assertPrivileged(options.getUid);
        config = await resolveConfig(opts);
      } catch (err) {
        reportFailure(err);
        return;
      }

      const logs = openRunLogs(config, true, logToStdout, opts.logLevel);
      initTelemetry({ serviceName: 'idslab', ...(opts.otlpEndpoint ? { otlpEndpoint: opts.otlpEndpoint } : {}) });

      const controller = new AbortController();
      const onSignal = (signal: NodeJS.Signals) => {
        logs.run.warn({ signal }, 'Interrupted, tearing down the current trial');
        controller.abort();
      };
      signals.once('SIGINT', onSignal);
      signals.once('SIGTERM', onSignal);

      try {
        const orchestrator = createOrchestrator({
          config,
          logs,
          ...options.collaborators,
          signal: controller.signal,
        });
        logs.run.info({ total: totalIterations(config), matrix: config.matrix }, 'Starting experiment');

        const result = await orchestrator.driver.run();
        const paths = { resultsRoot: config.paths.resultsRoot, runLog: config.paths.runLog };
        if (result.aborted) {
          logs.run.warn('Experiment interrupted; comparison report not written');
          print(formatRunSummary(result, paths));
          process.exitCode = INTERRUPTED_EXIT_CODE;
          return;
        }

        const report = await orchestrator.report.generate(now().toISOString());
        logs.run.info({ path: report.path }, 'Comparison report written');
        print(report.content);
        print(formatRunSummary(result, { ...paths, reportPath: report.path }));
      } finally {
        signals.removeListener('SIGINT', onSignal);
        signals.removeListener('SIGTERM', onSignal);
        await shutdownTelemetry();
        logs.flush();
      }
    });

  // ----- report -----

  program
    .command('report')
    .description('Regenerate the comparison report from existing results')
    .option('-c, --config <file>', 'experiment configuration (JSON)')
    .option('-q, --quiet', 'do not print the report')
    .action(async (opts: { config?: string; quiet?: boolean }) => {
      try {
        const config = await loadConfig(opts.config);
        const aggregator = new ReportAggregator({
          resultsRoot: config.paths.resultsRoot,
          reportFile: config.paths.reportFile,
          testTypes: [...new Set(config.matrix.map((entry) => entry.testType))],
          log: createLogger('report'),
        });
        const report = await aggregator.generate(now().toISOString());
        if (!opts.quiet) print(report.content);
        print(`Report: ${report.path}`);
      } catch (err) {
        reportFailure(err);
      }
    });

  // ----- clean -----

  program
    .command('clean')
    .description('Stop every supervised component and clear leftover artifacts')
    .option('-c, --config <file>', 'experiment configuration (JSON)')
    .action(async (opts: { config?: string }) => {
      let config: FrozenConfig;
      try {
        assertPrivileged(options.getUid);
        config = await loadConfig(opts.config);
      } catch (err) {
        reportFailure(err);
        return;
      }

      const logs = openRunLogs(config, false, logToStdout);
      try {
        const orchestrator = createOrchestrator({ config, logs, ...options.collaborators });
        await orchestrator.runner.clean();
        print('Environment cleaned');
      } finally {
        logs.flush();
      }
    });

  // ----- matrix -----

  withConfig(program.command('matrix'))
    .description('Show the trials a run would execute')
    .action(async (opts: ConfigOptions) => {
      try {
        print(formatMatrix(await resolveConfig(opts)));
      } catch (err) {
        reportFailure(err);
      }
    });

  return program;
}
