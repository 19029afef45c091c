import { getMeter, totalIterations } from '@idslab/core';
import type { ExperimentCounters, FrozenConfig } from '@idslab/core';
import type { Logger } from 'pino';

import type { IterationOutcome } from './types.js';

const meter = getMeter('idslab-orchestrator');
const iterationCounter = meter.createCounter('idslab.iterations', {
  description: 'Trials run, by test type and outcome',
});

/** One scheduled trial. */
export interface PlannedTrial {
  testType: string;
  iteration: number;
}

/** Expand the matrix into trials in execution order: test types as listed, iterations 1..n. */
export function planTrials(config: FrozenConfig): PlannedTrial[] {
  const trials: PlannedTrial[] = [];
  for (const entry of config.matrix) {
    for (let iteration = 1; iteration <= entry.iterations; iteration++) {
      trials.push({ testType: entry.testType, iteration });
    }
  }
  return trials;
}

/** Integer success percentage; 0 when nothing was scheduled. */
export function successRate(counters: ExperimentCounters): number {
  if (counters.total === 0) return 0;
  return Math.floor((counters.completed * 100) / counters.total);
}

/** The part of IterationRunner the driver depends on. */
export interface TrialRunner {
  run(testType: string, iteration: number): Promise<IterationOutcome>;
  clean(): Promise<void>;
}

export interface ExperimentResult {
  counters: ExperimentCounters;
  successRate: number;
  outcomes: IterationOutcome[];
  /** True when an interrupt stopped scheduling before the matrix finished. */
  aborted: boolean;
}

export interface ExperimentDriverOptions {
  config: FrozenConfig;
  runner: TrialRunner;
  log: Logger;
  signal?: AbortSignal;
}

/**
 * Runs every trial of the matrix in order, one at a time, and keeps going
 * past failures. Cleans once before the first trial and once after the last.
 */
export class ExperimentDriver {
  private readonly config: FrozenConfig;
  private readonly runner: TrialRunner;
  private readonly log: Logger;
  private readonly signal: AbortSignal | undefined;

  constructor(opts: ExperimentDriverOptions) {
    this.config = opts.config;
    this.runner = opts.runner;
    this.log = opts.log;
    this.signal = opts.signal;
  }

  async run(): Promise<ExperimentResult> {
    const trials = planTrials(this.config);
    const counters: ExperimentCounters = { completed: 0, failed: 0, total: totalIterations(this.config) };
    const outcomes: IterationOutcome[] = [];

    this.log.info({ total: counters.total, resultsRoot: this.config.paths.resultsRoot }, 'AUTOMATED IDS TESTING SUITE STARTING');
    for (const entry of this.config.matrix) {
      this.log.info(`  ${entry.testType} iterations: ${entry.iterations}`);
    }

    await this.runner.clean();

    let aborted = false;
    for (const trial of trials) {
      if (this.signal?.aborted) {
        aborted = true;
        break;
      }
      const outcome = await this.runner.run(trial.testType, trial.iteration);
      outcomes.push(outcome);
      iterationCounter.add(1, { 'test.type': trial.testType, outcome: outcome.ok ? 'completed' : 'failed' });

      if (outcome.ok) {
        counters.completed++;
        this.log.info(`[OK] Progress: ${counters.completed} / ${counters.total} tests completed`);
      } else {
        counters.failed++;
        this.log.warn(`[FAIL] Test failed: ${trial.testType} iteration ${trial.iteration}`);
        if (this.signal?.aborted) {
          aborted = true;
          break;
        }
        this.log.info('Continuing with next test...');
      }
    }

    await this.runner.clean();

    const rate = successRate(counters);
    this.log.info(
      { ...counters, successRate: rate },
      `Total: ${counters.total}, completed: ${counters.completed}, failed: ${counters.failed}, success rate: ${rate}%`,
    );
    return { counters, successRate: rate, outcomes, aborted };
  }
}
