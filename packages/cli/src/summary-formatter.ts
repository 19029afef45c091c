/**
 * Terminal formatting for the idslab CLI: the trial plan and the end-of-run
 * summary.
 */
import { getTestConfiguration } from '@idslab/core';
import type { FrozenConfig } from '@idslab/core';
import type { ExperimentResult } from '@idslab/orchestrator';

const RULE = '='.repeat(40);

export interface RunSummaryPaths {
  resultsRoot: string;
  runLog: string;
  /** Absent when the run was interrupted and no report was written. */
  reportPath?: string;
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? '' : 's'}`;
}

/** The matrix as it will run, one line per entry. */
export function formatMatrix(config: FrozenConfig): string {
  const lines = ['Trial plan:'];
  let total = 0;
  for (const entry of config.matrix) {
    const test = getTestConfiguration(config, entry.testType);
    lines.push(
      `  ${entry.testType}: ${plural(entry.iterations, 'iteration')} ` +
        `(topology ${test.topology}, interface ${test.interface}, controller ${test.controller})`,
    );
    total += entry.iterations;
  }
  lines.push('', `Total trials: ${total}`);
  return lines.join('\n');
}

export function formatRunSummary(result: ExperimentResult, paths: RunSummaryPaths): string {
  const { counters } = result;
  const lines = [
    RULE,
    result.aborted ? 'TESTING SUITE INTERRUPTED' : 'TESTING SUITE COMPLETE',
    RULE,
    `Total tests: ${counters.total}`,
    `Completed: ${counters.completed}`,
    `Failed: ${counters.failed}`,
    `Success rate: ${result.successRate}%`,
  ];

  const failures = result.outcomes.filter((outcome) => !outcome.ok);
  if (failures.length > 0) {
    lines.push('', 'Failed iterations:');
    for (const outcome of failures) {
      const where = outcome.failedState ?? 'unknown state';
      lines.push(`  ${outcome.testType} #${outcome.iteration} at ${where}: ${outcome.error?.message ?? 'no error recorded'}`);
    }
  }

  lines.push('', `Results: ${paths.resultsRoot}`);
  if (paths.reportPath) lines.push(`Report: ${paths.reportPath}`);
  lines.push(`Run log: ${paths.runLog}`);
  return lines.join('\n');
}
