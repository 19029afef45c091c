import { describe, expect, it } from 'vitest';

import { formatRunSummary } from '../summary-formatter.js';

describe('formatRunSummary', () => {
  it('marks an interrupted run and omits the report path', () => {
    const text = formatRunSummary(
      {
        counters: { completed: 0, failed: 1, total: 4 },
        successRate: 0,
        aborted: true,
        outcomes: [
          {
            testType: 'proactive_sdn',
            iteration: 1,
            ok: false,
            failedState: 'ATTACK',
            error: new Error('Interrupted'),
            states: ['CLEAN', 'CONTROLLER', 'NETWORK', 'DETECTOR', 'ATTACK', 'TEARDOWN'],
            durationMs: 12_000,
            resultsDirectory: '/results/proactive_sdn/iteration_1',
          },
        ],
      },
      { resultsRoot: '/results', runLog: '/tmp/run.log' },
    );

    expect(text.split('\n')).toEqual([
      '========================================',
      'TESTING SUITE INTERRUPTED',
      '========================================',
      'Total tests: 4',
      'Completed: 0',
      'Failed: 1',
      'Success rate: 0%',
      '',
      'Failed iterations:',
      '  proactive_sdn #1 at ATTACK: Interrupted',
      '',
      'Results: /results',
      'Run log: /tmp/run.log',
    ]);
  });
});
