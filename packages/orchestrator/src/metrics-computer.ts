import type { CommandExecutor, MetricsComputer, MetricsRequest, MetricsResult } from './types.js';

export interface ExternalMetricsComputerOptions {
  command: string;
  args: readonly string[];
  cwd: string;
  timeoutMs: number;
}

/**
 * Runs the external metrics command as
 * `<command> <args...> <groundTruth> <eventLog> <output> <testType> <iteration>`.
 * Exit code 0 is success.
 */
export class ExternalMetricsComputer implements MetricsComputer {
  constructor(
    private readonly executor: CommandExecutor,
    private readonly opts: ExternalMetricsComputerOptions,
  ) {}

  async compute(request: MetricsRequest): Promise<MetricsResult> {
    const result = await this.executor.exec(
      this.opts.command,
      [
        ...this.opts.args,
        request.groundTruthPath,
        request.eventLogPath,
        request.outputPath,
        request.testType,
        String(request.iteration),
      ],
      { cwd: this.opts.cwd, timeoutMs: this.opts.timeoutMs },
    );
    return {
      ok: result.exitCode === 0,
      output: [result.stdout, result.stderr].filter((s) => s.length > 0).join('\n'),
    };
  }
}
