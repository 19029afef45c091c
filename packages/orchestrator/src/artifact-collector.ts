import { copyFile, mkdir, readFile, writeFile } from 'node:fs/promises';
import * as path from 'node:path';

import { ArtifactError, COMPONENT_NAMES, MetricsError, toError } from '@idslab/core';
import type { FrozenConfig, IterationContext } from '@idslab/core';
import type { Logger } from 'pino';

import type { Clock, MetricsComputer } from './types.js';

/** File names written into every iteration's results directory. */
export const ARTIFACT_FILES = {
  groundTruth: 'attack_ground_truth.json',
  alertCount: 'alert_count.txt',
  metrics: 'detection_metrics.json',
  summary: 'summary.txt',
  logsDir: 'logs',
} as const;

export interface CollectionResult {
  alertCount: number;
  copied: string[];
  missing: string[];
  metricsPath: string;
  summaryPath: string;
}

export interface ArtifactCollectorOptions {
  config: FrozenConfig;
  metrics: MetricsComputer;
  clock: Clock;
  log: Logger;
}

/** Number of newline characters, as `wc -l` counts them. */
export function countLines(content: string): number {
  let count = 0;
  for (const ch of content) {
    if (ch === '\n') count++;
  }
  return count;
}

async function tryCopy(source: string, dest: string): Promise<boolean> {
  try {
    await copyFile(source, dest);
    return true;
  } catch {
    return false;
  }
}

export function renderSummary(ctx: IterationContext, alertCount: number, date: Date): string {
  return [
    '========================================',
    'Test Iteration Summary',
    '========================================',
    '',
    `Test Type: ${ctx.testType}`,
    `Iteration: ${ctx.iteration}`,
    `Date: ${date.toISOString()}`,
    '',
    'Results:',
    '--------',
    `Total Alerts: ${alertCount}`,
    '',
    `See ${ARTIFACT_FILES.metrics} for detailed analysis including:`,
    '- Time to first detection per attack type',
    '- Alert counts per attack type',
    '- Detection rates vs ground truth',
    '',
    'Raw logs:',
    '- suricata_fast.log: Simple alert format',
    '- suricata_eve.json: Detailed JSON events',
    `- ${ARTIFACT_FILES.groundTruth}: Exact packets sent`,
    '',
  ].join('\n');
}

/**
 * Moves one iteration's raw artifacts into its results directory and runs
 * the metrics collaborator over them.
 */
export class ArtifactCollector {
  private readonly config: FrozenConfig;
  private readonly metrics: MetricsComputer;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(opts: ArtifactCollectorOptions) {
    this.config = opts.config;
    this.metrics = opts.metrics;
    this.clock = opts.clock;
    this.log = opts.log;
  }

  /**
   * Copy detector logs and ground truth, count alerts, compute metrics and
   * write the summary. Missing detector files are warnings; missing ground
   * truth or a failed metrics run throws.
   */
  async collect(ctx: IterationContext, groundTruthPath: string | null): Promise<CollectionResult> {
    const dir = ctx.resultsDirectory;
    await mkdir(dir, { recursive: true });
    this.log.info({ dir }, `Results directory: ${dir}`);

    if (!groundTruthPath) {
      throw new ArtifactError('No ground truth file found');
    }
    const groundTruthCopy = path.join(dir, ARTIFACT_FILES.groundTruth);
    if (!(await tryCopy(groundTruthPath, groundTruthCopy))) {
      throw new ArtifactError(`Ground truth file doesn't exist: ${groundTruthPath}`);
    }

    const copied: string[] = [ARTIFACT_FILES.groundTruth];
    const missing: string[] = [];
    const { detectorLogDir } = this.config.paths;
    for (const artifact of this.config.detector.artifacts) {
      if (await tryCopy(path.join(detectorLogDir, artifact.source), path.join(dir, artifact.dest))) {
        copied.push(artifact.dest);
      } else {
        missing.push(artifact.source);
        this.log.warn({ file: artifact.source }, `Warning: ${artifact.source} not found`);
      }
    }

    const alertCount = await this.countAlerts(dir);
    await writeFile(path.join(dir, ARTIFACT_FILES.alertCount), `${alertCount}\n`);
    this.log.info({ alertCount }, `Total alerts detected: ${alertCount}`);

    const metricsPath = path.join(dir, ARTIFACT_FILES.metrics);
    const result = await this.metrics.compute({
      groundTruthPath,
      eventLogPath: path.join(dir, this.copiedName(this.config.detector.eventLog)),
      outputPath: metricsPath,
      testType: ctx.testType,
      iteration: ctx.iteration,
    });
    if (result.output) {
      this.log.debug({ output: result.output }, 'Metrics collaborator output');
    }
    if (!result.ok) {
      throw new MetricsError(`Metrics analysis failed for ${ctx.testType} iteration ${ctx.iteration}`);
    }
    this.log.info('Metrics analysis complete');

    const summaryPath = path.join(dir, ARTIFACT_FILES.summary);
    await writeFile(summaryPath, renderSummary(ctx, alertCount, new Date(this.clock.now())));

    return { alertCount, copied, missing, metricsPath, summaryPath };
  }

  /**
   * Copy the component logs into `<results>/logs/` so a failed iteration
   * keeps the output that explains it. Missing files are skipped.
   */
  async preserveLogs(ctx: IterationContext): Promise<string[]> {
    const target = path.join(ctx.resultsDirectory, ARTIFACT_FILES.logsDir);
    const preserved: string[] = [];
    try {
      await mkdir(target, { recursive: true });
    } catch (err) {
      this.log.warn({ err: toError(err).message }, 'Could not create log preservation directory');
      return preserved;
    }
    for (const name of COMPONENT_NAMES) {
      const source = ctx.componentLogs[name];
      if (await tryCopy(source, path.join(target, path.basename(source)))) {
        preserved.push(name);
      }
    }
    return preserved;
  }

  /** Destination name of a detector log inside the results directory. */
  private copiedName(source: string): string {
    return this.config.detector.artifacts.find((a) => a.source === source)?.dest ?? source;
  }

  private async countAlerts(dir: string): Promise<number> {
    try {
      const content = await readFile(path.join(dir, this.copiedName(this.config.detector.alertLog)), 'utf-8');
      return countLines(content);
    } catch {
      return 0;
    }
  }
}
