import { mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import * as path from 'node:path';

import { DetectionMetricsSchema, compareTestTypes, summarizeCounts } from '@idslab/core';
import type { AttackMetrics, CountSummary, TestTypeComparison } from '@idslab/core';
import type { Logger } from 'pino';

import { ARTIFACT_FILES } from './artifact-collector.js';

const RULE = '='.repeat(40);
const SECTION_RULE = '='.repeat(50);

/** Words rendered in capitals when deriving a display name from a key. */
const ACRONYMS = new Set(['arp', 'ddos', 'dns', 'dos', 'ftp', 'http', 'https', 'icmp', 'ip', 'smb', 'sql', 'ssh', 'syn', 'tcp', 'udp', 'xss']);

/** `http_flood` → `HTTP Flood`. */
export function humanizeAttackKey(key: string): string {
  return key
    .split(/[_\s-]+/)
    .filter((word) => word.length > 0)
    .map((word) => (ACRONYMS.has(word.toLowerCase()) ? word.toUpperCase() : word.charAt(0).toUpperCase() + word.slice(1)))
    .join(' ');
}

function displayName(key: string, metrics: AttackMetrics): string {
  return metrics.attack_type && metrics.attack_type.length > 0 ? metrics.attack_type : humanizeAttackKey(key);
}

function formatValue(value: number | null | undefined, fallback: string): string {
  return value === null || value === undefined ? fallback : String(value);
}

/** One rendered attack line, indented. */
export function formatAttackLine(key: string, metrics: AttackMetrics): string {
  const name = displayName(key, metrics);
  if (!metrics.detected) {
    return `  ${name}: NOT DETECTED (${formatValue(metrics.packets_sent, '0')} packets sent)`;
  }
  const rate = metrics.detection_rate_percent;
  const rateText = rate === null || rate === undefined ? '?' : String(Math.floor(rate));
  return `  ${name}: ${formatValue(metrics.time_to_detect_seconds, '?')}s → ${formatValue(metrics.total_alerts, '0')} alerts (${rateText}% detection rate)`;
}

export interface IterationReport {
  iteration: number;
  lines: string[];
}

export interface TestTypeReport {
  testType: string;
  /** The test type's results directory exists. */
  present: boolean;
  iterations: IterationReport[];
  alertCounts: number[];
  summary: CountSummary | null;
}

export interface GeneratedReport {
  path: string;
  content: string;
  testTypes: TestTypeReport[];
  comparisons: TestTypeComparison[];
}

export interface ReportAggregatorOptions {
  resultsRoot: string;
  /** Report file name, relative to `resultsRoot`. */
  reportFile: string;
  /** Test types to report on, in output order. */
  testTypes: readonly string[];
  log: Logger;
}

async function iterationNumbers(dir: string): Promise<number[] | null> {
  let entries;
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch {
    return null;
  }
  return entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => /^iteration_(\d+)$/.exec(entry.name)?.[1])
    .filter((n): n is string => n !== undefined)
    .map((n) => Number.parseInt(n, 10))
    .sort((a, b) => a - b);
}

async function readOptional(file: string): Promise<string | null> {
  try {
    return await readFile(file, 'utf-8');
  } catch {
    return null;
  }
}

/**
 * Renders the cross-iteration comparison from the per-iteration artifacts
 * under the results root. Reading never modifies the inputs.
 */
export class ReportAggregator {
  constructor(private readonly opts: ReportAggregatorOptions) {}

  get reportPath(): string {
    return path.join(this.opts.resultsRoot, this.opts.reportFile);
  }

  async scan(): Promise<TestTypeReport[]> {
    const reports: TestTypeReport[] = [];
    for (const testType of this.opts.testTypes) {
      reports.push(await this.scanTestType(testType));
    }
    return reports;
  }

  /** Scan and render without writing anything. */
  async render(generatedAt: string): Promise<Omit<GeneratedReport, 'path'>> {
    const testTypes = await this.scan();
    const comparisons = this.compare(testTypes);
    return { content: renderReport(testTypes, comparisons, generatedAt), testTypes, comparisons };
  }

  /** Scan, render and write the report file. */
  async generate(generatedAt: string): Promise<GeneratedReport> {
    this.opts.log.info('Aggregating results from all iterations...');
    const rendered = await this.render(generatedAt);
    await mkdir(this.opts.resultsRoot, { recursive: true });
    await writeFile(this.reportPath, rendered.content);
    this.opts.log.info({ report: this.reportPath }, `Report generated: ${this.reportPath}`);
    return { path: this.reportPath, ...rendered };
  }

  private async scanTestType(testType: string): Promise<TestTypeReport> {
    const dir = path.join(this.opts.resultsRoot, testType);
    const numbers = await iterationNumbers(dir);
    const iterations: IterationReport[] = [];
    const alertCounts: number[] = [];

    for (const iteration of numbers ?? []) {
      const iterationDir = path.join(dir, `iteration_${iteration}`);
      iterations.push({ iteration, lines: await this.iterationLines(iterationDir) });

      const countText = await readOptional(path.join(iterationDir, ARTIFACT_FILES.alertCount));
      if (countText !== null) {
        const count = Number.parseInt(countText.trim(), 10);
        if (Number.isFinite(count)) alertCounts.push(count);
      }
    }

    return {
      testType,
      present: numbers !== null,
      iterations,
      alertCounts,
      summary: summarizeCounts(alertCounts),
    };
  }

  private async iterationLines(iterationDir: string): Promise<string[]> {
    const text = await readOptional(path.join(iterationDir, ARTIFACT_FILES.metrics));
    if (text === null) return ['  No metrics file found'];

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      return ['  ERROR: Could not parse metrics'];
    }
    const parsed = DetectionMetricsSchema.safeParse(raw);
    if (!parsed.success) {
      this.opts.log.warn({ dir: iterationDir, issues: parsed.error.issues.length }, 'Malformed detection metrics');
      return ['  ERROR: Could not parse metrics'];
    }

    const lines = Object.entries(parsed.data.attacks).map(([key, metrics]) => formatAttackLine(key, metrics));
    lines.push(`  → Total alerts: ${parsed.data.summary?.total_alerts ?? 0}`);
    return lines;
  }

  private compare(reports: TestTypeReport[]): TestTypeComparison[] {
    const comparisons: TestTypeComparison[] = [];
    for (let i = 0; i < reports.length; i++) {
      for (let j = i + 1; j < reports.length; j++) {
        const a = reports[i];
        const b = reports[j];
        if (!a || !b) continue;
        const comparison = compareTestTypes(a.testType, a.alertCounts, b.testType, b.alertCounts);
        if (comparison) comparisons.push(comparison);
      }
    }
    return comparisons;
  }
}

/** Render the full report text. Deterministic in its inputs. */
export function renderReport(
  reports: readonly TestTypeReport[],
  comparisons: readonly TestTypeComparison[],
  generatedAt: string,
): string {
  const out: string[] = [
    RULE,
    'IDS DETECTION EFFECTIVENESS COMPARISON',
    RULE,
    `Generated: ${generatedAt}`,
    '',
    `Test types: ${reports.map((r) => r.testType).join(', ')}`,
    '',
    RULE,
    'TIME-TO-DETECTION COMPARISON',
    RULE,
    '',
  ];

  for (const report of reports) {
    out.push('', `${report.testType.toUpperCase()} NETWORK:`, SECTION_RULE, '');
    for (const iteration of report.iterations) {
      out.push(`Iteration ${iteration.iteration}:`, ...iteration.lines, '');
    }
  }

  out.push('', RULE, 'STATISTICAL SUMMARY', RULE, '');
  for (const report of reports) {
    if (!report.present) continue;
    out.push(`${report.testType.toUpperCase()}:`);
    if (report.summary) {
      out.push(
        `  Iterations: ${report.summary.n}`,
        `  Mean alerts: ${report.summary.mean}`,
        `  Range: ${report.summary.min} - ${report.summary.max}`,
        `  Median alerts: ${report.summary.median}`,
        `  Std deviation: ${report.summary.stddev.toFixed(2)}`,
        '',
      );
    }
  }

  if (comparisons.length > 0) {
    out.push('', RULE, 'STATISTICAL COMPARISON', RULE, '');
    for (const c of comparisons) {
      out.push(
        `${c.testTypeA.toUpperCase()} vs ${c.testTypeB.toUpperCase()}:`,
        `  Mean difference: ${c.difference.toFixed(2)}`,
        `  p-value: ${c.pValue.toFixed(4)}`,
        `  Significant: ${c.significant ? 'yes' : 'no'}`,
        `  Effect size (Cohen's d): ${c.effectSize.toFixed(2)}`,
        `  Higher alert count: ${c.winner}`,
        '',
      );
    }
  }

  return out.join('\n');
}
