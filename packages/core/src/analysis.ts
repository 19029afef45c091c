import {
  max,
  median,
  min,
  mean,
  standardDeviation,
  sum,
  tTestTwoSample,
} from 'simple-statistics';

/** Descriptive statistics over one test type's per-iteration alert counts. */
export interface CountSummary {
  n: number;
  /** Integer mean: floor(sum / n). */
  mean: number;
  min: number;
  max: number;
  median: number;
  stddev: number;
}

/** Pairwise comparison of two test types' alert counts. */
export interface TestTypeComparison {
  testTypeA: string;
  testTypeB: string;
  /** mean(A) - mean(B), unrounded. */
  difference: number;
  pValue: number;
  significant: boolean;
  effectSize: number;
  /** The test type with more alerts when the difference is significant. */
  winner: string | 'tie';
}

/**
 * Summarize per-iteration alert counts. Returns null for an empty sample.
 */
export function summarizeCounts(values: readonly number[]): CountSummary | null {
  if (values.length === 0) return null;
  const data = [...values];
  return {
    n: data.length,
    mean: Math.floor(sum(data) / data.length),
    min: min(data),
    max: max(data),
    median: median(data),
    stddev: data.length < 2 ? 0 : standardDeviation(data),
  };
}

/**
 * Compute Cohen's d effect size between two samples.
 * Uses pooled standard deviation.
 */
function cohensD(a: number[], b: number[]): number {
  const nA = a.length;
  const nB = b.length;
  if (nA < 2 && nB < 2) return 0;
  const sdA = standardDeviation(a);
  const sdB = standardDeviation(b);
  const pooledVar = ((nA - 1) * sdA * sdA + (nB - 1) * sdB * sdB) / (nA + nB - 2);
  const pooledSD = Math.sqrt(pooledVar);
  if (pooledSD === 0) return 0;
  return (mean(a) - mean(b)) / pooledSD;
}

/**
 * Convert a t-statistic to an approximate two-tailed p-value.
 * Normal approximation; reasonable once each side has a handful of trials.
 */
function tStatToPValue(tStat: number): number {
  const z = Math.abs(tStat);
  // Abramowitz and Stegun approximation for normal CDF
  const a1 = 0.254829592;
  const a2 = -0.284496736;
  const a3 = 1.421413741;
  const a4 = -1.453152027;
  const a5 = 1.061405429;
  const p = 0.3275911;
  const t = 1.0 / (1.0 + p * z);
  const t2 = t * t;
  const t3 = t2 * t;
  const t4 = t3 * t;
  const t5 = t4 * t;
  const cdf = 1.0 - (a1 * t + a2 * t2 + a3 * t3 + a4 * t4 + a5 * t5) * Math.exp(-z * z / 2);
  return 2 * (1 - cdf);
}

/**
 * Compare two test types' alert counts with a two-sample t-test.
 * Both samples need at least two values; otherwise null.
 */
export function compareTestTypes(
  nameA: string,
  valuesA: readonly number[],
  nameB: string,
  valuesB: readonly number[],
): TestTypeComparison | null {
  if (valuesA.length < 2 || valuesB.length < 2) return null;
  const a = [...valuesA];
  const b = [...valuesB];

  const tStat = tTestTwoSample(a, b);
  const pValue = tStat !== null && Number.isFinite(tStat) ? tStatToPValue(tStat) : 1;
  const significant = pValue < 0.05;
  const difference = mean(a) - mean(b);

  let winner: string | 'tie' = 'tie';
  if (significant) {
    winner = difference > 0 ? nameA : nameB;
  }

  return {
    testTypeA: nameA,
    testTypeB: nameB,
    difference,
    pValue,
    significant,
    effectSize: Math.abs(cohensD(a, b)),
    winner,
  };
}
