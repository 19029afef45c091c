import { readFile } from 'node:fs/promises';
import * as path from 'node:path';

import { ZodError } from 'zod';

import { ConfigError } from './errors.js';
import { ExperimentConfigSchema } from './schemas.js';
import type {
  ComponentName,
  ExperimentConfig,
  IterationContext,
  MatrixEntry,
  TestConfiguration,
} from './types.js';

type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

/** The configuration as passed around at run time: validated and frozen. */
export type FrozenConfig = DeepReadonly<ExperimentConfig>;

function deepFreeze<T>(value: T): DeepReadonly<T>;
function deepFreeze(value: unknown): unknown {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

function describeIssues(err: ZodError): string {
  return err.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate a raw configuration object. Missing fields take their defaults,
 * so `{}` yields the stock two-test-type study.
 *
 * @throws ConfigError when validation fails
 */
export function parseConfig(raw: unknown): FrozenConfig {
  const result = ExperimentConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${describeIssues(result.error)}`, 'CONFIG_INVALID', {
      cause: result.error,
    });
  }
  return deepFreeze(result.data);
}

/**
 * Read and validate a JSON configuration file. Without a path the built-in
 * defaults are returned.
 */
export async function loadConfig(file?: string): Promise<FrozenConfig> {
  if (!file) return parseConfig({});

  let text: string;
  try {
    text = await readFile(file, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read configuration file ${file}`, 'CONFIG_UNREADABLE', { cause: err });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Configuration file ${file} is not valid JSON`, 'CONFIG_INVALID', { cause: err });
  }
  return parseConfig(raw);
}

/**
 * Apply `type=count` iteration overrides to the matrix, returning a new
 * frozen configuration. Unknown test types are rejected.
 */
export function withIterationOverrides(config: FrozenConfig, overrides: Record<string, number>): FrozenConfig {
  for (const name of Object.keys(overrides)) {
    if (!(name in config.testTypes)) {
      throw new ConfigError(`Unknown test type "${name}" in iteration override`);
    }
  }
  const matrix: MatrixEntry[] = config.matrix.map((entry) => ({
    testType: entry.testType,
    iterations: overrides[entry.testType] ?? entry.iterations,
  }));
  for (const [testType, iterations] of Object.entries(overrides)) {
    if (!matrix.some((entry) => entry.testType === testType)) {
      matrix.push({ testType, iterations });
    }
  }
  return parseConfig({ ...structuredClone(config), matrix });
}

/** Look up a test type in the registry. */
export function getTestConfiguration(config: FrozenConfig, name: string): TestConfiguration {
  const entry = config.testTypes[name];
  if (!entry) {
    throw new ConfigError(`Unknown test type "${name}"`);
  }
  return Object.freeze({
    name,
    topology: entry.topology,
    interface: entry.interface,
    controller: entry.controller,
  });
}

/** Total number of trials the matrix will run. */
export function totalIterations(config: FrozenConfig): number {
  return config.matrix.reduce((sum, entry) => sum + entry.iterations, 0);
}

/** Per-component log file locations under the configured log root. */
export function componentLogPaths(config: FrozenConfig): Record<ComponentName, string> {
  const { logDir } = config.paths;
  return {
    network: path.join(logDir, 'network.log'),
    controller: path.join(logDir, 'controller.log'),
    detector: path.join(logDir, 'detector.log'),
    attack: path.join(logDir, 'attack.log'),
  };
}

/** Directory holding one iteration's artifacts: `<resultsRoot>/<testType>/iteration_<n>`. */
export function iterationDirectory(resultsRoot: string, testType: string, iteration: number): string {
  return path.join(resultsRoot, testType, `iteration_${iteration}`);
}

/** Build the naming coordinate for one trial. */
export function createIterationContext(
  config: FrozenConfig,
  testType: string,
  iteration: number,
): IterationContext {
  return Object.freeze({
    testType,
    iteration,
    resultsDirectory: iterationDirectory(config.paths.resultsRoot, testType, iteration),
    componentLogs: Object.freeze(componentLogPaths(config)),
  });
}
