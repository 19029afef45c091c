import type { z } from 'zod';

import type {
  AttackMetricsSchema,
  AttackSchema,
  ControllerSchema,
  DetectionMetricsSchema,
  DetectorArtifactSchema,
  DetectorSchema,
  ExperimentConfigSchema,
  GroundTruthSchema,
  MatrixEntrySchema,
  MetricsSchema,
  NetworkSchema,
  PathsSchema,
  SessionsSchema,
  TestTypeEntrySchema,
  TimeoutsSchema,
} from './schemas.js';

export type TestTypeEntry = z.infer<typeof TestTypeEntrySchema>;
export type MatrixEntry = z.infer<typeof MatrixEntrySchema>;
export type Paths = z.infer<typeof PathsSchema>;
export type Timeouts = z.infer<typeof TimeoutsSchema>;
export type Sessions = z.infer<typeof SessionsSchema>;
export type ControllerSettings = z.infer<typeof ControllerSchema>;
export type NetworkSettings = z.infer<typeof NetworkSchema>;
export type DetectorArtifact = z.infer<typeof DetectorArtifactSchema>;
export type DetectorSettings = z.infer<typeof DetectorSchema>;
export type AttackSettings = z.infer<typeof AttackSchema>;
export type MetricsSettings = z.infer<typeof MetricsSchema>;
export type ExperimentConfigInput = z.input<typeof ExperimentConfigSchema>;
export type ExperimentConfig = z.infer<typeof ExperimentConfigSchema>;
export type GroundTruth = z.infer<typeof GroundTruthSchema>;
export type AttackMetrics = z.infer<typeof AttackMetricsSchema>;
export type DetectionMetrics = z.infer<typeof DetectionMetricsSchema>;

/** Logical names of the supervised external processes. */
export type ComponentName = 'network' | 'controller' | 'detector' | 'attack';

export const COMPONENT_NAMES: readonly ComponentName[] = ['network', 'controller', 'detector', 'attack'];

/** One test type from the registry, resolved by name. Never mutated after load. */
export interface TestConfiguration {
  readonly name: string;
  readonly topology: string;
  readonly interface: string;
  /** Controller start script, or `NO_CONTROLLER`. */
  readonly controller: string;
}

/** Coordinates of one trial; owns no external resources. */
export interface IterationContext {
  readonly testType: string;
  readonly iteration: number;
  readonly resultsDirectory: string;
  readonly componentLogs: Readonly<Record<ComponentName, string>>;
}

/** States of a single trial, in execution order. */
export type IterationState =
  | 'CLEAN'
  | 'CONTROLLER'
  | 'NETWORK'
  | 'DETECTOR'
  | 'ATTACK'
  | 'METRICS'
  | 'TEARDOWN'
  | 'COOLDOWN';

/** Process-wide trial counters for one driver run. */
export interface ExperimentCounters {
  completed: number;
  failed: number;
  total: number;
}
