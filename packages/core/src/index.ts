// Zod schemas
export {
  AttackMetricsSchema,
  AttackSchema,
  ControllerSchema,
  DEFAULT_TEST_TYPES,
  DetectionMetricsSchema,
  DetectorArtifactSchema,
  DetectorSchema,
  DurationSchema,
  ExperimentConfigSchema,
  GroundTruthAttackSchema,
  GroundTruthSchema,
  MatrixEntrySchema,
  MetricsSchema,
  NetworkSchema,
  NO_CONTROLLER,
  PathsSchema,
  SessionsSchema,
  TestTypeEntrySchema,
  TestTypeRegistrySchema,
  TimeoutsSchema,
} from './schemas.js';

// Inferred and hand-written types
export { COMPONENT_NAMES } from './types.js';
export type {
  AttackMetrics,
  AttackSettings,
  ComponentName,
  ControllerSettings,
  DetectionMetrics,
  DetectorArtifact,
  DetectorSettings,
  ExperimentConfig,
  ExperimentConfigInput,
  ExperimentCounters,
  GroundTruth,
  IterationContext,
  IterationState,
  MatrixEntry,
  MetricsSettings,
  NetworkSettings,
  Paths,
  Sessions,
  TestConfiguration,
  TestTypeEntry,
  Timeouts,
} from './types.js';

// Configuration
export {
  componentLogPaths,
  createIterationContext,
  getTestConfiguration,
  iterationDirectory,
  loadConfig,
  parseConfig,
  totalIterations,
  withIterationOverrides,
} from './config.js';
export type { FrozenConfig } from './config.js';

// Durations
export { formatDuration, parseDuration } from './duration.js';

// Errors
export {
  AbortedError,
  ArtifactError,
  ConfigError,
  IdsLabError,
  MetricsError,
  PrivilegeError,
  ProcessStartError,
  ReadinessTimeoutError,
  toError,
} from './errors.js';

// Privilege
export { assertPrivileged, invokingUser } from './privilege.js';
export type { UidSource } from './privilege.js';

// Logging
export { createLogger, createRunLogs, createSilentRunLogs, logger } from './logger.js';
export type { RunLogs, RunLogsOptions } from './logger.js';

// Telemetry
export { getMeter, getTracer, initTelemetry, shutdownTelemetry, withSpan } from './telemetry.js';

// Statistics
export { compareTestTypes, summarizeCounts } from './analysis.js';
export type { CountSummary, TestTypeComparison } from './analysis.js';
