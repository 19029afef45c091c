// Collaborator interfaces
export type {
  Clock,
  CommandExecutor,
  ExecOptions,
  ExecResult,
  IterationOutcome,
  MetricsComputer,
  MetricsRequest,
  MetricsResult,
  SessionBackend,
  StepResult,
} from './types.js';

// Process plumbing
export { createCommandExecutor } from './executor.js';
export { systemClock } from './clock.js';
export { createTmuxBackend, shellQuote } from './tmux-backend.js';
export type { TmuxBackendOptions } from './tmux-backend.js';
export { ProcessSupervisor } from './process-supervisor.js';
export type { ProcessHandle, ProcessSupervisorOptions } from './process-supervisor.js';

// Readiness
export { awaitReady } from './readiness-probe.js';
export type { AwaitReadyOptions, Predicate, ReadinessOutcome } from './readiness-probe.js';
export {
  allOf,
  anyOf,
  fileExists,
  interfaceExists,
  newGroundTruthComplete,
  portListening,
  processRunning,
  sessionAlive,
  sessionOutputContains,
} from './predicates.js';

// Artifacts
export { GroundTruthLocator } from './ground-truth.js';
export type { GroundTruthFile, GroundTruthLocatorOptions, GroundTruthTotals } from './ground-truth.js';
export { LogFollower } from './log-follower.js';
export { ExternalMetricsComputer } from './metrics-computer.js';
export type { ExternalMetricsComputerOptions } from './metrics-computer.js';
export { ARTIFACT_FILES, ArtifactCollector, countLines, renderSummary } from './artifact-collector.js';
export type { ArtifactCollectorOptions, CollectionResult } from './artifact-collector.js';

// Orchestration
export { IterationRunner } from './iteration-runner.js';
export type { IterationRunnerOptions } from './iteration-runner.js';
export { ExperimentDriver, planTrials, successRate } from './experiment-driver.js';
export type {
  ExperimentDriverOptions,
  ExperimentResult,
  PlannedTrial,
  TrialRunner,
} from './experiment-driver.js';
export { createOrchestrator, resolveSessionUser } from './orchestrator.js';
export type { Orchestrator, OrchestratorOptions } from './orchestrator.js';

// Reporting
export { ReportAggregator, formatAttackLine, humanizeAttackKey, renderReport } from './report-aggregator.js';
export type {
  GeneratedReport,
  IterationReport,
  ReportAggregatorOptions,
  TestTypeReport,
} from './report-aggregator.js';
