import { z } from 'zod';

import { parseDuration } from './duration.js';

// --- Shared primitives ---

/** A duration given either as milliseconds or as a string like "30s" / "10m". */
export const DurationSchema = z.union([
  z.number().int().nonnegative(),
  z.string().transform((value, ctx) => {
    try {
      return parseDuration(value);
    } catch (err) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: err instanceof Error ? err.message : String(err),
      });
      return z.NEVER;
    }
  }),
]);

/** Sentinel used by test types that run without an SDN controller. */
export const NO_CONTROLLER = 'none';

// --- Test types ---

export const TestTypeEntrySchema = z.object({
  topology: z.string().min(1),
  interface: z.string().min(1),
  controller: z.string().min(1).default(NO_CONTROLLER),
});

export const TestTypeRegistrySchema = z.record(z.string().min(1), TestTypeEntrySchema);

export const MatrixEntrySchema = z.object({
  testType: z.string().min(1),
  iterations: z.number().int().nonnegative(),
});

// --- Paths ---

export const PathsSchema = z.object({
  resultsRoot: z.string().min(1).default('/home/mininet/test_results'),
  sharedDir: z.string().min(1).default('/media/sf_shared'),
  detectorLogDir: z.string().min(1).default('/home/mininet/suricata_logs'),
  logDir: z.string().min(1).default('/tmp/auto_test_logs'),
  runLog: z.string().min(1).default('/tmp/auto_test_runner.log'),
  scratchDir: z.string().min(1).default('/tmp'),
  groundTruthPrefix: z.string().min(1).default('controlled_attack_stats_'),
  pointerFile: z.string().min(1).default('/tmp/last_attack_stats.txt'),
  attackOutputFile: z.string().min(1).default('/tmp/attack_output.txt'),
  reportFile: z.string().min(1).default('FINAL_DETECTION_COMPARISON.txt'),
});

// --- Timeouts, poll intervals and settle delays ---

export const TimeoutsSchema = z.object({
  controllerReady: DurationSchema.default('30s'),
  networkStartup: DurationSchema.default('8s'),
  networkReady: DurationSchema.default('45s'),
  networkStabilize: DurationSchema.default('2s'),
  connectivityWarmup: DurationSchema.default('8s'),
  auxServiceReady: DurationSchema.default('5s'),
  detectorReady: DurationSchema.default('30s'),
  attackAccept: DurationSchema.default('3s'),
  attackComplete: DurationSchema.default('10m'),
  attackProgress: DurationSchema.default('30s'),
  detectorSettle: DurationSchema.default('10s'),
  gracefulExit: DurationSchema.default('2s'),
  cleanupGrace: DurationSchema.default('3s'),
  cooldown: DurationSchema.default('10s'),
  fastPoll: DurationSchema.default('1s'),
  attackPoll: DurationSchema.default('5s'),
  followInterval: DurationSchema.default('500ms'),
  commandTimeout: DurationSchema.default('30s'),
  metricsCompute: DurationSchema.default('5m'),
});

// --- Supervised sessions ---

export const SessionsSchema = z.object({
  network: z.string().min(1).default('mininet_test'),
  controller: z.string().min(1).default('controller_test'),
  detector: z.string().min(1).default('suricata_test'),
});

export const ControllerSchema = z.object({
  port: z.number().int().min(1).max(65_535).default(6633),
});

export const NetworkSchema = z.object({
  /** Typed into the session user's pane; the emulator itself needs root. */
  command: z.string().min(1).default('sudo python3'),
  promptMarker: z.string().min(1).default('mininet>'),
  victimHost: z.string().min(1).default('victim'),
  httpPort: z.number().int().min(1).max(65_535).default(8080),
  cleanupCommand: z.array(z.string().min(1)).min(1).default(['mn', '-c']),
});

export const DetectorArtifactSchema = z.object({
  source: z.string().min(1),
  dest: z.string().min(1),
});

export const DetectorSchema = z.object({
  script: z.string().min(1).default('run_suricata_custom_only.sh'),
  processPattern: z.string().min(1).default('suricata'),
  alertLog: z.string().min(1).default('fast.log'),
  eventLog: z.string().min(1).default('eve.json'),
  artifacts: z.array(DetectorArtifactSchema).default([
    { source: 'fast.log', dest: 'suricata_fast.log' },
    { source: 'eve.json', dest: 'suricata_eve.json' },
    { source: 'stats.log', dest: 'suricata_stats.log' },
  ]),
});

export const AttackSchema = z.object({
  command: z.string().min(1).default('python3'),
  attackerHost: z.string().min(1).default('web1'),
  target: z.string().min(1).default('10.0.0.100'),
  script: z.string().min(1).default('controlled_attack_generator.py'),
  completionMarker: z.string().min(1).default('ATTACK SUITE COMPLETED'),
  endMarkerField: z.string().min(1).default('end_time'),
  acceptCheckLines: z.number().int().positive().default(20),
});

export const MetricsSchema = z.object({
  command: z.string().min(1).default('python3'),
  args: z.array(z.string()).default(['collect_detection_metrics.py']),
});

// --- Full experiment configuration ---

export const DEFAULT_TEST_TYPES = {
  traditional: {
    topology: 'three_tier_traditional_simple.py',
    interface: 's3-eth3',
    controller: NO_CONTROLLER,
  },
  proactive_sdn: {
    topology: 'three_tier_sdn.py',
    interface: 's3-eth3',
    controller: 'start_pox_threetier_proactive.sh',
  },
};

export const ExperimentConfigSchema = z
  .object({
    testTypes: TestTypeRegistrySchema.default(DEFAULT_TEST_TYPES),
    matrix: z.array(MatrixEntrySchema).default([
      { testType: 'traditional', iterations: 0 },
      { testType: 'proactive_sdn', iterations: 10 },
    ]),
    paths: PathsSchema.default({}),
    timeouts: TimeoutsSchema.default({}),
    sessions: SessionsSchema.default({}),
    controller: ControllerSchema.default({}),
    network: NetworkSchema.default({}),
    detector: DetectorSchema.default({}),
    attack: AttackSchema.default({}),
    metrics: MetricsSchema.default({}),
    danglingPatterns: z.array(z.string().min(1)).default(['pox.py', 'suricata']),
    sessionUser: z.string().min(1).optional(),
  })
  .superRefine((config, ctx) => {
    config.matrix.forEach((entry, index) => {
      if (!(entry.testType in config.testTypes)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['matrix', index, 'testType'],
          message: `Unknown test type "${entry.testType}"`,
        });
      }
    });
  });

// --- External documents (read, never originated) ---

export const GroundTruthAttackSchema = z
  .object({
    attack_type: z.string().optional(),
    packets_sent: z.number().optional(),
    requests_sent: z.number().optional(),
  })
  .passthrough();

export const GroundTruthSchema = z
  .object({
    start_time: z.number().optional(),
    end_time: z.number().optional(),
    attacks: z.record(z.string(), GroundTruthAttackSchema).default({}),
    totals: z
      .object({
        total_packets_sent: z.number().optional(),
        total_duration: z.number().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export const AttackMetricsSchema = z
  .object({
    attack_type: z.string().optional(),
    detected: z.boolean(),
    time_to_detect_seconds: z.number().nullable().optional(),
    total_alerts: z.number().optional(),
    packets_sent: z.number().optional(),
    detection_rate_percent: z.number().nullable().optional(),
  })
  .passthrough();

export const DetectionMetricsSchema = z
  .object({
    attacks: z.record(z.string(), AttackMetricsSchema),
    summary: z
      .object({
        total_alerts: z.number().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();
