import { describe, expect, it } from 'vitest';

import {
  DetectionMetricsSchema,
  DurationSchema,
  GroundTruthSchema,
  TestTypeEntrySchema,
} from '../schemas.js';

describe('DurationSchema', () => {
  it('passes millisecond integers through', () => {
    expect(DurationSchema.parse(1500)).toBe(1500);
  });

  it('parses duration strings', () => {
    expect(DurationSchema.parse('45s')).toBe(45_000);
  });

  it('rejects fractional milliseconds', () => {
    expect(DurationSchema.safeParse(1.5).success).toBe(false);
  });
});

describe('TestTypeEntrySchema', () => {
  it('defaults the controller to none', () => {
    expect(TestTypeEntrySchema.parse({ topology: 'flat.py', interface: 's1-eth1' })).toEqual({
      topology: 'flat.py',
      interface: 's1-eth1',
      controller: 'none',
    });
  });

  it('requires a monitored interface', () => {
    expect(TestTypeEntrySchema.safeParse({ topology: 'flat.py' }).success).toBe(false);
  });
});

describe('GroundTruthSchema', () => {
  it('keeps unknown fields', () => {
    const parsed = GroundTruthSchema.parse({
      start_time: 1700000000,
      end_time: 1700000300,
      target: '10.0.0.100',
      attacks: { http_flood: { attack_type: 'HTTP Flood', requests_sent: 500, duration: 12.5 } },
      totals: { total_packets_sent: 500, total_duration: 300 },
    });
    expect(parsed['target']).toBe('10.0.0.100');
    expect(parsed.attacks['http_flood']?.['duration']).toBe(12.5);
    expect(parsed.totals?.total_packets_sent).toBe(500);
  });

  it('defaults attacks to an empty mapping', () => {
    expect(GroundTruthSchema.parse({}).attacks).toEqual({});
  });
});

describe('DetectionMetricsSchema', () => {
  it('accepts undetected attacks with null timings', () => {
    const parsed = DetectionMetricsSchema.parse({
      attacks: {
        syn_flood: {
          attack_type: 'SYN Flood',
          detected: false,
          packets_sent: 100000,
          time_to_detect_seconds: null,
          detection_rate_percent: 0,
          total_alerts: 0,
        },
      },
      summary: { total_alerts: 0 },
    });
    expect(parsed.attacks['syn_flood']?.detected).toBe(false);
  });

  it('accepts detection rates above 100 percent', () => {
    const parsed = DetectionMetricsSchema.parse({
      attacks: { port_scan: { detected: true, total_alerts: 10148, packets_sent: 1000, detection_rate_percent: 1014.8 } },
    });
    expect(parsed.attacks['port_scan']?.detection_rate_percent).toBe(1014.8);
  });

  it('requires the attacks mapping', () => {
    expect(DetectionMetricsSchema.safeParse({ summary: {} }).success).toBe(false);
  });
});
