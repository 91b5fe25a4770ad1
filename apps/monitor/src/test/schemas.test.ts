/**
 * Shared schema tests
 */

import { describe, it, expect } from 'vitest';
import {
  checkIntervalSchema,
  configFileSchema,
  monitorConfigSchema,
  type MonitorConfigInput,
} from '@zurgmon/shared';

const VALID: MonitorConfigInput = {
  zurgUrl: 'http://localhost:9999',
  username: '',
  password: '',
  checkIntervalMinutes: 30,
  logFile: '/var/log/zurg-monitor.log',
  rateLimitRequests: 10,
  rateLimitDelaySeconds: 0.5,
  rateLimitBackoffSeconds: 5,
  verbose: false,
  debug: false,
  trace: false,
  dryRun: false,
};

describe('checkIntervalSchema', () => {
  it('should accept whole minutes from 1', () => {
    expect(checkIntervalSchema.safeParse(1).success).toBe(true);
    expect(checkIntervalSchema.safeParse(1440).success).toBe(true);
  });

  it('should reject zero, negative and fractional intervals', () => {
    expect(checkIntervalSchema.safeParse(0).success).toBe(false);
    expect(checkIntervalSchema.safeParse(-5).success).toBe(false);
    expect(checkIntervalSchema.safeParse(2.5).success).toBe(false);
  });
});

describe('configFileSchema', () => {
  it('should accept a partial zurg section', () => {
    const result = configFileSchema.safeParse({ zurg: { check_interval: 10 } });

    expect(result.success).toBe(true);
    expect(result.data).toEqual({ zurg: { check_interval: 10 } });
  });

  it('should accept a file without a zurg section', () => {
    expect(configFileSchema.safeParse({}).success).toBe(true);
  });

  it('should reject wrongly typed values', () => {
    expect(configFileSchema.safeParse({ zurg: { rate_limit: 'ten' } }).success).toBe(false);
    expect(configFileSchema.safeParse({ zurg: { rate_limit: 0 } }).success).toBe(false);
    expect(configFileSchema.safeParse({ zurg: { verbose: 'maybe' } }).success).toBe(false);
  });

  it('should convert INI strings to numbers and booleans', () => {
    const result = configFileSchema.safeParse({
      zurg: { check_interval: '15', rate_limit_delay: '0.25', verbose: 'Yes' },
    });

    expect(result.data).toEqual({ zurg: { check_interval: 15, rate_limit_delay: 0.25, verbose: true } });
  });
});

describe('monitorConfigSchema', () => {
  it('should accept a complete configuration', () => {
    expect(monitorConfigSchema.parse(VALID)).toEqual(VALID);
  });

  it('should turn on debug when trace is set', () => {
    expect(monitorConfigSchema.parse({ ...VALID, trace: true })).toMatchObject({ trace: true, debug: true });
  });

  it('should reject an invalid URL', () => {
    expect(monitorConfigSchema.safeParse({ ...VALID, zurgUrl: 'localhost' }).success).toBe(false);
  });

  it('should reject a negative delay', () => {
    expect(monitorConfigSchema.safeParse({ ...VALID, rateLimitDelaySeconds: -1 }).success).toBe(false);
  });
});
