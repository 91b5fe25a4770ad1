/**
 * Zod validation schemas for monitor configuration
 */

import { z } from 'zod';

// Common schemas
export const checkIntervalSchema = z
  .number()
  .int('Check interval must be a whole number of minutes')
  .min(1, 'Check interval must be at least 1 minute');

const BOOLEAN_WORDS: Record<string, boolean> = {
  true: true,
  yes: true,
  on: true,
  '1': true,
  false: false,
  no: false,
  off: false,
  '0': false,
};

// INI values arrive as strings; YAML values are already typed
const fileBoolean = z.preprocess(
  (value) => (typeof value === 'string' ? (BOOLEAN_WORDS[value.trim().toLowerCase()] ?? value) : value),
  z.boolean()
);

// Config file schema: `zurg` section of zurg-monitor.conf (INI) or zurg-monitor.yml,
// keys as written in the file
export const configFileSectionSchema = z
  .object({
    zurg_url: z.url(),
    username: z.string(),
    password: z.string(),
    check_interval: z.coerce.number().int(),
    log_file: z.string().min(1),
    rate_limit: z.coerce.number().int().positive(),
    rate_limit_delay: z.coerce.number().nonnegative(),
    rate_limit_backoff: z.coerce.number().nonnegative(),
    verbose: fileBoolean,
  })
  .partial();

export const configFileSchema = z.object({
  zurg: configFileSectionSchema.nullish(),
});

// Resolved runtime configuration (defaults + file + CLI merged)
export const monitorConfigSchema = z
  .object({
    zurgUrl: z.url(),
    username: z.string(),
    password: z.string(),
    checkIntervalMinutes: checkIntervalSchema,
    logFile: z.string().min(1),
    rateLimitRequests: z.number().int().positive(),
    rateLimitDelaySeconds: z.number().nonnegative(),
    rateLimitBackoffSeconds: z.number().nonnegative(),
    verbose: z.boolean(),
    debug: z.boolean(),
    trace: z.boolean(),
    dryRun: z.boolean(),
  })
  // Trace implies debug
  .transform((config) => ({ ...config, debug: config.debug || config.trace }));

// Type exports
export type ConfigFileSection = z.infer<typeof configFileSectionSchema>;
export type MonitorConfigInput = z.input<typeof monitorConfigSchema>;
export type MonitorConfig = z.infer<typeof monitorConfigSchema>;
