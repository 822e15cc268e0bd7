/**
 * Environment Configuration
 *
 * Reads the process environment once and validates it with zod.
 *
 * @module @flowgraph/core/config
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { SEVERITIES } from './telemetry/logger.js';
import type { Severity } from './telemetry/context.js';

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  LOG_LEVEL: z.enum(SEVERITIES).default('INFO'),
  APP_NAME: z.string().min(1).default('flowgraph'),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

/**
 * Resolved runtime configuration
 */
export interface FlowConfig {
  port: number;
  logLevel: Severity;
  appName: string;
  environment: 'development' | 'test' | 'production';
  /** Pretty-print log lines (development only) */
  prettyLogs: boolean;
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Load configuration from an environment record
 *
 * @example
 * ```typescript
 * const config = loadConfig();
 * server.start(config.port);
 * ```
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): FlowConfig {
  const parsed = ConfigSchema.safeParse({
    PORT: emptyToUndefined(env.PORT),
    LOG_LEVEL: emptyToUndefined(env.LOG_LEVEL),
    APP_NAME: emptyToUndefined(env.APP_NAME),
    NODE_ENV: emptyToUndefined(env.NODE_ENV),
  });

  if (!parsed.success) {
    const fieldErrors: Record<string, string> = {};
    for (const issue of parsed.error.issues) {
      fieldErrors[issue.path.join('.')] = issue.message;
    }
    throw new ConfigurationError(
      `Invalid configuration: ${Object.keys(fieldErrors).join(', ')}`,
      fieldErrors
    );
  }

  const data = parsed.data;
  return {
    port: data.PORT,
    logLevel: data.LOG_LEVEL,
    appName: data.APP_NAME,
    environment: data.NODE_ENV,
    prettyLogs: data.NODE_ENV === 'development',
  };
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}
