/**
 * Launcher configuration.
 *
 * Read from the environment only; the launcher has no config file.
 * LOG_LEVEL controls diagnostics on stderr and never affects what is launched.
 */

import { z } from 'zod';
import { LauncherError, LauncherErrorCode } from './shared/errors.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const envSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export interface LauncherConfig {
  logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): LauncherConfig {
  const parsed = envSchema.safeParse({
    // Empty means unset
    LOG_LEVEL: env['LOG_LEVEL'] || undefined,
  });
  if (!parsed.success) {
    throw new LauncherError(
      LauncherErrorCode.INVALID_CONFIG,
      `Invalid LOG_LEVEL "${env['LOG_LEVEL']}"; expected one of: ${LOG_LEVELS.join(', ')}`,
      { issues: parsed.error.issues.map(i => i.message) }
    );
  }
  return { logLevel: parsed.data.LOG_LEVEL };
}
