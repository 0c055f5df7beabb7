/**
 * Environment-driven configuration.
 *
 * Set FROZEN_COLLECTIONS_LOG_LEVEL=debug to see every store clone and build
 * on stderr. Nothing is logged when the variable is unset.
 */

import { z } from 'zod';
import { ArgumentError } from './errors';
import { LOG_LEVEL_ENV, LOG_LEVELS, logger, stderrTransport, type LogLevel, type Logger } from './internal';

export interface CollectionsConfig {
  logLevel?: LogLevel;
}

const configSchema = z.object({
  [LOG_LEVEL_ENV]: z.enum(LOG_LEVELS).optional(),
});

export function loadConfig(env: Record<string, string | undefined> = process.env): CollectionsConfig {
  const raw = env[LOG_LEVEL_ENV];
  const parsed = configSchema.safeParse({ [LOG_LEVEL_ENV]: raw === '' ? undefined : raw });
  if (!parsed.success) {
    throw new ArgumentError(
      `${LOG_LEVEL_ENV} must be one of ${LOG_LEVELS.join(', ')}, got ${JSON.stringify(raw)}`,
      { cause: parsed.error }
    );
  }
  return { logLevel: parsed.data[LOG_LEVEL_ENV] };
}

/**
 * Applies `config` to `target`. A configured level also attaches the stderr
 * transport, once.
 */
export function configureLogging(config: CollectionsConfig, target: Logger = logger): void {
  if (config.logLevel === undefined) return;
  target.setLevel(config.logLevel);
  target.removeTransport(stderrTransport).addTransport(stderrTransport);
}
