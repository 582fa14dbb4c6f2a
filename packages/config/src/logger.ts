import { initLogger, type AppLogger, type LoggerConfig } from '@pegfee/shared/server';

import type { AppConfig } from './env';

/**
 * Install the process-wide logger from loaded configuration.
 * Hooks created without an explicit logger pick this one up.
 */
export function initAppLogger(
  config: Pick<AppConfig, 'nodeEnv' | 'logLevel'>,
  destination?: LoggerConfig['destination'],
): AppLogger {
  return initLogger({
    environment: config.nodeEnv,
    level: config.logLevel ?? undefined,
    destination,
  });
}
