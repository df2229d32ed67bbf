import { validateLoggerEnv } from './env.schema.js';
import { initLogger } from './logger.js';

/**
 * Initialize the global logger from LOGGER_* environment variables.
 * The test environment stays silent.
 */
export function configureLoggerFromEnv(env: NodeJS.ProcessEnv = process.env): void {
  const config = validateLoggerEnv(env);

  initLogger({
    color: Boolean(process.stderr.isTTY),
    enabled: config.NODE_ENV !== 'test',
    format: config.LOGGER_FORMAT,
    level: config.LOGGER_LOG_LEVEL,
    serviceName: config.LOGGER_SERVICE_NAME,
  });
}
