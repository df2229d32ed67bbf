export {
  initLogger,
  getLogger,
  flushLoggers,
  type Logger,
  type LogFormat,
  type LogLevel,
  type LoggerConfig,
} from './logger.js';
export { configureLoggerFromEnv } from './configure.js';
export { loggerEnvSchema, validateLoggerEnv, type LoggerEnvConfig } from './env.schema.js';
