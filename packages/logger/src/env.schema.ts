import { z } from 'zod';

export const loggerEnvSchema = z.object({
  LOGGER_FORMAT: z.enum(['pretty', 'json']).default('pretty'),
  LOGGER_LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(['trace', 'debug', 'info', 'warn', 'error']))
    .default('info'),
  LOGGER_SERVICE_NAME: z.string().trim().min(1).default('ftgate'),
  NODE_ENV: z.enum(['production', 'development', 'test']).default('development'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  return loggerEnvSchema.parse(env);
}
