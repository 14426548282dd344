import { z } from 'zod';

export const logLevels = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

export const loggerEnvSchema = z.object({
  LOGGER_CONSOLE_ENABLED: z
    .string()
    .default('true')
    .transform((val: string) => val === 'true'),
  LOGGER_FILE_LOG_ENABLED: z
    .string()
    .default('false')
    .transform((val: string) => val === 'true'),
  LOGGER_FILE_LOG_PATH: z.string().trim().min(1, { message: 'Invalid file log path' }).default('logs/ledger.log'),
  LOGGER_LOG_LEVEL: z.enum(logLevels).default('info'),
  LOGGER_SERVICE_NAME: z.string().default('bullion-ledger'),
  NODE_ENV: z.enum(['production', 'development', 'test']).default('development'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  return loggerEnvSchema.parse(env);
}
