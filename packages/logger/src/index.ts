export { configureLogger, formatLabel, getLogger, type Logger } from './logger.js';
export { loggerEnvSchema, logLevels, validateLoggerEnv, type LoggerEnvConfig } from './env.schema.js';
