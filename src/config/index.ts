import path from 'path';
import { envVars } from './env';

export const appConfig = {
  env: envVars.NODE_ENV,
  port: envVars.PORT,
  name: envVars.APP_NAME,
  version: envVars.APP_VERSION,
  isProduction: envVars.NODE_ENV === 'production',
  isDevelopment: envVars.NODE_ENV === 'development',
  isTest: envVars.NODE_ENV === 'test',
};

export const logConfig = {
  level: envVars.LOG_LEVEL ?? (envVars.NODE_ENV === 'development' ? 'debug' : 'info'),
  toFile: envVars.LOG_TO_FILE,
  directory: path.resolve(process.cwd(), envVars.LOG_DIRECTORY),
  silent: envVars.NODE_ENV === 'test',
  console: envVars.NODE_ENV !== 'production' || !envVars.LOG_TO_FILE,
};

export const repositoryConfig = {
  registryPath: path.resolve(process.cwd(), envVars.REPOSITORY_REGISTRY_PATH),
  concurrency: envVars.LOAD_CONCURRENCY,
  timeoutMs: envVars.LOAD_TIMEOUT_MS > 0 ? envVars.LOAD_TIMEOUT_MS : undefined,
};

export const httpSourceConfig = {
  timeoutMs: envVars.HTTP_TIMEOUT_MS,
  userAgent: envVars.HTTP_USER_AGENT,
};

export const apiConfig = {
  cors: {
    origin: envVars.CORS_ORIGIN === '*' ? '*' : envVars.CORS_ORIGIN.split(','),
  },
  rateLimit: {
    windowMs: envVars.RATE_LIMIT_WINDOW_MS,
    max: envVars.RATE_LIMIT_MAX,
    reloadMax: envVars.RELOAD_RATE_LIMIT_MAX,
  },
};
