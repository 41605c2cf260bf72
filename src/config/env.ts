import dotenv from 'dotenv';
import path from 'path';
import { existsSync } from 'fs';
import Joi from 'joi';

// Load environment variables from .env file
const envPath = path.resolve(process.cwd(), '.env');
if (existsSync(envPath)) {
  dotenv.config({ path: envPath });
}

export interface EnvVars {
  NODE_ENV: 'development' | 'production' | 'test';
  PORT: number;
  APP_NAME: string;
  APP_VERSION: string;
  LOG_LEVEL?: 'error' | 'warn' | 'info' | 'http' | 'debug';
  LOG_TO_FILE: boolean;
  LOG_DIRECTORY: string;
  REPOSITORY_REGISTRY_PATH: string;
  LOAD_CONCURRENCY: number;
  LOAD_TIMEOUT_MS: number;
  HTTP_TIMEOUT_MS: number;
  HTTP_USER_AGENT: string;
  CORS_ORIGIN: string;
  RATE_LIMIT_WINDOW_MS: number;
  RATE_LIMIT_MAX: number;
  RELOAD_RATE_LIMIT_MAX: number;
}

const envVarsSchema = Joi.object<EnvVars>()
  .keys({
    NODE_ENV: Joi.string().valid('development', 'production', 'test').default('development'),
    PORT: Joi.number().port().default(5000),
    APP_NAME: Joi.string().default('Card Repository Loader'),
    APP_VERSION: Joi.string().default('1.0.0'),

    // Logging
    LOG_LEVEL: Joi.string()
      .valid('error', 'warn', 'info', 'http', 'debug')
      .description('Log level (error, warn, info, http, debug); debug in development, info otherwise'),
    LOG_TO_FILE: Joi.boolean().default(false).description('Write rotating log files'),
    LOG_DIRECTORY: Joi.string().default('logs'),

    // Repositories
    REPOSITORY_REGISTRY_PATH: Joi.string()
      .default('config/repositories.json')
      .description('JSON file listing the repositories to load'),
    LOAD_CONCURRENCY: Joi.number().integer().min(1).max(64).default(4).description('Set documents fetched in parallel'),
    LOAD_TIMEOUT_MS: Joi.number().integer().min(0).default(30000).description('0 disables the load timeout'),

    // Remote documents
    HTTP_TIMEOUT_MS: Joi.number().integer().min(1).default(15000),
    HTTP_USER_AGENT: Joi.string().default('CardRepositoryLoader/1.0'),

    // CORS
    CORS_ORIGIN: Joi.string().default('*').description('CORS allowed origins'),

    // Rate limiting
    RATE_LIMIT_WINDOW_MS: Joi.number().integer().min(1000).default(60000),
    RATE_LIMIT_MAX: Joi.number().integer().min(1).default(300).description('Requests per window and IP'),
    RELOAD_RATE_LIMIT_MAX: Joi.number().integer().min(1).default(10).description('Reloads per window and IP'),
  })
  .unknown();

const { value, error } = envVarsSchema
  .prefs({ errors: { label: 'key' } })
  .validate(process.env);

if (error) {
  throw new Error(`Config validation error: ${error.message}`);
}

export const envVars: EnvVars = value;
