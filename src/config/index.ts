import Joi from 'joi';
import dotenv from 'dotenv';
import path from 'path';

// Load environment-specific .env file
const envFile = process.env.NODE_ENV === 'test' ? '.env.test' : '.env';
dotenv.config({ path: path.resolve(process.cwd(), envFile) });

/**
 * Upload limits and storage layout for PO and invoice documents.
 */
export interface UploadConfig {
  rootDir: string;
  publicPrefix: string;
  maxPoDocuments: number;
  maxFileSizeBytes: number;
  allowedExtensions: string[];
  stagingMaxAgeMs: number;
  sweepIntervalMs: number;
}

export interface AppConfig {
  env: string;
  port: number;
  databaseUrl: string | null;
  jwtSecret: string;
  hostUrl: string;
  timezone: string;
  uploads: UploadConfig;
}

interface RawEnv {
  NODE_ENV: string;
  PORT: number;
  DATABASE_URL: string | null;
  JWT_SECRET: string;
  HOST_URL: string;
  APP_TIMEZONE: string;
  UPLOAD_DIR: string;
  MAX_PO_DOCUMENTS: number;
  MAX_UPLOAD_SIZE_MB: number;
  ALLOWED_UPLOAD_EXTENSIONS: string;
  STAGING_MAX_AGE_MINUTES: number;
  STAGING_SWEEP_INTERVAL_MINUTES: number;
}

const envSchema = Joi.object<RawEnv>({
  NODE_ENV: Joi.string().valid('development', 'production', 'test').default('development'),
  PORT: Joi.number().port().default(8000),
  DATABASE_URL: Joi.string().uri({ scheme: ['postgres', 'postgresql'] }).allow(null).default(null),
  JWT_SECRET: Joi.string().min(8).required(),
  HOST_URL: Joi.string().uri().default('http://localhost:8000'),
  APP_TIMEZONE: Joi.string().default('Asia/Kolkata'),
  UPLOAD_DIR: Joi.string().default('uploads'),
  MAX_PO_DOCUMENTS: Joi.number().integer().min(1).max(50).default(20),
  MAX_UPLOAD_SIZE_MB: Joi.number().positive().default(10),
  ALLOWED_UPLOAD_EXTENSIONS: Joi.string().default('.pdf,.doc,.docx,.jpg,.jpeg,.png,.txt,.xlsx,.xls'),
  STAGING_MAX_AGE_MINUTES: Joi.number().integer().min(1).default(60),
  STAGING_SWEEP_INTERVAL_MINUTES: Joi.number().integer().min(1).default(30),
}).unknown(true);

/**
 * Builds the application configuration from environment variables.
 * Throws when a required variable is missing or malformed.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const { error, value } = envSchema.validate(env, { abortEarly: false });
  if (error) {
    throw new Error(`Invalid environment configuration: ${error.details.map((d) => d.message).join(', ')}`);
  }

  return {
    env: value.NODE_ENV,
    port: value.PORT,
    databaseUrl: value.DATABASE_URL,
    jwtSecret: value.JWT_SECRET,
    hostUrl: value.HOST_URL.replace(/\/+$/, ''),
    timezone: value.APP_TIMEZONE,
    uploads: {
      rootDir: path.resolve(process.cwd(), value.UPLOAD_DIR),
      publicPrefix: 'uploads',
      maxPoDocuments: value.MAX_PO_DOCUMENTS,
      maxFileSizeBytes: Math.round(value.MAX_UPLOAD_SIZE_MB * 1024 * 1024),
      allowedExtensions: value.ALLOWED_UPLOAD_EXTENSIONS
        .split(',')
        .map((ext) => ext.trim().toLowerCase())
        .filter((ext) => ext.length > 0)
        .map((ext) => (ext.startsWith('.') ? ext : `.${ext}`)),
      stagingMaxAgeMs: value.STAGING_MAX_AGE_MINUTES * 60 * 1000,
      sweepIntervalMs: value.STAGING_SWEEP_INTERVAL_MINUTES * 60 * 1000,
    },
  };
};

let cachedConfig: AppConfig | null = null;

/**
 * Returns the process-wide configuration, loading it on first use.
 */
export const getConfig = (): AppConfig => {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
};
