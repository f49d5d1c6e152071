/**
 * Runtime configuration for the userhub service.
 *
 * This centralises environment variables and provides
 * typed access throughout the codebase.
 */
import dotenv from 'dotenv';

dotenv.config();

export type AppEnv = 'development' | 'test' | 'production';

export interface AppConfig {
  env: AppEnv;
  port: number;
  serviceName: string;
  serviceVersion: string;

  /**
   * Build stamp (e.g. short git hash) echoed in every envelope.
   */
  buildVersion: string;

  jsonBodyLimit: string;
  bcryptRounds: number;
  jwtExpiresIn: string;
}

const DEFAULT_PORT = 8000;
const DEFAULT_BCRYPT_ROUNDS = 10;

function parseEnv(raw: string | undefined): AppEnv {
  if (raw === 'production' || raw === 'test') return raw;
  return 'development';
}

function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const value = raw ? Number(raw) : fallback;
  if (!Number.isInteger(value) || value <= 0) {
    return fallback;
  }
  return value;
}

/**
 * Load configuration from environment variables with sane defaults.
 */
export const config: AppConfig = {
  env: parseEnv(process.env.NODE_ENV),
  port: parsePositiveInt(process.env.PORT, DEFAULT_PORT),
  serviceName: process.env.SERVICE_NAME || 'userhub-service',
  serviceVersion: process.env.SERVICE_VERSION || '0.1.0',
  buildVersion: process.env.BUILD_VERSION || 'unknown',
  jsonBodyLimit: process.env.JSON_BODY_LIMIT || '100kb',
  bcryptRounds: parsePositiveInt(process.env.BCRYPT_ROUNDS, DEFAULT_BCRYPT_ROUNDS),
  jwtExpiresIn: process.env.JWT_EXPIRES_IN || '7d',
};

/**
 * MongoDB connection URL used by mongoose.
 * Throws if not configured to fail fast on startup.
 */
export function getDatabaseUrl(): string {
  const url = process.env.MONGODB_URL;

  if (!url || url.trim().length === 0) {
    throw new Error('MONGODB_URL is not configured');
  }

  return url;
}

/**
 * HMAC secret for signing and verifying bearer tokens.
 */
export function getJwtSecret(): string {
  const secret = process.env.JWT_SECRET;

  if (!secret || secret.trim().length === 0) {
    throw new Error('JWT_SECRET is not configured');
  }

  return secret;
}
