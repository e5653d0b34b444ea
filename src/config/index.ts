/**
 * Runtime configuration
 * Loaded once from the environment (.env.local takes precedence over .env).
 */

import * as dotenv from 'dotenv';

dotenv.config({ path: '.env.local' });
dotenv.config();

export interface AppConfig {
  nodeEnv: string;
  isProduction: boolean;
  port: number;
  host: string;
  logLevel: string;
  databaseUrl: string | undefined;
  dbPoolMax: number;
  mediaRoot: string;
  corsOrigin: string | boolean;
  enableSwagger: boolean;
}

function readInt(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const nodeEnv = env.NODE_ENV || 'development';
  return Object.freeze({
    nodeEnv,
    isProduction: nodeEnv === 'production',
    port: readInt(env.PORT, 8080),
    host: env.HOST || '0.0.0.0',
    logLevel: env.LOG_LEVEL || 'info',
    databaseUrl: env.DATABASE_URL || undefined,
    dbPoolMax: readInt(env.DB_POOL_MAX, 10),
    mediaRoot: env.MEDIA_ROOT || './media',
    // CORS_ORIGIN unset means "reflect the request origin"
    corsOrigin: env.CORS_ORIGIN ? env.CORS_ORIGIN : true,
    enableSwagger: env.ENABLE_SWAGGER === 'true',
  });
}

export const config = loadConfig();
