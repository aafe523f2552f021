/**
 * src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 * - The hub connection parameters and the expected identity are fixed here,
 *   once, and injected everywhere else (no shared settings map).
 *
 * HOW TO USE:
 * - In dev, we load .env via dotenv.
 * - Under the hub, the spawner injects env vars (no file).
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), not a plain string.
 * - URL prefixes are normalized here so routes and redirects can concatenate them
 *   without re-checking slashes.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().int().min(0).max(65535).default(8888),
  HOST: z.string().default('0.0.0.0'),

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('hub-singleuser'),

  // The one identity this instance serves
  HUB_USER: z.string().min(1),
  HUB_COOKIE_NAME: z.string().min(1),

  // Hub connection
  HUB_API_TOKEN: z.string().min(1),
  HUB_API_URL: z.string().url().default('http://127.0.0.1:8081/hub/api'),
  HUB_PREFIX: z.string().default('/hub/'),
  HUB_HOST: z.string().default(''),
  HUB_API_TIMEOUT_MS: z.coerce.number().int().min(1).default(10_000),

  BASE_URL: z.string().default('/'),

  // 0 disables periodic clearing (entries live for the process lifetime)
  COOKIE_CACHE_LIFETIME_SECONDS: z.coerce.number().int().min(0).default(300),
});

export type NodeEnv = z.infer<typeof ConfigSchema>['NODE_ENV'];
export type LogLevel = z.infer<typeof ConfigSchema>['LOG_LEVEL'];

export type HubAuthSettings = {
  user: string;
  cookieName: string;

  hubApiUrl: string;
  hubApiToken: string;
  hubPrefix: string;
  hubHost: string;
  hubApiTimeoutMs: number;

  baseUrl: string;
  cookieCacheLifetimeSeconds: number;
};

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;
  host: string;

  logLevel: LogLevel;
  serviceName: string;

  hubAuth: HubAuthSettings;
};

/** "/user/alice" -> "/user/alice/", "hub" -> "/hub/", "" -> "/" */
export function normalizePrefix(raw: string): string {
  const trimmed = raw.trim().replace(/^\/+|\/+$/g, '');
  return trimmed ? `/${trimmed}/` : '/';
}

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    host: parsed.HOST,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    hubAuth: {
      user: parsed.HUB_USER,
      cookieName: parsed.HUB_COOKIE_NAME,

      hubApiUrl: parsed.HUB_API_URL.replace(/\/+$/, ''),
      hubApiToken: parsed.HUB_API_TOKEN,
      hubPrefix: normalizePrefix(parsed.HUB_PREFIX),
      hubHost: parsed.HUB_HOST.replace(/\/+$/, ''),
      hubApiTimeoutMs: parsed.HUB_API_TIMEOUT_MS,

      baseUrl: normalizePrefix(parsed.BASE_URL),
      cookieCacheLifetimeSeconds: parsed.COOKIE_CACHE_LIFETIME_SECONDS,
    },
  };
}
