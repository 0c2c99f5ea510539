/**
 * iRacing API Configuration
 * Defaults, environment loading and validation
 */

import * as dotenv from 'dotenv';
import { z } from 'zod';
import { IRacingAPIError, IRacingConfig } from './types';

const ENDPOINTS = {
  baseUrl: 'https://members-ng.iracing.com',
  authUrl: 'https://oauth.iracing.com/oauth2/token'
};

// Default configuration values
const DEFAULTS = {
  scope: 'iracing.auth',
  maxAttempts: 3,
  minimumBackoffMs: 1000,
  rateLimitWarningThreshold: 10,
  timeout: 30000, // 30 seconds for the whole request
  maxSockets: 30, // per host
  maxTotalSockets: 100,
  defaultTokenLifetime: 600 // seconds
};

export const IRacingConfigSchema = z.object({
  baseUrl: z.string().url(),
  authUrl: z.string().url(),
  credentials: z.object({
    username: z.string().min(1),
    password: z.string().min(1),
    clientId: z.string().min(1),
    clientSecret: z.string().min(1)
  }),
  scope: z.string().min(1),
  maxAttempts: z.number().int().positive(),
  minimumBackoffMs: z.number().nonnegative(),
  rateLimitWarningThreshold: z.number().int().nonnegative(),
  timeout: z.number().int().min(1000),
  maxSockets: z.number().int().positive(),
  maxTotalSockets: z.number().int().positive(),
  defaultTokenLifetime: z.number().positive()
});

export interface CreateConfigOptions {
  username: string;
  password: string;
  clientId: string;
  clientSecret: string;
  baseUrl?: string;
  authUrl?: string;
  scope?: string;
  maxAttempts?: number;
  minimumBackoffMs?: number;
  rateLimitWarningThreshold?: number;
  timeout?: number;
  maxSockets?: number;
  maxTotalSockets?: number;
  defaultTokenLifetime?: number;
}

/**
 * Creates a validated iRacing configuration object
 */
export function createConfig(options: CreateConfigOptions): IRacingConfig {
  const config: IRacingConfig = {
    baseUrl: (options.baseUrl ?? ENDPOINTS.baseUrl).replace(/\/+$/, ''),
    authUrl: options.authUrl ?? ENDPOINTS.authUrl,
    credentials: {
      username: options.username,
      password: options.password,
      clientId: options.clientId,
      clientSecret: options.clientSecret
    },
    scope: options.scope ?? DEFAULTS.scope,
    maxAttempts: options.maxAttempts ?? DEFAULTS.maxAttempts,
    minimumBackoffMs: options.minimumBackoffMs ?? DEFAULTS.minimumBackoffMs,
    rateLimitWarningThreshold: options.rateLimitWarningThreshold ?? DEFAULTS.rateLimitWarningThreshold,
    timeout: options.timeout ?? DEFAULTS.timeout,
    maxSockets: options.maxSockets ?? DEFAULTS.maxSockets,
    maxTotalSockets: options.maxTotalSockets ?? DEFAULTS.maxTotalSockets,
    defaultTokenLifetime: options.defaultTokenLifetime ?? DEFAULTS.defaultTokenLifetime
  };

  validateConfig(config);
  return config;
}

/**
 * Creates configuration from environment variables (and a .env file, if present)
 */
export function createConfigFromEnv(env: NodeJS.ProcessEnv = process.env): IRacingConfig {
  dotenv.config();

  const username = env.IRACING_USERNAME;
  const password = env.IRACING_PASSWORD;
  const clientId = env.IRACING_CLIENT_ID;
  const clientSecret = env.IRACING_CLIENT_SECRET;

  if (!username || !password || !clientId || !clientSecret) {
    throw new IRacingAPIError(
      'Missing required iRacing credentials in environment variables',
      'INVALID_CONFIG'
    );
  }

  return createConfig({
    username,
    password,
    clientId,
    clientSecret,
    baseUrl: env.IRACING_BASE_URL,
    authUrl: env.IRACING_AUTH_URL,
    scope: env.IRACING_SCOPE,
    timeout: parseOptionalInt(env.IRACING_TIMEOUT),
    maxAttempts: parseOptionalInt(env.IRACING_MAX_ATTEMPTS),
    minimumBackoffMs: parseOptionalInt(env.IRACING_MIN_BACKOFF_MS)
  });
}

/**
 * Validates configuration, throwing INVALID_CONFIG with the offending fields
 */
export function validateConfig(config: IRacingConfig): void {
  const result = IRacingConfigSchema.safeParse(config);
  if (!result.success) {
    const fields = result.error.issues.map(issue => issue.path.join('.'));
    throw new IRacingAPIError(
      `Invalid configuration: ${fields.join(', ')}`,
      'INVALID_CONFIG',
      undefined,
      result.error.issues
    );
  }
}

function parseOptionalInt(value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  return parseInt(value, 10);
}
