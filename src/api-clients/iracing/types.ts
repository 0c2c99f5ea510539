/**
 * iRacing Data API Types and Interfaces
 */

// OAuth 2.0 Types
export interface IRacingCredentials {
  username: string;
  password: string;
  clientId: string;
  clientSecret: string;
}

export interface TokenInfo {
  isAuthenticated: boolean;
  isValid: boolean;
  hasRefreshToken: boolean;
  expiresIn?: number;
}

// Data Types
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface ChunkDescriptor {
  baseDownloadUrl: string;
  chunkFileNames: string[];
  rows?: number;
}

export interface DownloadChunksOptions {
  /** Fetch and concatenate every chunk instead of only the first one */
  allChunks?: boolean;
}

export interface RequestAttempt {
  endpoint: string;
  params: QueryParams;
  attempt: number;
  lastStatus?: number;
  lastHeaders?: Record<string, string>;
}

// Error Types
export type IRacingErrorCode =
  | 'AUTHENTICATION_FAILED'
  | 'RATE_LIMIT_EXHAUSTED'
  | 'SERVICE_UNAVAILABLE'
  | 'MALFORMED_PAYLOAD'
  | 'TRANSPORT_ERROR'
  | 'HTTP_ERROR'
  | 'INVALID_CHUNK_DESCRIPTOR'
  | 'INVALID_CONFIG';

export class IRacingAPIError extends Error {
  constructor(
    message: string,
    public code: IRacingErrorCode,
    public statusCode?: number,
    public details?: unknown
  ) {
    super(message);
    this.name = 'IRacingAPIError';
  }
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: IRacingAPIError };

export function success<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function failure<T>(
  message: string,
  code: IRacingErrorCode,
  statusCode?: number,
  details?: unknown
): Result<T> {
  return { ok: false, error: new IRacingAPIError(message, code, statusCode, details) };
}

// Configuration Types
export interface IRacingConfig {
  baseUrl: string;
  authUrl: string;
  credentials: IRacingCredentials;
  scope: string;
  maxAttempts: number;
  minimumBackoffMs: number;
  rateLimitWarningThreshold: number;
  timeout: number;
  maxSockets: number;
  maxTotalSockets: number;
  defaultTokenLifetime: number;
}
