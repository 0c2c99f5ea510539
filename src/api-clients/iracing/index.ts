/**
 * iRacing Data API Client
 *
 * Features:
 * - OAuth 2.0 password-limited grant with masked credentials and token refresh
 * - Shared rate-limit scheduling across concurrent requests (Retry-After aware)
 * - Transparent `link` indirection to pre-signed blob storage
 * - Bulk chunk downloads (plain or gzip-compressed JSON)
 * - Failures returned as values, never thrown for expected conditions
 *
 * Usage:
 * ```typescript
 * import { IRacingClient, createConfigFromEnv } from './iracing';
 *
 * const client = new IRacingClient(createConfigFromEnv());
 *
 * const info = await client.get('/data/member/info');
 * if (info.ok) {
 *   console.log(info.value);
 * }
 *
 * client.close();
 * ```
 */

// Main exports
export { IRacingClient } from './client';
export type { IRacingClientOptions } from './client';
export { TokenManager } from './auth';
export { ChunkDownloader, decodeChunk, parseChunkInfo } from './chunk-downloader';
export { resolveLink } from './link-resolver';
export { maskSecret } from './masking';
export { Session, systemClock } from './session';
export type { Clock, SessionTokens } from './session';
export { createHttpPool } from './http';
export type { HttpClient, HttpPool } from './http';
export { createConfig, createConfigFromEnv, validateConfig, IRacingConfigSchema } from './config';
export type { CreateConfigOptions } from './config';

// Type exports
export type {
  IRacingCredentials,
  TokenInfo,
  JsonValue,
  QueryParams,
  ChunkDescriptor,
  DownloadChunksOptions,
  RequestAttempt,
  IRacingErrorCode,
  Result,
  IRacingConfig
} from './types';

export { IRacingAPIError, success, failure } from './types';
