/**
 * Connection pool shared by the token manager, dispatcher and chunk downloader
 */

import axios, { AxiosInstance, AxiosResponse } from 'axios';
import http from 'http';
import https from 'https';
import { failure, IRacingConfig, JsonValue, Result, success } from './types';

export type HttpClient = Pick<AxiosInstance, 'get' | 'post'>;

export interface HttpPool {
  client: HttpClient;
  destroy(): void;
}

/**
 * Creates an axios instance on keep-alive agents with capped sockets.
 * Every status is resolved, not thrown, so callers branch on it.
 */
export function createHttpPool(config: IRacingConfig): HttpPool {
  const agentOptions = {
    keepAlive: true,
    maxSockets: config.maxSockets,
    maxTotalSockets: config.maxTotalSockets
  };
  const httpAgent = new http.Agent(agentOptions);
  const httpsAgent = new https.Agent(agentOptions);

  const client = axios.create({
    timeout: config.timeout,
    httpAgent,
    httpsAgent,
    maxRedirects: 5,
    validateStatus: () => true,
    headers: {
      'User-Agent': 'iRacing-Data-Client/1.0'
    }
  });

  return {
    client,
    destroy: () => {
      httpAgent.destroy();
      httpsAgent.destroy();
    }
  };
}

/**
 * Reads a response header as a string, whatever shape axios gave it
 */
export function headerValue(response: Pick<AxiosResponse, 'headers'>, name: string): string | undefined {
  const value: unknown = response.headers[name.toLowerCase()];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return undefined;
}

export function isJsonObject(value: JsonValue): value is { [key: string]: JsonValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Strict UTF-8 decode; throws on invalid byte sequences
 */
export function decodeUtf8(bytes: Uint8Array): string {
  return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
}

/**
 * Parses a body fetched with `responseType: 'text'`.
 * Bodies that are not valid JSON fail with MALFORMED_PAYLOAD.
 */
export function parseJsonBody(data: unknown): Result<JsonValue> {
  try {
    if (typeof data === 'string') {
      return success(JSON.parse(data));
    }
    if (Buffer.isBuffer(data)) {
      return success(JSON.parse(decodeUtf8(data)));
    }
  } catch (error) {
    return failure(
      'Response body is not valid JSON',
      'MALFORMED_PAYLOAD',
      undefined,
      error instanceof Error ? error.message : String(error)
    );
  }

  return failure('Response body is not text', 'MALFORMED_PAYLOAD');
}

/**
 * Describes a thrown transport error for logging
 */
export function describeTransportError(error: unknown): { message: string; code?: string } {
  if (axios.isAxiosError(error)) {
    return { message: error.message, code: error.code };
  }
  return { message: error instanceof Error ? error.message : String(error) };
}

/**
 * Renders a response body for logs, cut to `limit` characters
 */
export function truncateBody(data: unknown, limit = 200): string {
  let text: string;
  if (typeof data === 'string') {
    text = data;
  } else if (Buffer.isBuffer(data)) {
    text = data.toString('utf8');
  } else {
    try {
      text = JSON.stringify(data) ?? String(data);
    } catch {
      text = String(data);
    }
  }
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}
