/**
 * iRacing Data API Client
 * Authenticated GET dispatcher with shared rate-limit scheduling
 */

import { AxiosResponse } from 'axios';
import { logger } from '../../utils/logger';
import { TokenManager } from './auth';
import { ChunkDownloader } from './chunk-downloader';
import { validateConfig } from './config';
import {
  createHttpPool,
  describeTransportError,
  headerValue,
  HttpPool,
  parseJsonBody,
  truncateBody
} from './http';
import { resolveLink } from './link-resolver';
import { Clock, Session, systemClock } from './session';
import {
  ChunkDescriptor,
  DownloadChunksOptions,
  failure,
  IRacingConfig,
  JsonValue,
  QueryParams,
  RequestAttempt,
  Result,
  TokenInfo
} from './types';

export interface IRacingClientOptions {
  /** Connection pool; defaults to keep-alive agents built from the config */
  pool?: HttpPool;
  clock?: Clock;
}

type AttemptOutcome =
  | { kind: 'done'; result: Result<JsonValue> }
  | { kind: 'retry' };

export class IRacingClient {
  private session: Session;
  private pool: HttpPool;
  private auth: TokenManager;
  private chunks: ChunkDownloader;
  private closed = false;

  constructor(private config: IRacingConfig, options: IRacingClientOptions = {}) {
    validateConfig(config);

    this.session = new Session(config.minimumBackoffMs, options.clock ?? systemClock);
    this.pool = options.pool ?? createHttpPool(config);
    this.auth = new TokenManager(config, this.session, this.pool.client);
    this.chunks = new ChunkDownloader(this.pool.client);
  }

  /**
   * Authenticated GET against the data API.
   * Follows one level of link indirection and never throws for expected failures.
   */
  async get(endpoint: string, params: QueryParams = {}): Promise<Result<JsonValue>> {
    const attempt: RequestAttempt = { endpoint, params, attempt: 0 };

    for (; attempt.attempt < this.config.maxAttempts; attempt.attempt++) {
      const outcome = await this.dispatch(attempt);
      if (outcome.kind === 'done') {
        return outcome.result;
      }
    }

    logger.error('iRacing rate limit retries exhausted', {
      endpoint,
      attempts: attempt.attempt,
      lastStatus: attempt.lastStatus,
      lastHeaders: attempt.lastHeaders
    });
    return failure(
      `Retries exhausted for ${endpoint}`,
      'RATE_LIMIT_EXHAUSTED',
      attempt.lastStatus
    );
  }

  /**
   * Downloads a bulk dataset from its chunk descriptor.
   * Only the first chunk is fetched unless `allChunks` is set.
   */
  async downloadChunks(
    descriptor: ChunkDescriptor,
    options: DownloadChunksOptions = {}
  ): Promise<Result<JsonValue[]>> {
    if (!(await this.auth.ensureAuthenticated())) {
      return failure('iRacing authentication failed', 'AUTHENTICATION_FAILED');
    }
    return this.chunks.download(descriptor, options);
  }

  /**
   * Authenticates up front instead of on the first request
   */
  async initialize(): Promise<boolean> {
    return this.auth.ensureAuthenticated();
  }

  getTokenInfo(): TokenInfo {
    return this.auth.getTokenInfo();
  }

  /**
   * Milliseconds before the next request may be sent
   */
  getBackoffRemaining(): number {
    return this.session.waitTime();
  }

  /**
   * Closes the connection pool and forgets the tokens
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.pool.destroy();
    this.session.clearTokens();
  }

  /**
   * One pass through the request state machine
   */
  private async dispatch(attempt: RequestAttempt): Promise<AttemptOutcome> {
    const { endpoint, params } = attempt;

    if (!(await this.auth.ensureAuthenticated())) {
      return { kind: 'done', result: failure('iRacing authentication failed', 'AUTHENTICATION_FAILED') };
    }

    const token = await this.waitForSchedule();
    if (token === undefined) {
      // Tokens were dropped while this request waited (failed handshake or close)
      return { kind: 'done', result: failure('iRacing authentication failed', 'AUTHENTICATION_FAILED') };
    }

    let response: AxiosResponse<unknown>;
    try {
      // Parsed below; a non-JSON body is MALFORMED_PAYLOAD
      response = await this.pool.client.get<unknown>(`${this.config.baseUrl}${endpoint}`, {
        params,
        headers: { Authorization: `Bearer ${token}` },
        responseType: 'text'
      });
    } catch (error) {
      logger.error('iRacing API request error', { endpoint, ...describeTransportError(error) });
      return {
        kind: 'done',
        result: failure(`Request to ${endpoint} failed`, 'TRANSPORT_ERROR', undefined, describeTransportError(error))
      };
    }

    attempt.lastStatus = response.status;
    attempt.lastHeaders = collectHeaders(response);
    this.checkRateLimitHeaders(endpoint, response);

    switch (response.status) {
      case 200: {
        await this.session.mutex.runExclusive(async () => {
          this.session.deferUntil(this.session.clock.now());
        });
        const body = parseJsonBody(response.data);
        if (!body.ok) {
          logger.error('iRacing API returned a non-JSON body', {
            endpoint,
            reason: body.error.message,
            body: truncateBody(response.data)
          });
          return { kind: 'done', result: body };
        }
        return { kind: 'done', result: await resolveLink(this.pool.client, body.value) };
      }

      case 401: {
        if (this.config.maxAttempts - attempt.attempt - 1 <= 0) {
          // No attempt left to spend a fresh token on
          logger.warn('iRacing session expired on the last attempt', { endpoint });
          return { kind: 'retry' };
        }
        logger.warn('iRacing session expired, re-authenticating', { endpoint });
        if (!(await this.auth.reauthenticate(token))) {
          return { kind: 'done', result: failure('iRacing re-authentication failed', 'AUTHENTICATION_FAILED', 401) };
        }
        return { kind: 'retry' };
      }

      case 429: {
        const delay = this.retryDelay(response);
        await this.session.mutex.runExclusive(async () => {
          this.session.deferUntil(this.session.clock.now() + delay);
        });

        const remaining = this.config.maxAttempts - attempt.attempt - 1;
        logger.warn('Rate limited by iRacing API', { endpoint, delayMs: delay, attemptsLeft: remaining });

        if (remaining > 0) {
          await this.session.clock.sleep(delay);
        }
        return { kind: 'retry' };
      }

      case 503:
        logger.error('iRacing API is in maintenance', { endpoint });
        return { kind: 'done', result: failure('iRacing API is in maintenance', 'SERVICE_UNAVAILABLE', 503) };

      default:
        logger.error('iRacing API error', {
          endpoint,
          status: response.status,
          body: truncateBody(response.data)
        });
        return {
          kind: 'done',
          result: failure(`iRacing API error ${response.status}: ${endpoint}`, 'HTTP_ERROR', response.status)
        };
    }
  }

  /**
   * Waits out any pending backoff while holding the scheduling lock,
   * so queued callers line up behind it. Returns the token to send.
   */
  private async waitForSchedule(): Promise<string | undefined> {
    return this.session.mutex.runExclusive(async () => {
      const wait = this.session.waitTime();
      if (wait > 0) {
        logger.debug('Waiting for iRacing rate limit window', { waitMs: wait });
        await this.session.clock.sleep(wait);
      }
      return this.session.accessToken;
    });
  }

  private retryDelay(response: AxiosResponse): number {
    const retryAfter = headerValue(response, 'retry-after');
    if (retryAfter !== undefined && retryAfter.trim() !== '') {
      const seconds = Number(retryAfter);
      if (Number.isFinite(seconds) && seconds >= 0) {
        return seconds * 1000;
      }
    }
    return this.session.minimumBackoff * 2;
  }

  private checkRateLimitHeaders(endpoint: string, response: AxiosResponse): void {
    const remaining = headerValue(response, 'x-ratelimit-remaining');
    if (remaining === undefined) {
      return;
    }

    const value = parseInt(remaining, 10);
    if (!Number.isNaN(value) && value < this.config.rateLimitWarningThreshold) {
      logger.warn('iRacing API rate limit low', { endpoint, remaining: value });
    }
  }
}

function collectHeaders(response: AxiosResponse): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const name of ['x-ratelimit-remaining', 'x-ratelimit-limit', 'x-ratelimit-reset', 'retry-after']) {
    const value = headerValue(response, name);
    if (value !== undefined) {
      headers[name] = value;
    }
  }
  return headers;
}
