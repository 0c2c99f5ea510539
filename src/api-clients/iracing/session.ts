/**
 * Shared session state for one client instance.
 * Token fields and the request schedule are only mutated while holding `mutex`.
 */

import { performance } from 'perf_hooks';
import { Mutex } from '../../utils/mutex';

export interface Clock {
  /** Monotonic milliseconds */
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => performance.now(),
  sleep: (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms))
};

export interface SessionTokens {
  accessToken: string;
  refreshToken?: string;
  expiresAt: number;
}

export class Session {
  readonly mutex = new Mutex();

  private _accessToken?: string;
  private _refreshToken?: string;
  private _accessTokenExpiry?: number;
  private _authenticated = false;
  private _nextAllowedRequestTime: number;

  constructor(
    readonly minimumBackoff: number,
    readonly clock: Clock = systemClock
  ) {
    this._nextAllowedRequestTime = clock.now();
  }

  get accessToken(): string | undefined {
    return this._accessToken;
  }

  get refreshToken(): string | undefined {
    return this._refreshToken;
  }

  get accessTokenExpiry(): number | undefined {
    return this._accessTokenExpiry;
  }

  get authenticated(): boolean {
    return this._authenticated;
  }

  get nextAllowedRequestTime(): number {
    return this._nextAllowedRequestTime;
  }

  /**
   * Replaces the whole token set and marks the session authenticated
   */
  setTokens(tokens: SessionTokens): void {
    this._accessToken = tokens.accessToken;
    this._refreshToken = tokens.refreshToken;
    this._accessTokenExpiry = tokens.expiresAt;
    this._authenticated = true;
  }

  clearTokens(): void {
    this._accessToken = undefined;
    this._refreshToken = undefined;
    this._accessTokenExpiry = undefined;
    this._authenticated = false;
  }

  hasValidToken(): boolean {
    return (
      this._authenticated &&
      this._accessToken !== undefined &&
      this._accessTokenExpiry !== undefined &&
      this.clock.now() < this._accessTokenExpiry
    );
  }

  /**
   * Pushes the earliest next request time forward. Never moves it back.
   */
  deferUntil(time: number): number {
    this._nextAllowedRequestTime = Math.max(this._nextAllowedRequestTime, time);
    return this._nextAllowedRequestTime;
  }

  /**
   * Milliseconds until the next request may be sent
   */
  waitTime(): number {
    return Math.max(0, this._nextAllowedRequestTime - this.clock.now());
  }
}
