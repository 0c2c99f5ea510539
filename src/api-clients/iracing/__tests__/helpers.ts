/**
 * Shared stand-ins for the iRacing client tests
 */

import { createConfig, CreateConfigOptions } from '../config';
import { Clock } from '../session';
import { IRacingConfig } from '../types';

export class FakeClock implements Clock {
  current = 0;
  sleeps: number[] = [];

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export function createFakePool() {
  return {
    client: {
      get: jest.fn(),
      post: jest.fn()
    },
    destroy: jest.fn()
  };
}

export function reply(status: number, data: unknown, headers: Record<string, string> = {}) {
  return { status, data, headers };
}

/**
 * A response as the dispatcher receives it with `responseType: 'text'`
 */
export function jsonReply(status: number, data: unknown, headers: Record<string, string> = {}) {
  return reply(status, JSON.stringify(data), headers);
}

export function tokenReply(accessToken: string, refreshToken = `refresh-for-${accessToken}`, expiresIn = 600) {
  return reply(200, {
    access_token: accessToken,
    refresh_token: refreshToken,
    expires_in: expiresIn,
    token_type: 'Bearer'
  });
}

export function createTestConfig(overrides: Partial<CreateConfigOptions> = {}): IRacingConfig {
  return createConfig({
    username: 'Driver@Example.com',
    password: 'test-password',
    clientId: 'test-client',
    clientSecret: 'test-secret',
    ...overrides
  });
}
