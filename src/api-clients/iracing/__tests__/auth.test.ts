/**
 * Unit tests for TokenManager
 */

import { TokenManager } from '../auth';
import { maskSecret } from '../masking';
import { Session } from '../session';
import { createFakePool, createTestConfig, FakeClock, reply, tokenReply } from './helpers';

jest.mock('../../../utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn()
  }
}));

describe('TokenManager', () => {
  const testConfig = createTestConfig();

  let clock: FakeClock;
  let session: Session;
  let pool: ReturnType<typeof createFakePool>;
  let manager: TokenManager;

  const postedForm = (call: number) => new URLSearchParams(pool.client.post.mock.calls[call][1]);

  beforeEach(() => {
    jest.clearAllMocks();
    clock = new FakeClock();
    session = new Session(testConfig.minimumBackoffMs, clock);
    pool = createFakePool();
    manager = new TokenManager(testConfig, session, pool.client);
  });

  describe('authenticate', () => {
    it('should post the password-limited grant with masked secrets', async () => {
      pool.client.post.mockResolvedValueOnce(tokenReply('access-1'));

      await expect(manager.authenticate()).resolves.toBe(true);

      expect(pool.client.post).toHaveBeenCalledTimes(1);
      expect(pool.client.post).toHaveBeenCalledWith(
        'https://oauth.iracing.com/oauth2/token',
        expect.any(String),
        {
          headers: {
            'Content-Type': 'application/x-www-form-urlencoded'
          }
        }
      );

      const form = postedForm(0);
      expect(form.get('grant_type')).toBe('password_limited');
      expect(form.get('client_id')).toBe('test-client');
      expect(form.get('client_secret')).toBe(maskSecret('test-secret', 'test-client'));
      expect(form.get('username')).toBe('Driver@Example.com');
      expect(form.get('password')).toBe(maskSecret('test-password', 'Driver@Example.com'));
      expect(form.get('scope')).toBe('iracing.auth');
    });

    it('should never send the raw secrets', async () => {
      pool.client.post.mockResolvedValueOnce(tokenReply('access-1'));

      await manager.authenticate();

      const body: string = pool.client.post.mock.calls[0][1];
      expect(body).not.toContain('test-password');
      expect(body).not.toContain('test-secret');
    });

    it('should store the tokens and expiry', async () => {
      pool.client.post.mockResolvedValueOnce(tokenReply('access-1', 'refresh-1', 300));

      await manager.authenticate();

      expect(session.authenticated).toBe(true);
      expect(session.accessToken).toBe('access-1');
      expect(session.refreshToken).toBe('refresh-1');
      expect(session.accessTokenExpiry).toBe(300000);
    });

    it('should default the token lifetime to 600 seconds', async () => {
      pool.client.post.mockResolvedValueOnce(reply(200, { access_token: 'access-1' }));

      await manager.authenticate();

      expect(manager.getTokenInfo()).toEqual({
        isAuthenticated: true,
        isValid: true,
        hasRefreshToken: false,
        expiresIn: 600000
      });
    });

    it('should return false and stay unauthenticated when rejected', async () => {
      pool.client.post.mockResolvedValueOnce(reply(401, { error: 'invalid_grant' }));

      await expect(manager.authenticate()).resolves.toBe(false);
      expect(session.authenticated).toBe(false);
      expect(session.accessToken).toBeUndefined();
    });

    it('should return false on network errors', async () => {
      pool.client.post.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));

      await expect(manager.authenticate()).resolves.toBe(false);
      expect(session.authenticated).toBe(false);
    });

    it('should reject a 200 response without an access token', async () => {
      pool.client.post.mockResolvedValueOnce(reply(200, { expires_in: 600 }));

      await expect(manager.authenticate()).resolves.toBe(false);
      expect(session.authenticated).toBe(false);
    });
  });

  describe('refresh', () => {
    beforeEach(async () => {
      pool.client.post.mockResolvedValueOnce(tokenReply('access-1', 'refresh-1'));
      await manager.authenticate();
    });

    it('should post the refresh grant without masked credentials', async () => {
      pool.client.post.mockResolvedValueOnce(tokenReply('access-2', 'refresh-2'));

      await expect(manager.refresh()).resolves.toBe(true);

      const form = postedForm(1);
      expect(form.get('grant_type')).toBe('refresh_token');
      expect(form.get('client_id')).toBe('test-client');
      expect(form.get('refresh_token')).toBe('refresh-1');
      expect(form.has('client_secret')).toBe(false);
      expect(form.has('password')).toBe(false);
      expect(session.accessToken).toBe('access-2');
      expect(session.refreshToken).toBe('refresh-2');
    });

    it('should leave the tokens untouched when the response cannot be parsed', async () => {
      pool.client.post.mockResolvedValueOnce(reply(200, { refresh_token: 'refresh-2', expires_in: 600 }));

      await expect(manager.refresh()).resolves.toBe(false);
      expect(session.accessToken).toBe('access-1');
      expect(session.refreshToken).toBe('refresh-1');
    });

    it('should return false without a refresh token', async () => {
      session.clearTokens();

      await expect(manager.refresh()).resolves.toBe(false);
      expect(pool.client.post).toHaveBeenCalledTimes(1);
    });
  });

  describe('ensureAuthenticated', () => {
    it('should run one handshake on a cold session', async () => {
      pool.client.post.mockResolvedValueOnce(tokenReply('access-1'));

      await expect(manager.ensureAuthenticated()).resolves.toBe(true);
      expect(pool.client.post).toHaveBeenCalledTimes(1);
      expect(postedForm(0).get('grant_type')).toBe('password_limited');
    });

    it('should be a no-op while the token is valid', async () => {
      pool.client.post.mockResolvedValueOnce(tokenReply('access-1'));

      await manager.ensureAuthenticated();
      clock.advance(599000);
      await manager.ensureAuthenticated();

      expect(pool.client.post).toHaveBeenCalledTimes(1);
    });

    it('should refresh an expired token instead of a full handshake', async () => {
      pool.client.post
        .mockResolvedValueOnce(tokenReply('access-1', 'refresh-1'))
        .mockResolvedValueOnce(tokenReply('access-2', 'refresh-2'));

      await manager.ensureAuthenticated();
      clock.advance(600000);
      await expect(manager.ensureAuthenticated()).resolves.toBe(true);

      expect(pool.client.post).toHaveBeenCalledTimes(2);
      expect(postedForm(1).get('grant_type')).toBe('refresh_token');
      expect(session.accessToken).toBe('access-2');
    });

    it('should fall back to a handshake when the refresh fails', async () => {
      pool.client.post
        .mockResolvedValueOnce(tokenReply('access-1', 'refresh-1'))
        .mockResolvedValueOnce(reply(400, { error: 'invalid_grant' }))
        .mockResolvedValueOnce(tokenReply('access-3', 'refresh-3'));

      await manager.ensureAuthenticated();
      clock.advance(601000);
      await expect(manager.ensureAuthenticated()).resolves.toBe(true);

      expect(pool.client.post).toHaveBeenCalledTimes(3);
      expect(postedForm(1).get('grant_type')).toBe('refresh_token');
      expect(postedForm(2).get('grant_type')).toBe('password_limited');
      expect(session.accessToken).toBe('access-3');
    });

    it('should end unauthenticated when refresh and handshake both fail', async () => {
      pool.client.post
        .mockResolvedValueOnce(tokenReply('access-1', 'refresh-1'))
        .mockResolvedValueOnce(reply(400, { error: 'invalid_grant' }))
        .mockResolvedValueOnce(reply(401, { error: 'unauthorized_client' }));

      await manager.ensureAuthenticated();
      clock.advance(601000);

      await expect(manager.ensureAuthenticated()).resolves.toBe(false);
      expect(session.authenticated).toBe(false);
    });

    it('should share one handshake between concurrent callers', async () => {
      pool.client.post.mockResolvedValue(tokenReply('access-1'));

      const results = await Promise.all([
        manager.ensureAuthenticated(),
        manager.ensureAuthenticated(),
        manager.ensureAuthenticated()
      ]);

      expect(results).toEqual([true, true, true]);
      expect(pool.client.post).toHaveBeenCalledTimes(1);
    });
  });

  describe('reauthenticate', () => {
    beforeEach(async () => {
      pool.client.post.mockResolvedValueOnce(tokenReply('access-1'));
      await manager.authenticate();
    });

    it('should run a handshake when the rejected token is current', async () => {
      pool.client.post.mockResolvedValueOnce(tokenReply('access-2'));

      await expect(manager.reauthenticate('access-1')).resolves.toBe(true);
      expect(pool.client.post).toHaveBeenCalledTimes(2);
      expect(postedForm(1).get('grant_type')).toBe('password_limited');
      expect(session.accessToken).toBe('access-2');
    });

    it('should skip the handshake when the token was already replaced', async () => {
      await expect(manager.reauthenticate('access-0')).resolves.toBe(true);
      expect(pool.client.post).toHaveBeenCalledTimes(1);
    });
  });

  describe('getTokenInfo', () => {
    it('should report an empty session', () => {
      expect(manager.getTokenInfo()).toEqual({
        isAuthenticated: false,
        isValid: false,
        hasRefreshToken: false,
        expiresIn: undefined
      });
    });

    it('should report an expired token', async () => {
      pool.client.post.mockResolvedValueOnce(tokenReply('access-1'));
      await manager.authenticate();

      clock.advance(700000);

      expect(manager.getTokenInfo()).toEqual({
        isAuthenticated: true,
        isValid: false,
        hasRefreshToken: true,
        expiresIn: 0
      });
    });
  });
});
