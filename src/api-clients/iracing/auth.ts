/**
 * iRacing OAuth 2.0 Authentication
 * Handles the password-limited handshake, token refresh and expiry tracking
 */

import { z } from 'zod';
import { logger } from '../../utils/logger';
import { describeTransportError, HttpClient, truncateBody } from './http';
import { maskSecret } from './masking';
import { Session } from './session';
import { IRacingConfig, TokenInfo } from './types';

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).optional(),
  expires_in: z.number().positive().optional()
});

export class TokenManager {
  constructor(
    private config: IRacingConfig,
    private session: Session,
    private http: HttpClient
  ) {}

  /**
   * Makes sure the session holds a valid access token.
   * Refreshes an expired token, falling back to a full handshake.
   */
  async ensureAuthenticated(): Promise<boolean> {
    return this.session.mutex.runExclusive(async () => {
      if (this.session.hasValidToken()) {
        return true;
      }

      if (this.session.authenticated && (await this.requestRefresh())) {
        return true;
      }

      return this.requestHandshake();
    });
  }

  /**
   * Runs a full handshake regardless of the current token state
   */
  async authenticate(): Promise<boolean> {
    return this.session.mutex.runExclusive(() => this.requestHandshake());
  }

  /**
   * Exchanges the refresh token for a new token pair
   */
  async refresh(): Promise<boolean> {
    return this.session.mutex.runExclusive(() => this.requestRefresh());
  }

  /**
   * Re-authenticates after the server rejected `staleToken`.
   * Skips the handshake when another caller already replaced that token.
   */
  async reauthenticate(staleToken: string): Promise<boolean> {
    return this.session.mutex.runExclusive(async () => {
      if (this.session.accessToken !== staleToken && this.session.hasValidToken()) {
        logger.debug('iRacing token already replaced by a concurrent re-authentication');
        return true;
      }
      return this.requestHandshake();
    });
  }

  /**
   * Drops both tokens; the next request performs a handshake
   */
  clearTokens(): void {
    this.session.clearTokens();
  }

  /**
   * Gets token expiry information
   */
  getTokenInfo(): TokenInfo {
    const expiry = this.session.accessTokenExpiry;

    return {
      isAuthenticated: this.session.authenticated,
      isValid: this.session.hasValidToken(),
      hasRefreshToken: this.session.refreshToken !== undefined,
      expiresIn: expiry === undefined
        ? undefined
        : Math.max(0, expiry - this.session.clock.now())
    };
  }

  // Callers must hold the session mutex from here on

  private async requestHandshake(): Promise<boolean> {
    const { credentials } = this.config;

    logger.info('Authenticating with iRacing OAuth server');

    const params = new URLSearchParams({
      grant_type: 'password_limited',
      client_id: credentials.clientId,
      client_secret: maskSecret(credentials.clientSecret, credentials.clientId),
      username: credentials.username,
      password: maskSecret(credentials.password, credentials.username),
      scope: this.config.scope
    });

    const accepted = await this.postTokenRequest(params, 'handshake');
    if (!accepted) {
      this.session.clearTokens();
      return false;
    }

    logger.info('Successfully authenticated with iRacing API');
    return true;
  }

  private async requestRefresh(): Promise<boolean> {
    const refreshToken = this.session.refreshToken;
    if (!refreshToken) {
      return false;
    }

    logger.debug('Refreshing iRacing access token');

    const params = new URLSearchParams({
      grant_type: 'refresh_token',
      client_id: this.config.credentials.clientId,
      refresh_token: refreshToken
    });

    const accepted = await this.postTokenRequest(params, 'refresh');
    if (accepted) {
      logger.debug('Successfully refreshed iRacing access token');
    }
    return accepted;
  }

  /**
   * Posts a token request and stores the tokens only after a complete parse
   */
  private async postTokenRequest(
    params: URLSearchParams,
    grant: 'handshake' | 'refresh'
  ): Promise<boolean> {
    try {
      const response = await this.http.post(this.config.authUrl, params.toString(), {
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded'
        }
      });

      if (response.status !== 200) {
        logger.error('iRacing OAuth request rejected', {
          grant,
          status: response.status,
          body: truncateBody(response.data)
        });
        return false;
      }

      const parsed = TokenResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        logger.error('iRacing OAuth response could not be parsed', {
          grant,
          issues: parsed.error.issues.map(issue => issue.path.join('.'))
        });
        return false;
      }

      const lifetime = parsed.data.expires_in ?? this.config.defaultTokenLifetime;
      this.session.setTokens({
        accessToken: parsed.data.access_token,
        refreshToken: parsed.data.refresh_token,
        expiresAt: this.session.clock.now() + lifetime * 1000
      });
      return true;
    } catch (error) {
      logger.error('iRacing OAuth request failed', {
        grant,
        ...describeTransportError(error)
      });
      return false;
    }
  }
}
