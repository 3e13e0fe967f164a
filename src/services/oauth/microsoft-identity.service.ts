import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { AppConfig } from '../../config';
import { ReauthNeededError } from '../../errors/mailbox.errors';
import type { RefreshedTokens } from '../../types/oauth.types';

const TOKEN_REQUEST_TIMEOUT_MS = 15_000;

// Microsoft access tokens last one hour when expires_in is omitted
const DEFAULT_EXPIRES_IN_SECONDS = 3600;

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).optional(),
  expires_in: z.coerce.number().positive().optional(),
});

export interface IdentityProvider {
  refresh(refreshToken: string): Promise<RefreshedTokens>;
}

/**
 * Microsoft identity platform (v2.0 token endpoint)
 * One refresh_token grant per call, no retries.
 */
export class MicrosoftIdentityService implements IdentityProvider {
  private readonly http: AxiosInstance;

  constructor(
    private readonly settings: AppConfig['microsoft'],
    http?: AxiosInstance
  ) {
    this.http = http ?? axios.create({ timeout: TOKEN_REQUEST_TIMEOUT_MS });
  }

  /**
   * Exchange a refresh token for a new access token
   * Any non-success outcome means the user has to go through consent again.
   */
  async refresh(refreshToken: string): Promise<RefreshedTokens> {
    const body = new URLSearchParams({
      grant_type: 'refresh_token',
      refresh_token: refreshToken,
      client_id: this.settings.clientId,
      client_secret: this.settings.clientSecret,
      scope: this.settings.scopes.join(' '),
    });

    let status: number;
    let data: unknown;
    try {
      const response = await this.http.post<unknown>(this.settings.tokenUrl, body.toString(), {
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        validateStatus: () => true,
      });
      status = response.status;
      data = response.data;
    } catch (error) {
      const reason = axios.isAxiosError(error) ? error.code : undefined;
      console.error(`Token refresh request failed${reason ? ` (${reason})` : ''}`);
      throw new ReauthNeededError('Token refresh failed. Please reconnect.');
    }

    if (status < 200 || status >= 300) {
      console.error(`Token refresh failed: ${status}`);
      throw new ReauthNeededError('Token refresh failed. Please reconnect.');
    }

    const parsed = tokenResponseSchema.safeParse(data);
    if (!parsed.success) {
      console.error('Token refresh failed: unexpected response body');
      throw new ReauthNeededError('Token refresh failed. Please reconnect.');
    }

    return {
      accessToken: parsed.data.access_token,
      refreshToken: parsed.data.refresh_token ?? null,
      expiresIn: parsed.data.expires_in ?? DEFAULT_EXPIRES_IN_SECONDS,
    };
  }
}
