import { DecryptionFailedError, NotConnectedError } from '../../errors/mailbox.errors';
import type { ConnectionStore } from '../../repositories/oauth-connection.repository';
import { MICROSOFT_PROVIDER, type IssuedToken, type OAuthConnection } from '../../types/oauth.types';
import type { EncryptionUtil } from '../../utils/encryption.util';
import { KeyedMutex } from '../../utils/keyed-mutex';
import type { IdentityProvider } from './microsoft-identity.service';

// Refresh tokens 5 minutes before expiry
export const REFRESH_WINDOW_MS = 300 * 1000;

export interface TokenManagerDeps {
  store: ConnectionStore;
  identity: IdentityProvider;
  encryption: EncryptionUtil;
  locks?: KeyedMutex;
  now?: () => Date;
}

/**
 * Per-user Microsoft token lifecycle: decrypt, check expiry, refresh, persist.
 *
 * Every call for a user runs under that user's lock and reads the store fresh, so a caller
 * queued behind a refresh sees the refreshed row instead of refreshing again.
 */
export class TokenManager {
  private readonly store: ConnectionStore;
  private readonly identity: IdentityProvider;
  private readonly encryption: EncryptionUtil;
  private readonly locks: KeyedMutex;
  private readonly now: () => Date;

  constructor(deps: TokenManagerDeps) {
    this.store = deps.store;
    this.identity = deps.identity;
    this.encryption = deps.encryption;
    this.locks = deps.locks ?? new KeyedMutex();
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Get a valid Microsoft token for the user, refreshing if needed
   */
  async getToken(userId: string): Promise<IssuedToken> {
    return this.locks.runExclusive(userId, async () => {
      const connection = await this.store.findCanonical(userId, MICROSOFT_PROVIDER);
      if (!connection) {
        throw new NotConnectedError(userId);
      }

      const { accessToken, refreshToken } = this.decryptTokens(connection, userId);

      let issued: IssuedToken = {
        accessToken,
        userId,
        expiresAt: toUtcDate(connection.expires_at),
      };

      if (issued.expiresAt.getTime() - this.now().getTime() < REFRESH_WINDOW_MS) {
        console.log(`🔄 Refreshing Microsoft token for user ${userId}`);
        issued = await this.refresh(connection.id, userId, refreshToken);
      }

      await this.store.touchLastUsed(connection.id);

      return issued;
    });
  }

  private decryptTokens(
    connection: OAuthConnection,
    userId: string
  ): { accessToken: string; refreshToken: string } {
    try {
      return {
        accessToken: this.encryption.decrypt(connection.access_token),
        refreshToken: this.encryption.decrypt(connection.refresh_token),
      };
    } catch {
      // The underlying error is left out: it can echo parts of the stored value
      console.error(`Token decryption failed for user ${userId} (connection ${connection.id})`);
      throw new DecryptionFailedError();
    }
  }

  private async refresh(connectionId: string, userId: string, refreshToken: string): Promise<IssuedToken> {
    const refreshed = await this.identity.refresh(refreshToken);

    // Microsoft may omit refresh_token; the previous one stays valid
    const nextRefreshToken = refreshed.refreshToken ?? refreshToken;
    const expiresAt = new Date(this.now().getTime() + refreshed.expiresIn * 1000);

    await this.store.updateTokens(connectionId, {
      access_token: this.encryption.encrypt(refreshed.accessToken),
      refresh_token: this.encryption.encrypt(nextRefreshToken),
      expires_at: expiresAt,
    });

    console.log(`✓ Microsoft token refreshed for user ${userId}`);

    return { accessToken: refreshed.accessToken, userId, expiresAt };
  }
}

/**
 * Stored expiry as a UTC instant. pg hands back a Date (naive timestamps are parsed as UTC in
 * config/database); a zone-less string is read as UTC, and a missing or invalid expiry counts
 * as already expired.
 */
export function toUtcDate(value: Date | string | null): Date {
  if (value === null) return new Date(0);
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? new Date(0) : value;

  const hasZone = /(Z|[+-]\d{2}(:?\d{2})?)$/i.test(value.trim());
  const parsed = new Date(hasZone ? value : `${value.trim().replace(' ', 'T')}Z`);
  return Number.isNaN(parsed.getTime()) ? new Date(0) : parsed;
}
