import type { Database } from '../config/database';
import type { OAuthConnection, OAuthProvider, UpdateConnectionTokensInput } from '../types/oauth.types';

/**
 * Read/update access to the shared oauth_connections table.
 * Rows are created and deactivated by the connecting service; this side only touches
 * token fields and timestamps on an existing row.
 */
export interface ConnectionStore {
  findCanonical(userId: string, provider: OAuthProvider): Promise<OAuthConnection | null>;
  updateTokens(connectionId: string, input: UpdateConnectionTokensInput): Promise<void>;
  touchLastUsed(connectionId: string): Promise<void>;
}

type CanonicalRow = OAuthConnection & {
  active_count: string;
};

export class OAuthConnectionRepository implements ConnectionStore {
  constructor(private readonly db: Database) {}

  /**
   * Most recently created active row for (user, provider)
   */
  async findCanonical(userId: string, provider: OAuthProvider): Promise<OAuthConnection | null> {
    const result = await this.db.getPool().query<CanonicalRow>(
      `SELECT id, user_id, provider, access_token, refresh_token, expires_at,
              provider_metadata, is_active, created_at, updated_at, last_used_at,
              COUNT(*) OVER () AS active_count
       FROM oauth_connections
       WHERE user_id = $1
         AND provider = $2
         AND is_active = TRUE
       ORDER BY created_at DESC
       LIMIT 1`,
      [userId, provider]
    );

    const row = result.rows[0];
    if (!row) return null;

    const { active_count: activeCount, ...connection } = row;
    if (Number(activeCount) > 1) {
      console.warn(
        `⚠️  ${activeCount} active ${provider} connections for user ${userId}; using newest (${connection.id})`
      );
    }

    return connection;
  }

  /**
   * Write re-encrypted tokens after a refresh
   */
  async updateTokens(connectionId: string, input: UpdateConnectionTokensInput): Promise<void> {
    await this.db.getPool().query(
      `UPDATE oauth_connections
       SET access_token = $1, refresh_token = $2, expires_at = $3, updated_at = NOW()
       WHERE id = $4`,
      [input.access_token, input.refresh_token, input.expires_at, connectionId]
    );
  }

  async touchLastUsed(connectionId: string): Promise<void> {
    await this.db.getPool().query(
      'UPDATE oauth_connections SET last_used_at = NOW() WHERE id = $1',
      [connectionId]
    );
  }
}
