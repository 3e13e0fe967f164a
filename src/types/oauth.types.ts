export const MICROSOFT_PROVIDER = 'microsoft';

export type OAuthProvider = typeof MICROSOFT_PROVIDER;

/**
 * OAuth connection row from the shared store (tokens encrypted)
 * provider_metadata belongs to the service that writes the row and is never read here.
 * Declared as a type alias so it satisfies pg's QueryResultRow index signature.
 */
export type OAuthConnection = {
  id: string;
  user_id: string;
  provider: OAuthProvider;
  access_token: string; // Fernet token
  refresh_token: string; // Fernet token
  expires_at: Date | string | null;
  provider_metadata: unknown;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
  last_used_at: Date | null;
};

/**
 * Re-encrypted token fields written back after a refresh
 */
export interface UpdateConnectionTokensInput {
  access_token: string;
  refresh_token: string;
  expires_at: Date;
}

/**
 * Decrypted access token for one request. Never persisted, never logged.
 */
export interface IssuedToken {
  accessToken: string;
  userId: string;
  expiresAt: Date;
}

/**
 * Tokens returned by the identity provider on a refresh_token grant
 */
export interface RefreshedTokens {
  accessToken: string;
  refreshToken: string | null;
  expiresIn: number;
}
