import dotenv from 'dotenv';
import { decodeFernetKey } from '../utils/encryption.util';

dotenv.config();

export interface AppConfig {
  nodeEnv: string;
  port: number;

  databaseUrl: string;

  // Fernet key; must match the service that writes oauth_connections
  encryptionKey: string;

  microsoft: {
    clientId: string;
    clientSecret: string;
    tenantId: string;
    tokenUrl: string;
    scopes: string[];
  };

  graph: {
    baseUrl: string;
    timeoutMs: number;
    emailListFields: string;
    emailDetailFields: string;
  };
}

const MICROSOFT_LOGIN_URL = 'https://login.microsoftonline.com';

export class ConfigError extends Error {
  constructor(public readonly missing: string[], message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Build the service configuration from environment variables.
 * Takes the env explicitly so tests can build configs without touching process.env.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const tenantId = env.MICROSOFT_TENANT_ID || 'common';

  return {
    // Server
    nodeEnv: env.NODE_ENV || 'development',
    port: parseInt(env.PORT || '8002', 10),

    // Database
    databaseUrl: env.DATABASE_URL || '',

    // Encryption (for OAuth tokens)
    encryptionKey: env.ENCRYPTION_KEY || '',

    // Microsoft OAuth
    microsoft: {
      clientId: env.MICROSOFT_CLIENT_ID || '',
      clientSecret: env.MICROSOFT_CLIENT_SECRET || '',
      tenantId,
      tokenUrl: `${MICROSOFT_LOGIN_URL}/${tenantId}/oauth2/v2.0/token`,
      scopes: ['offline_access', 'User.Read', 'Mail.Read'],
    },

    // Microsoft Graph
    graph: {
      baseUrl: 'https://graph.microsoft.com/v1.0',
      timeoutMs: 30_000,
      emailListFields:
        'id,subject,from,toRecipients,ccRecipients,receivedDateTime,bodyPreview,hasAttachments,importance,isRead',
      emailDetailFields:
        'id,subject,from,toRecipients,ccRecipients,bccRecipients,receivedDateTime,bodyPreview,body,hasAttachments,importance,isRead',
    },
  };
}

// Validation: Check required settings
export function validateConfig(cfg: AppConfig): void {
  const required: Array<[string, string]> = [
    ['DATABASE_URL', cfg.databaseUrl],
    ['ENCRYPTION_KEY', cfg.encryptionKey],
    ['MICROSOFT_CLIENT_ID', cfg.microsoft.clientId],
    ['MICROSOFT_CLIENT_SECRET', cfg.microsoft.clientSecret],
  ];

  const missing = required.filter(([, value]) => !value).map(([key]) => key);

  if (missing.length > 0) {
    throw new ConfigError(missing, `Missing required environment variables: ${missing.join(', ')}`);
  }

  try {
    decodeFernetKey(cfg.encryptionKey);
  } catch {
    throw new ConfigError([], 'ENCRYPTION_KEY must be a Fernet key (32 url-safe base64-encoded bytes)');
  }

  if (!Number.isInteger(cfg.port) || cfg.port < 1 || cfg.port > 65535) {
    throw new ConfigError([], `PORT must be between 1 and 65535, got ${cfg.port}`);
  }
}
