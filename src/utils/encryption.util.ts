import crypto from 'crypto';

const VERSION = 0x80;
const IV_LENGTH = 16;
const HMAC_LENGTH = 32;
// version (1) + timestamp (8) + iv (16)
const HEADER_LENGTH = 1 + 8 + IV_LENGTH;
const BLOCK_SIZE = 16;

const URL_SAFE_BASE64 = /^[A-Za-z0-9_-]+={0,2}$/;

export interface EncryptOptions {
  iv?: Buffer;
  issuedAt?: Date;
}

/**
 * Decode a Fernet key: 32 bytes, url-safe base64
 */
export function decodeFernetKey(key: string): Buffer {
  const raw = URL_SAFE_BASE64.test(key) ? Buffer.from(key, 'base64url') : Buffer.alloc(0);
  if (raw.length !== 32) {
    throw new Error('Fernet key must be 32 url-safe base64-encoded bytes');
  }
  return raw;
}

// Padded url-safe base64, the form other Fernet implementations expect
function toUrlSafeBase64(data: Buffer): string {
  return data.toString('base64').replace(/\+/g, '-').replace(/\//g, '_');
}

/**
 * Encryption utility for OAuth tokens using Fernet
 * AES-128-CBC with an HMAC-SHA256 over version, timestamp, IV and ciphertext.
 *
 * Rows in oauth_connections are written by another service with the same key, so the
 * stored column is a plain Fernet token.
 */
export class EncryptionUtil {
  private readonly signingKey: Buffer;
  private readonly encryptionKey: Buffer;

  constructor(key: string) {
    const raw = decodeFernetKey(key);
    this.signingKey = raw.subarray(0, 16);
    this.encryptionKey = raw.subarray(16);
  }

  /**
   * Encrypt plaintext into a Fernet token
   */
  encrypt(plaintext: string, options: EncryptOptions = {}): string {
    const iv = options.iv ?? crypto.randomBytes(IV_LENGTH);
    const issuedAt = options.issuedAt ?? new Date();

    const cipher = crypto.createCipheriv('aes-128-cbc', this.encryptionKey, iv);
    const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);

    const timestamp = Buffer.alloc(8);
    timestamp.writeBigUInt64BE(BigInt(Math.floor(issuedAt.getTime() / 1000)));

    const body = Buffer.concat([Buffer.from([VERSION]), timestamp, iv, ciphertext]);
    return toUrlSafeBase64(Buffer.concat([body, this.sign(body)]));
  }

  /**
   * Decrypt a Fernet token
   * Throws if the token is malformed or the HMAC doesn't match (wrong key or tampered token)
   */
  decrypt(token: string): string {
    const data = URL_SAFE_BASE64.test(token) ? Buffer.from(token, 'base64url') : Buffer.alloc(0);

    const ciphertextLength = data.length - HEADER_LENGTH - HMAC_LENGTH;
    if (data[0] !== VERSION || ciphertextLength < BLOCK_SIZE || ciphertextLength % BLOCK_SIZE !== 0) {
      throw new Error('Invalid Fernet token');
    }

    const body = data.subarray(0, data.length - HMAC_LENGTH);
    const mac = data.subarray(data.length - HMAC_LENGTH);
    if (!crypto.timingSafeEqual(this.sign(body), mac)) {
      throw new Error('Invalid Fernet token signature');
    }

    const iv = data.subarray(HEADER_LENGTH - IV_LENGTH, HEADER_LENGTH);
    const decipher = crypto.createDecipheriv('aes-128-cbc', this.encryptionKey, iv);

    return Buffer.concat([decipher.update(body.subarray(HEADER_LENGTH)), decipher.final()]).toString('utf8');
  }

  private sign(body: Buffer): Buffer {
    return crypto.createHmac('sha256', this.signingKey).update(body).digest();
  }
}
