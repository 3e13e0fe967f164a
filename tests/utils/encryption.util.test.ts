import { describe, it, expect } from 'vitest';
import { EncryptionUtil, decodeFernetKey } from '../../src/utils/encryption.util';

// Published Fernet test vector: "hello", IV 0..15, issued 1985-10-26T08:20:00Z
const VECTOR_KEY = 'cw_0x689RpI-jtRR7oE8h_eQsKImvJapLeSbXpwF4e4=';
const VECTOR_TOKEN =
  'gAAAAAAdwJ6wAAECAwQFBgcICQoLDA0ODy021cpGVWKZ_eEwCGM4BLLF_5CV9dOPmrhuVUPgJobwOz7JcbmrR64jVmpU4IwqDA==';
const VECTOR_IV = Buffer.from(Array.from({ length: 16 }, (_, index) => index));

describe('EncryptionUtil', () => {
  const encryption = new EncryptionUtil('dGVzdC1zZWNyZXQtZmVybmV0LWtleS0wMDAwMDAwMDA=');

  it('should decrypt a token written by another Fernet implementation', () => {
    expect(new EncryptionUtil(VECTOR_KEY).decrypt(VECTOR_TOKEN)).toBe('hello');
  });

  it('should produce the same token for the same IV and timestamp', () => {
    const token = new EncryptionUtil(VECTOR_KEY).encrypt('hello', {
      iv: VECTOR_IV,
      issuedAt: new Date('1985-10-26T01:20:00-07:00'),
    });

    expect(token).toBe(VECTOR_TOKEN);
  });

  it('should decrypt what it encrypted', () => {
    const stored = encryption.encrypt('plain-token-text');

    expect(stored.startsWith('gAAAAA')).toBe(true);
    expect(stored).not.toContain('plain-token-text');
    expect(encryption.decrypt(stored)).toBe('plain-token-text');
  });

  it('should use a fresh IV for every encryption', () => {
    expect(encryption.encrypt('same-text')).not.toBe(encryption.encrypt('same-text'));
  });

  it('should reject a token produced with another key', () => {
    const other = new EncryptionUtil('YW5vdGhlci1zZWNyZXQtZmVybmV0LWtleS0xMTExMTE=');
    const stored = other.encrypt('plain-token-text');

    expect(() => encryption.decrypt(stored)).toThrow('Invalid Fernet token signature');
  });

  it('should reject a token with a modified ciphertext byte', () => {
    const bytes = Buffer.from(encryption.encrypt('plain-token-text'), 'base64url');
    bytes.writeUInt8(bytes.readUInt8(30) ^ 0x01, 30);

    expect(() => encryption.decrypt(bytes.toString('base64url'))).toThrow('Invalid Fernet token signature');
  });

  it('should reject text that is not a Fernet token', () => {
    expect(() => encryption.decrypt('not a token')).toThrow('Invalid Fernet token');
    expect(() => encryption.decrypt(JSON.stringify({ encrypted: 'abcd' }))).toThrow('Invalid Fernet token');
    expect(() => encryption.decrypt('gAAAAAAdwJ6w')).toThrow('Invalid Fernet token');
  });

  it('should reject keys that do not decode to 32 bytes', () => {
    expect(() => decodeFernetKey('test-secret-key-with-at-least-32-chars')).toThrow(
      'Fernet key must be 32 url-safe base64-encoded bytes'
    );
    expect(decodeFernetKey(VECTOR_KEY)).toHaveLength(32);
  });
});
