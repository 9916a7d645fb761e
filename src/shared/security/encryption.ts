/**
 * src/shared/security/encryption.ts
 *
 * WHY:
 * - Users store their LLM provider API keys on the account record. Those keys
 *   must be encrypted at rest (AES-256-GCM).
 *
 * FORMAT:
 * - base64(iv || authTag || ciphertext)
 * - iv: 12 bytes, authTag: 16 bytes
 *
 * KEY:
 * - SETTINGS_ENCRYPTION_KEY_BASE64: a base64-encoded 32-byte key.
 *   Generate with: openssl rand -base64 32
 *
 * STORED VALUES:
 * - seal() returns `enc:<payload>`; open() tells apart sealed values, plaintext
 *   left over from before encryption, and values that fail to decrypt.
 *
 * RULES:
 * - A new random IV for every encrypt() call.
 * - decrypt() throws on a tampered or foreign ciphertext; callers decide what to do.
 */

import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 12; // bytes — GCM standard
const TAG_LENGTH = 16; // bytes — GCM auth tag

export const ENCRYPTED_PREFIX = 'enc:';

export type OpenedValue =
  | { kind: 'decrypted'; value: string }
  | { kind: 'plaintext'; value: string }
  | { kind: 'undecryptable'; reason: string };

export function isSealed(stored: string): boolean {
  return stored.startsWith(ENCRYPTED_PREFIX);
}

export class EncryptionService {
  private readonly key: Buffer;

  constructor(base64Key: string) {
    this.key = Buffer.from(base64Key, 'base64');

    if (this.key.length !== 32) {
      throw new Error(
        `EncryptionService: key must be 32 bytes (256 bits). Got ${this.key.length} bytes. ` +
          'Generate with: openssl rand -base64 32',
      );
    }
  }

  encrypt(plaintext: string): string {
    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv(ALGORITHM, this.key, iv, { authTagLength: TAG_LENGTH });

    const encrypted = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
    const authTag = cipher.getAuthTag();

    // Pack: iv (12) || authTag (16) || ciphertext (n)
    const packed = Buffer.concat([iv, authTag, encrypted]);
    return packed.toString('base64');
  }

  decrypt(packed64: string): string {
    const packed = Buffer.from(packed64, 'base64');

    if (packed.length < IV_LENGTH + TAG_LENGTH) {
      throw new Error('EncryptionService: ciphertext too short to be valid');
    }

    const iv = packed.subarray(0, IV_LENGTH);
    const authTag = packed.subarray(IV_LENGTH, IV_LENGTH + TAG_LENGTH);
    const ciphertext = packed.subarray(IV_LENGTH + TAG_LENGTH);

    const decipher = createDecipheriv(ALGORITHM, this.key, iv, { authTagLength: TAG_LENGTH });
    decipher.setAuthTag(authTag);

    const decrypted = Buffer.concat([decipher.update(ciphertext), decipher.final()]);
    return decrypted.toString('utf8');
  }

  seal(plaintext: string): string {
    return `${ENCRYPTED_PREFIX}${this.encrypt(plaintext)}`;
  }

  open(stored: string): OpenedValue {
    if (!isSealed(stored)) return { kind: 'plaintext', value: stored };

    try {
      return { kind: 'decrypted', value: this.decrypt(stored.slice(ENCRYPTED_PREFIX.length)) };
    } catch (err) {
      return { kind: 'undecryptable', reason: err instanceof Error ? err.message : String(err) };
    }
  }
}
