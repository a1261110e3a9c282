/**
 * Credential Cipher
 *
 * AES-256-GCM encryption for tenant secrets at rest. The encoded blob is
 * base64(nonce || ciphertext || authTag), so it carries everything needed to
 * decrypt except the key.
 */

import { createCipheriv, createDecipheriv, randomBytes } from 'crypto';
import { CipherKeyError, DecryptionError } from './errors.js';
import type { SecretCipher } from './types.js';

const ALGORITHM = 'aes-256-gcm';
const KEY_LENGTH = 32;
const NONCE_LENGTH = 12;
const TAG_LENGTH = 16;

export class CredentialCipher implements SecretCipher {
  private readonly key: Buffer;

  /**
   * @param key - exactly 32 bytes, as a Buffer or a UTF-8 string
   * @throws CipherKeyError when the key has the wrong length
   */
  constructor(key: string | Buffer) {
    const keyBytes = typeof key === 'string' ? Buffer.from(key, 'utf8') : Buffer.from(key);
    if (keyBytes.length !== KEY_LENGTH) {
      throw new CipherKeyError(keyBytes.length);
    }
    this.key = keyBytes;
  }

  encrypt(plaintext: string): string {
    const nonce = randomBytes(NONCE_LENGTH);
    const cipher = createCipheriv(ALGORITHM, this.key, nonce, { authTagLength: TAG_LENGTH });
    const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
    return Buffer.concat([nonce, ciphertext, cipher.getAuthTag()]).toString('base64');
  }

  /**
   * @throws DecryptionError on malformed input, wrong key or tampering
   */
  decrypt(encoded: string): string {
    const data = Buffer.from(encoded, 'base64');
    if (data.length < NONCE_LENGTH + TAG_LENGTH) {
      throw new DecryptionError('ciphertext too short');
    }

    const nonce = data.subarray(0, NONCE_LENGTH);
    const tag = data.subarray(data.length - TAG_LENGTH);
    const ciphertext = data.subarray(NONCE_LENGTH, data.length - TAG_LENGTH);

    try {
      const decipher = createDecipheriv(ALGORITHM, this.key, nonce, { authTagLength: TAG_LENGTH });
      decipher.setAuthTag(tag);
      return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString('utf8');
    } catch (error) {
      throw new DecryptionError('authentication failed', error);
    }
  }
}
