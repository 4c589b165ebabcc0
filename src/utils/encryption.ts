import { createCipheriv, createDecipheriv, pbkdf2Sync, randomBytes } from 'node:crypto';

/**
 * Reversible content cipher for notes.
 * Output layout (base64): salt + iv + authTag + ciphertext.
 */

const ALGORITHM = 'aes-256-gcm';
const SALT_LENGTH = 16;
const IV_LENGTH = 12;
const AUTH_TAG_LENGTH = 16;
const KEY_LENGTH = 32;
const ITERATIONS = 100000;

/**
 * Derive encryption key from passphrase using PBKDF2
 */
function deriveKey(passphrase: string, salt: Buffer, iterations: number): Buffer {
  return pbkdf2Sync(passphrase, salt, iterations, KEY_LENGTH, 'sha256');
}

export function encryptContent(plaintext: string, passphrase: string, iterations: number = ITERATIONS): string {
  const salt = randomBytes(SALT_LENGTH);
  const iv = randomBytes(IV_LENGTH);
  const key = deriveKey(passphrase, salt, iterations);

  const cipher = createCipheriv(ALGORITHM, key, iv);
  const encrypted = Buffer.concat([cipher.update(plaintext, 'utf-8'), cipher.final()]);
  const authTag = cipher.getAuthTag();

  return Buffer.concat([salt, iv, authTag, encrypted]).toString('base64');
}

/**
 * Decrypt content produced by encryptContent.
 * Returns null when the passphrase is wrong or the payload is not ours.
 */
export function decryptContent(
  encryptedData: string,
  passphrase: string,
  iterations: number = ITERATIONS
): string | null {
  const buffer = Buffer.from(encryptedData, 'base64');
  if (buffer.length < SALT_LENGTH + IV_LENGTH + AUTH_TAG_LENGTH) {
    return null;
  }

  let offset = 0;
  const salt = buffer.subarray(offset, offset + SALT_LENGTH);
  offset += SALT_LENGTH;
  const iv = buffer.subarray(offset, offset + IV_LENGTH);
  offset += IV_LENGTH;
  const authTag = buffer.subarray(offset, offset + AUTH_TAG_LENGTH);
  offset += AUTH_TAG_LENGTH;
  const ciphertext = buffer.subarray(offset);

  const decipher = createDecipheriv(ALGORITHM, deriveKey(passphrase, salt, iterations), iv);
  decipher.setAuthTag(authTag);
  try {
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString('utf-8');
  } catch {
    return null;
  }
}
