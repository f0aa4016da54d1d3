/**
 * Artifact encryption: AES-256-GCM with a fresh random key per artifact.
 *
 * Sealed layout: 12-byte nonce, ciphertext, 16-byte auth tag. The key travels
 * separately as base64 and is what the job records as its encryption-key
 * reference.
 */
import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto';

const ALGORITHM = 'aes-256-gcm';
const KEY_BYTES = 32;
const NONCE_BYTES = 12;
const TAG_BYTES = 16;

export class DecryptionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DecryptionError';
  }
}

export interface EncryptedArtifact {
  data: Buffer;
  /** Base64 AES-256 key */
  key: string;
}

export function generateKey(): string {
  return randomBytes(KEY_BYTES).toString('base64');
}

export function encryptArtifact(plaintext: string | Buffer, key: string = generateKey()): EncryptedArtifact {
  const keyBytes = decodeKey(key);
  const nonce = randomBytes(NONCE_BYTES);
  const cipher = createCipheriv(ALGORITHM, keyBytes, nonce);
  const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
  return { data: Buffer.concat([nonce, ciphertext, cipher.getAuthTag()]), key };
}

/**
 * @throws {DecryptionError} wrong key, truncated or tampered data
 */
export function decryptArtifact(data: Buffer, key: string): Buffer {
  const keyBytes = decodeKey(key);
  if (data.length < NONCE_BYTES + TAG_BYTES) {
    throw new DecryptionError('Encrypted data too short');
  }
  const nonce = data.subarray(0, NONCE_BYTES);
  const tag = data.subarray(data.length - TAG_BYTES);
  const ciphertext = data.subarray(NONCE_BYTES, data.length - TAG_BYTES);

  const decipher = createDecipheriv(ALGORITHM, keyBytes, nonce);
  decipher.setAuthTag(tag);
  try {
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
  } catch {
    throw new DecryptionError('Decryption failed: invalid key or corrupted data');
  }
}

function decodeKey(key: string): Buffer {
  const bytes = Buffer.from(key, 'base64');
  if (bytes.length !== KEY_BYTES) {
    throw new DecryptionError(`Invalid key length: expected ${KEY_BYTES} bytes, got ${bytes.length}`);
  }
  return bytes;
}
