import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto';

const FORMAT_VERSION = 'v1';

function requireKeyBytes(keyB64Url?: string) {
  // No serverEnv import: callers in tests pass an explicit key without full env validation.
  const raw = keyB64Url ?? process.env.SECRET_ENCRYPTION_KEY;
  if (!raw) throw new Error('SECRET_ENCRYPTION_KEY is required');

  const key = Buffer.from(raw, 'base64url');
  if (key.length !== 32) throw new Error('SECRET_ENCRYPTION_KEY must be base64url encoded 32 bytes');
  return key;
}

/** Output format: `v1:<nonce>:<ciphertext>:<tag>`, each part base64url. */
export function encryptAes256Gcm(plaintextUtf8: string, keyB64Url?: string) {
  const key = requireKeyBytes(keyB64Url);
  const nonce = randomBytes(12);

  const cipher = createCipheriv('aes-256-gcm', key, nonce);
  const ciphertext = Buffer.concat([cipher.update(plaintextUtf8, 'utf8'), cipher.final()]);
  const tag = cipher.getAuthTag();

  return [FORMAT_VERSION, nonce, ciphertext, tag].map((p) => (typeof p === 'string' ? p : p.toString('base64url'))).join(':');
}

export function decryptAes256Gcm(ciphertext: string, keyB64Url?: string) {
  const key = requireKeyBytes(keyB64Url);

  const [v, nonceB64, cipherB64, tagB64] = ciphertext.split(':');
  if (v !== FORMAT_VERSION || !nonceB64 || !cipherB64 || !tagB64) throw new Error('Invalid ciphertext format');

  const decipher = createDecipheriv('aes-256-gcm', key, Buffer.from(nonceB64, 'base64url'));
  decipher.setAuthTag(Buffer.from(tagB64, 'base64url'));

  const plaintext = Buffer.concat([decipher.update(Buffer.from(cipherB64, 'base64url')), decipher.final()]);
  return plaintext.toString('utf8');
}
