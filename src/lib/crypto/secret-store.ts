import { decryptAes256Gcm } from '@/lib/crypto/aes-gcm';
import { ErrorCode } from '@/lib/errors/error-codes';

import type { AppError } from '@/lib/errors/error';

export type SecretName = 'api_token' | 'tls_psk';

export type SecretStore = {
  getSecret: (name: SecretName) => string;
};

/**
 * Secrets held as aes-256-gcm ciphertext; plaintext only exists for the duration of a call.
 */
export function createEncryptedSecretStore(input: {
  ciphertexts: Partial<Record<SecretName, string>>;
  keyB64Url?: string;
}): SecretStore {
  return {
    getSecret(name) {
      const ciphertext = input.ciphertexts[name];
      if (!ciphertext) {
        throw {
          code: ErrorCode.CONFIG_MISSING_API_CREDENTIALS,
          category: 'config',
          message: `secret ${name} is not configured`,
          retryable: false,
        } satisfies AppError;
      }

      try {
        return decryptAes256Gcm(ciphertext, input.keyB64Url);
      } catch (err) {
        throw {
          code: ErrorCode.CONFIG_SECRET_DECRYPT_FAILED,
          category: 'config',
          message: `secret ${name} could not be decrypted`,
          retryable: false,
          redacted_context: { cause: err instanceof Error ? err.message : String(err) },
        } satisfies AppError;
      }
    },
  };
}
