process.env.SKIP_ENV_VALIDATION = 'true';

// Stable key for tests that exercise secret decryption.
process.env.SECRET_ENCRYPTION_KEY ??= Buffer.alloc(32, 7).toString('base64url');
