import { describe, expect, it } from 'vitest';

import { ErrorCode } from '@/lib/errors/error-codes';

describe('ErrorCode', () => {
  it('uses the key as the wire value', () => {
    for (const [key, value] of Object.entries(ErrorCode)) expect(value).toBe(key);
  });

  it('includes PARTIAL_PROVISIONING_FAILURE', () => {
    expect(ErrorCode.PARTIAL_PROVISIONING_FAILURE).toBe('PARTIAL_PROVISIONING_FAILURE');
  });
});
