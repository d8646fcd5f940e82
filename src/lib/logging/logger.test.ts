import { describe, expect, it, vi } from 'vitest';

import { logEvent } from '@/lib/logging/logger';

describe('logEvent', () => {
  it('emits a single JSON line and truncates *_excerpt fields', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});

    logEvent({
      level: 'warn',
      service: 'engine',
      event_type: 'remote.call_failed',
      host_config_id: 7,
      remote: { body_excerpt: 'x'.repeat(3000) },
    });

    expect(spy).toHaveBeenCalledTimes(1);
    const line = spy.mock.calls[0]?.[0];
    expect(typeof line).toBe('string');

    const obj = JSON.parse(String(line)) as Record<string, unknown>;
    expect(obj.event_type).toBe('remote.call_failed');
    expect(obj.level).toBe('warn');
    expect(obj.host_config_id).toBe(7);
    expect(typeof obj.ts).toBe('string');
    expect(obj.remote).toEqual({ body_excerpt: 'x'.repeat(2000) });

    spy.mockRestore();
  });
});
