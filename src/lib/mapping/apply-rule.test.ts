import { describe, expect, it } from 'vitest';

import { applyRule } from '@/lib/mapping/apply-rule';
import { makeHostConfig, makeRule } from '@/test/fixtures';

const rule = makeRule({ id: 2, siteIds: [1], hostGroupIds: ['2', '7'], templateIds: ['10001', '10050'], proxyId: '55' });

describe('applyRule', () => {
  it('unions groups and templates so local additions survive', () => {
    const hc = makeHostConfig({ hostGroupIds: ['2', '99'], templateIds: ['20000'] });
    const applied = applyRule(hc, rule);

    expect(applied.hostGroupIds).toEqual(['2', '99', '7']);
    expect(applied.templateIds).toEqual(['20000', '10001', '10050']);
    expect(applied.monitoredBy).toBe('proxy');
    expect(applied.proxyId).toBe('55');
    expect(applied.proxyGroupId).toBeNull();
  });

  it('is idempotent', () => {
    const once = applyRule(makeHostConfig(), rule);
    expect(applyRule(once, rule)).toEqual(once);
  });

  it('does not mutate its input', () => {
    const hc = makeHostConfig({ hostGroupIds: ['2'] });
    applyRule(hc, rule);
    expect(hc.hostGroupIds).toEqual(['2']);
  });

  it('switches to proxy group mode and clears a stale proxy', () => {
    const groupRule = makeRule({ id: 3, siteIds: [1], proxyGroupId: '8' });
    const applied = applyRule(makeHostConfig({ monitoredBy: 'proxy', proxyId: '55' }), groupRule);

    expect(applied).toMatchObject({ monitoredBy: 'proxy_group', proxyId: null, proxyGroupId: '8' });
  });

  it('honors an explicit override', () => {
    const applied = applyRule(makeHostConfig(), rule, 'direct');
    expect(applied).toMatchObject({ monitoredBy: 'direct', proxyId: null, proxyGroupId: null });
  });

  it('rejects an override the rule cannot satisfy', () => {
    expect(() => applyRule(makeHostConfig(), rule, 'proxy_group')).toThrow(
      expect.objectContaining({ code: 'VALIDATION_FAILED', details: [{ field: 'monitoredBy', issue: 'proxy_group_missing' }] }),
    );
  });
});
