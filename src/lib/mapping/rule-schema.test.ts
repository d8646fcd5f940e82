import { describe, expect, it } from 'vitest';

import { assertRuleDeletable, validateMappingRule } from '@/lib/mapping/rule-schema';
import { makeDefaultRule, makeRule } from '@/test/fixtures';

function capture(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected function to throw');
}

describe('validateMappingRule', () => {
  it('fills defaults and dedupes id sets', () => {
    const draft = validateMappingRule({
      input: { name: ' Prod ', objectKind: 'device', siteIds: [1, 1, 2], templateIds: ['10001', '10001'] },
      existing: [],
    });

    expect(draft).toEqual({
      name: 'Prod',
      objectKind: 'device',
      isDefault: false,
      description: null,
      siteIds: [1, 2],
      roleIds: [],
      platformIds: [],
      interfaceType: 'any',
      hostGroupIds: [],
      templateIds: ['10001'],
      proxyId: null,
      proxyGroupId: null,
    });
  });

  it('requires at least one filter on a non-default rule', () => {
    const err = capture(() => validateMappingRule({ input: { name: 'x', objectKind: 'device' }, existing: [] }));
    expect(err).toMatchObject({
      code: 'VALIDATION_FAILED',
      details: [{ field: 'siteIds', issue: 'custom', message: 'non-default rule needs at least one filter' }],
    });
  });

  it('rejects filters on a default rule and proxy together with proxy group', () => {
    const err = capture(() =>
      validateMappingRule({
        input: { name: 'x', objectKind: 'device', isDefault: true, roleIds: [3], proxyId: '1', proxyGroupId: '2' },
        existing: [],
      }),
    );
    expect(err).toMatchObject({
      details: [
        { field: 'proxyGroupId', message: 'proxy and proxy group are mutually exclusive' },
        { field: 'isDefault', message: 'default rule cannot carry filters' },
      ],
    });
  });

  it('allows one default per object kind', () => {
    const existing = [makeDefaultRule({ id: 1 })];

    expect(() =>
      validateMappingRule({ input: { name: 'd2', objectKind: 'device', isDefault: true }, existing }),
    ).toThrow(expect.objectContaining({ code: 'VALIDATION_FAILED', message: 'a default device rule already exists' }));
    expect(validateMappingRule({ input: { name: 'd1', objectKind: 'device', isDefault: true }, existing, id: 1 }).isDefault).toBe(
      true,
    );
    expect(
      validateMappingRule({ input: { name: 'vm', objectKind: 'virtual_machine', isDefault: true }, existing }).objectKind,
    ).toBe('virtual_machine');
  });
});

describe('assertRuleDeletable', () => {
  it('rejects deleting the default rule', () => {
    expect(() => assertRuleDeletable(makeDefaultRule())).toThrow(
      expect.objectContaining({ code: 'VALIDATION_FAILED', message: 'default mapping rule cannot be deleted' }),
    );
    expect(() => assertRuleDeletable(makeRule({ id: 4, siteIds: [1] }))).not.toThrow();
  });
});
