import { describe, expect, it, vi } from 'vitest';

import { interfaceTypeForKinds, matchRule, matchingObjects, ruleSpecificity } from '@/lib/mapping/match-rule';
import { ROLE_DB, ROLE_WEB, SITE_DC1, SITE_DC2, makeDefaultRule, makeDevice, makeRule } from '@/test/fixtures';

vi.spyOn(console, 'log').mockImplementation(() => {});

const defaultRule = makeDefaultRule();
const prodWeb = makeRule({ id: 2, name: 'Prod-Web', siteIds: [SITE_DC1.id], roleIds: [ROLE_WEB.id] });

describe('matchRule', () => {
  it('picks the filtered rule for a matching object and the default otherwise', () => {
    const o = makeDevice({ id: 1, site: SITE_DC1, role: ROLE_WEB });
    const p = makeDevice({ id: 2, site: SITE_DC2, role: ROLE_WEB });

    expect(matchRule(o, 'any', [defaultRule, prodWeb]).name).toBe('Prod-Web');
    expect(matchRule(p, 'any', [defaultRule, prodWeb]).name).toBe('default');
  });

  it('prefers the rule with more matched filter dimensions', () => {
    const siteOnly = makeRule({ id: 3, name: 'DC1', siteIds: [SITE_DC1.id] });
    const o = makeDevice({ site: SITE_DC1, role: ROLE_WEB });

    expect(matchRule(o, 'any', [siteOnly, defaultRule, prodWeb]).id).toBe(prodWeb.id);
    expect(matchRule(makeDevice({ site: SITE_DC1, role: ROLE_DB }), 'any', [siteOnly, defaultRule, prodWeb]).id).toBe(
      siteOnly.id,
    );
  });

  it('raises on equally specific winners instead of picking one', () => {
    const dc1 = makeRule({ id: 3, name: 'DC1', siteIds: [SITE_DC1.id] });
    const web = makeRule({ id: 4, name: 'web', roleIds: [ROLE_WEB.id] });

    expect(() => matchRule(makeDevice(), 'any', [defaultRule, dc1, web])).toThrow(
      expect.objectContaining({ code: 'MAPPING_AMBIGUOUS', redacted_context: expect.objectContaining({ rule_ids: [3, 4] }) }),
    );
  });

  it('honors the interface type filter', () => {
    const snmpOnly = makeRule({ id: 5, name: 'snmp', siteIds: [SITE_DC1.id], interfaceType: 'snmp' });
    const o = makeDevice();

    expect(matchRule(o, 'snmp', [defaultRule, snmpOnly]).id).toBe(5);
    expect(matchRule(o, 'agent', [defaultRule, snmpOnly]).id).toBe(defaultRule.id);
    expect(matchRule(o, 'any', [defaultRule, snmpOnly]).id).toBe(defaultRule.id);
    expect(matchRule(o, 'agent', [defaultRule, prodWeb]).id).toBe(prodWeb.id);
  });

  it('ignores rules for the other object kind', () => {
    const vmRule = makeRule({ id: 6, objectKind: 'virtual_machine', siteIds: [SITE_DC1.id] });
    expect(matchRule(makeDevice(), 'any', [defaultRule, vmRule]).id).toBe(defaultRule.id);
  });

  it('treats objects without the filtered attribute as non-matching', () => {
    expect(matchRule(makeDevice({ role: null }), 'any', [defaultRule, prodWeb]).id).toBe(defaultRule.id);
  });

  it('fails without a default rule, and with more than one', () => {
    expect(() => matchRule(makeDevice(), 'any', [prodWeb])).toThrow(
      expect.objectContaining({ code: 'NO_DEFAULT_MAPPING' }),
    );
    expect(() => matchRule(makeDevice(), 'any', [defaultRule, makeDefaultRule({ id: 9 }), prodWeb])).toThrow(
      expect.objectContaining({ code: 'MULTIPLE_DEFAULT_MAPPINGS' }),
    );
  });
});

describe('ruleSpecificity / interfaceTypeForKinds', () => {
  it('counts non-empty filter sets', () => {
    expect(ruleSpecificity(defaultRule)).toBe(0);
    expect(ruleSpecificity(prodWeb)).toBe(2);
  });

  it('prefers agent, then snmp, then any', () => {
    expect(interfaceTypeForKinds(['snmp', 'agent'])).toBe('agent');
    expect(interfaceTypeForKinds(['snmp'])).toBe('snmp');
    expect(interfaceTypeForKinds([])).toBe('any');
  });
});

describe('matchingObjects', () => {
  const dc1 = makeRule({ id: 3, name: 'DC1', siteIds: [SITE_DC1.id] });
  const objects = [
    makeDevice({ id: 1, site: SITE_DC1, role: ROLE_WEB }),
    makeDevice({ id: 2, site: SITE_DC1, role: ROLE_DB }),
    makeDevice({ id: 3, site: SITE_DC2, role: ROLE_WEB }),
  ];
  const rules = [defaultRule, dc1, prodWeb];

  it('excludes objects claimed by a strictly more specific rule', () => {
    expect(matchingObjects(dc1, rules, objects).map((o) => o.ref.id)).toEqual([2]);
    expect(matchingObjects(prodWeb, rules, objects).map((o) => o.ref.id)).toEqual([1]);
  });

  it('returns what no filtered rule claims for the default rule', () => {
    expect(matchingObjects(defaultRule, rules, objects).map((o) => o.ref.id)).toEqual([3]);
  });
});
