import { describe, expect, test } from 'vitest';
import { resolveAttribute } from '../lib/attribute-resolver.js';

const device = {
  id: 17,
  name: 'sw01',
  serial: 'FOC1234X',
  asset_tag: null,
  role: { id: 2, name: 'Access Switch' },
  primary_ip4: { address: '10.0.0.5/24' },
  primary_ip6: { address: '2001:db8::5/64' },
  custom_fields: { cmdb_id: 'CI0042', secondary_serials: ['SN-A', 'SN-B'], rack_unit: 12, managed: true },
  tags: [{ name: 'core' }, { name: 'dc1' }],
  installed: new Date('2024-01-15T00:00:00.000Z'),
};

describe('resolveAttribute', () => {
  test('resolves top-level scalars', () => {
    expect(resolveAttribute(device, 'name')).toBe('sw01');
    expect(resolveAttribute(device, 'id')).toBe('17');
  });

  test('resolves nested paths', () => {
    expect(resolveAttribute(device, 'role.name')).toBe('Access Switch');
    expect(resolveAttribute(device, 'custom_fields.cmdb_id')).toBe('CI0042');
  });

  test('stringifies numbers and booleans', () => {
    expect(resolveAttribute(device, 'custom_fields.rack_unit')).toBe('12');
    expect(resolveAttribute(device, 'custom_fields.managed')).toBe('true');
  });

  test('strips the prefix length from IP interfaces', () => {
    expect(resolveAttribute(device, 'primary_ip4.address')).toBe('10.0.0.5');
    expect(resolveAttribute(device, 'primary_ip6.address')).toBe('2001:db8::5');
  });

  test('leaves other slashed values alone', () => {
    expect(resolveAttribute({ path: 'rack/12' }, 'path')).toBe('rack/12');
  });

  test('joins scalar lists with commas', () => {
    expect(resolveAttribute(device, 'custom_fields.secondary_serials')).toBe('SN-A,SN-B');
  });

  test('indexes into arrays', () => {
    expect(resolveAttribute(device, 'tags.1.name')).toBe('dc1');
    expect(resolveAttribute(device, 'tags.5.name')).toBeUndefined();
  });

  test('formats dates as ISO strings', () => {
    expect(resolveAttribute(device, 'installed')).toBe('2024-01-15T00:00:00.000Z');
  });

  test('resolves through maps', () => {
    const record = { meta: new Map([['owner', 'noc']]) };
    expect(resolveAttribute(record, 'meta.owner')).toBe('noc');
  });

  test('returns undefined for null and missing values', () => {
    expect(resolveAttribute(device, 'asset_tag')).toBeUndefined();
    expect(resolveAttribute(device, 'tenant.name')).toBeUndefined();
    expect(resolveAttribute(device, 'role.missing')).toBeUndefined();
  });

  test('returns undefined for object leaves', () => {
    expect(resolveAttribute(device, 'role')).toBeUndefined();
  });

  test('does not traverse scalars', () => {
    expect(resolveAttribute(device, 'name.length')).toBeUndefined();
  });

  test('ignores inherited properties', () => {
    expect(resolveAttribute(device, 'toString')).toBeUndefined();
    expect(resolveAttribute(device, 'role.constructor')).toBeUndefined();
  });

  test('returns undefined for empty paths and segments', () => {
    expect(resolveAttribute(device, '')).toBeUndefined();
    expect(resolveAttribute(device, 'role..name')).toBeUndefined();
  });

  test('returns undefined for non-object records', () => {
    expect(resolveAttribute(null, 'name')).toBeUndefined();
    expect(resolveAttribute('sw01', 'name')).toBeUndefined();
  });
});
