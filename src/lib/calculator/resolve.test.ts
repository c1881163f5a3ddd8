import { describe, expect, it } from 'vitest';
import { hasResponse, lookupCoefficient, resolveFlag, resolveLabel, resolveNumber, resolveResponse } from './resolve';

const TABLE_KEYS = ['tables_count', 'num_workflows'];

describe('response resolution', () => {
  it('returns the first present key', () => {
    expect(resolveResponse({ num_workflows: 4 }, TABLE_KEYS, 1)).toBe(4);
    expect(resolveResponse({ tables_count: 2, num_workflows: 4 }, TABLE_KEYS, 1)).toBe(2);
    expect(resolveResponse({}, TABLE_KEYS, 1)).toBe(1);
  });

  it('accepts numeric strings and rejects other values', () => {
    expect(resolveNumber({ tables_count: '6' }, TABLE_KEYS, 1)).toBe(6);
    expect(resolveNumber({ tables_count: 'many' }, TABLE_KEYS, 1)).toBe(1);
    expect(resolveNumber({ tables_count: true }, TABLE_KEYS, 1)).toBe(1);
  });

  it('stringifies non-string labels', () => {
    expect(resolveLabel({ cloud_platform: 3 }, ['cloud_platform'], 'Not applicable')).toBe('3');
    expect(resolveLabel({}, ['cloud_platform'], 'Not applicable')).toBe('Not applicable');
  });

  it('reads flags as truthiness', () => {
    expect(resolveFlag({ compliance_req: true }, ['compliance_req'])).toBe(true);
    expect(resolveFlag({ compliance_req: '' }, ['compliance_req'])).toBe(false);
    expect(resolveFlag({}, ['compliance_req'])).toBe(false);
  });

  it('detects presence under any key', () => {
    expect(hasResponse({ num_workflows: 0 }, TABLE_KEYS)).toBe(true);
    expect(hasResponse({}, TABLE_KEYS)).toBe(false);
  });
});

describe('lookupCoefficient', () => {
  it('tries each table in order', () => {
    expect(lookupCoefficient('High', [{ Low: 0 }, { High: 3 }], 0)).toBe(3);
    expect(lookupCoefficient('Low', [{ Low: 1 }, { Low: 2 }], 0)).toBe(1);
  });

  it('returns a zero coefficient rather than the fallback', () => {
    expect(lookupCoefficient('Simple', [{ Simple: 0 }], 2)).toBe(0);
  });

  it('does not resolve inherited properties', () => {
    expect(lookupCoefficient('toString', [{}], 5)).toBe(5);
  });
});
