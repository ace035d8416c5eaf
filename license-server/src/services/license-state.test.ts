import { describe, expect, it } from 'vitest';
import type { License } from '../types';
import { addDays } from '../utils/clock';
import { describeStatus, effectiveStatus, isUsable } from './license-state';

const T = new Date('2026-06-01T00:00:00.000Z');
const at = (offsetMs: number) => new Date(T.getTime() + offsetMs);
const DAY = 24 * 60 * 60 * 1000;

type Inputs = Pick<License, 'status' | 'expiresAt' | 'graceUntil'>;
const license = (overrides: Partial<Inputs> = {}): Inputs => ({
  status: 'active',
  expiresAt: T,
  graceUntil: addDays(T, 7),
  ...overrides,
});

describe('effectiveStatus', () => {
  it.each([
    ['one second before expiry', at(-1000), 'active'],
    ['at expiry', at(0), 'grace'],
    ['one day after expiry', at(DAY), 'grace'],
    ['at the end of grace', at(7 * DAY), 'grace'],
    ['eight days after expiry', at(8 * DAY), 'expired'],
  ] as const)('%s', (_label, now, expected) => {
    expect(effectiveStatus(license(), now)).toBe(expected);
  });

  it('treats a missing expiry as perpetual', () => {
    expect(describeStatus(license({ expiresAt: null, graceUntil: null }), at(1000 * DAY))).toEqual({
      status: 'active',
      reason: 'perpetual',
    });
  });

  it('expires immediately without a grace date', () => {
    expect(effectiveStatus(license({ graceUntil: null }), at(1))).toBe('expired');
  });

  it('lets revocation and suspension win over dates', () => {
    expect(describeStatus(license({ status: 'revoked', expiresAt: null }), at(0))).toEqual({
      status: 'inactive',
      reason: 'revoked',
    });
    expect(describeStatus(license({ status: 'suspended' }), at(-DAY))).toEqual({
      status: 'inactive',
      reason: 'suspended',
    });
  });

  it('reports an administratively disabled license as inactive', () => {
    expect(describeStatus(license({ status: 'inactive' }), at(-DAY))).toEqual({
      status: 'inactive',
      reason: 'disabled',
    });
  });

  it('moves with the clock alone', () => {
    const l = license();
    expect(effectiveStatus(l, at(-1))).toBe('active');
    expect(effectiveStatus(l, at(8 * DAY))).toBe('expired');
    expect(effectiveStatus(l, at(-1))).toBe('active');
  });
});

describe('isUsable', () => {
  it('allows active and grace only', () => {
    expect(isUsable('active')).toBe(true);
    expect(isUsable('grace')).toBe(true);
    expect(isUsable('expired')).toBe(false);
    expect(isUsable('inactive')).toBe(false);
  });
});
