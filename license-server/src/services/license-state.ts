import type { EffectiveStatus, License } from '../types';

export type StatusReason =
  | 'revoked'
  | 'suspended'
  | 'disabled'
  | 'perpetual'
  | 'within_term'
  | 'expired_in_grace'
  | 'license_expired';

type StatusInputs = Pick<License, 'status' | 'expiresAt' | 'graceUntil'>;

/**
 * Derives the effective status from stored attributes and `now`.
 * Re-derive on every call: time moves without any write.
 */
export function describeStatus(license: StatusInputs, now: Date): { status: EffectiveStatus; reason: StatusReason } {
  // Administrative intent wins over any date.
  if (license.status === 'revoked' || license.status === 'suspended') {
    return { status: 'inactive', reason: license.status };
  }
  if (license.status === 'inactive') {
    return { status: 'inactive', reason: 'disabled' };
  }

  if (license.expiresAt === null) {
    return { status: 'active', reason: 'perpetual' };
  }
  if (now.getTime() < license.expiresAt.getTime()) {
    return { status: 'active', reason: 'within_term' };
  }
  if (license.graceUntil !== null && now.getTime() <= license.graceUntil.getTime()) {
    return { status: 'grace', reason: 'expired_in_grace' };
  }
  return { status: 'expired', reason: 'license_expired' };
}

export function effectiveStatus(license: StatusInputs, now: Date): EffectiveStatus {
  return describeStatus(license, now).status;
}

/** Usable licenses may activate and pass heartbeats. */
export function isUsable(status: EffectiveStatus): boolean {
  return status === 'active' || status === 'grace';
}
