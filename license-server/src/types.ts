// ─── Stored records ─────────────────────────────────────────

/** Administrative intent. The effective status is derived, never stored. */
export type LicenseStatus = 'active' | 'inactive' | 'suspended' | 'revoked';

export const LICENSE_STATUSES: readonly LicenseStatus[] = ['active', 'inactive', 'suspended', 'revoked'];

export type EffectiveStatus = 'active' | 'grace' | 'expired' | 'inactive';

export interface License {
  id: string;
  ownerId: string;
  productId: string;
  orderRef: string | null;
  keyHash: string;
  keyVerificationHash: string;
  status: LicenseStatus;
  expiresAt: Date | null;
  graceUntil: Date | null;
  /** `null` is unlimited. */
  maxActivations: number | null;
  failedAttempts: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface Activation {
  id: string;
  licenseId: string;
  domain: string;
  ipHash: string | null;
  userAgentHash: string | null;
  activatedAt: Date;
  lastSeenAt: Date;
  validationCount: number;
  isActive: boolean;
  deactivatedAt: Date | null;
  deactivatedReason: string | null;
}

export interface Release {
  id: string;
  productId: string;
  slug: string;
  version: string;
  fileName: string;
  fileSize: number;
  fileHash: string;
  changelog: string | null;
  isActive: boolean;
  downloadCount: number;
  releasedAt: Date;
}

// ─── Operation results ──────────────────────────────────────

export type FailureReason =
  | 'invalid_format'
  | 'not_found'
  | 'expired'
  | 'inactive'
  | 'activation_limit'
  | 'domain_not_activated'
  | 'no_release'
  | 'rate_limited'
  | 'signature_invalid';

export interface Failure<R extends FailureReason = FailureReason> {
  success: false;
  reason: R;
  status?: EffectiveStatus;
}

export interface ActivateSuccess {
  success: true;
  status: EffectiveStatus;
  domain: string;
  expiresAt: Date | null;
  remainingActivations: number | null;
  /** Re-activation of a domain that was already bound. */
  alreadyActive: boolean;
  /** Developer/staging domain; not counted against capacity. */
  exempt: boolean;
}

export type ActivateResult =
  | ActivateSuccess
  | Failure<'invalid_format' | 'not_found' | 'expired' | 'inactive' | 'activation_limit'>;

export interface HeartbeatSuccess {
  success: true;
  status: EffectiveStatus;
  domain: string;
  expiresAt: Date | null;
  graceUntil: Date | null;
  validationCount: number;
  exempt: boolean;
}

export type HeartbeatResult =
  | HeartbeatSuccess
  | Failure<'invalid_format' | 'not_found' | 'domain_not_activated' | 'expired' | 'inactive'>;

export type DeactivateResult =
  | { success: true; remainingActivations: number | null }
  | Failure<'invalid_format' | 'not_found' | 'domain_not_activated'>;

export interface CreateLicenseInput {
  ownerId: string;
  productId: string;
  orderRef?: string | null;
  /** `null`/omitted is unlimited; 0 is treated as unlimited too. */
  maxActivations?: number | null;
  expiresAt?: Date | null;
  /** Defaults to `expiresAt` plus the configured grace period. */
  graceUntil?: Date | null;
}

export interface CreatedLicense {
  licenseId: string;
  /** Plaintext key. Returned once and never stored. */
  licenseKey: string;
}

export interface LicenseSummary {
  id: string;
  ownerId: string;
  productId: string;
  orderRef: string | null;
  maskedKey: string;
  status: LicenseStatus;
  effectiveStatus: EffectiveStatus;
  expiresAt: Date | null;
  graceUntil: Date | null;
  maxActivations: number | null;
  remainingActivations: number | null;
  activeDomains: string[];
  failedAttempts: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface DownloadToken {
  licenseId: string;
  releaseId: string;
  /** Unix seconds. */
  expiresAt: number;
  signature: string;
}

export interface SignedDownloadUrl {
  url: string;
  expiresAt: number;
}
