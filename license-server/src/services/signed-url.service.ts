import type { DownloadToken, SignedDownloadUrl } from '../types';
import { type Clock, systemClock, unixSeconds } from '../utils/clock';
import { hmacHex, safeEqualHex } from '../utils/crypto';

export interface SignedUrlOptions {
  /** Absolute URL of the download endpoint. */
  downloadUrl: string;
  ttlSeconds: number;
}

/**
 * Time-boxed download capabilities. Nothing is stored: a token is valid
 * while its expiry has not passed and its HMAC recomputes under the current
 * secret. Replays inside the TTL are accepted.
 */
export class SignedUrlService {
  constructor(
    private readonly secret: string,
    private readonly options: SignedUrlOptions,
    private readonly clock: Clock = systemClock
  ) {}

  issue(licenseId: string, releaseId: string, ttlSeconds = this.options.ttlSeconds): SignedDownloadUrl {
    const expiresAt = unixSeconds(this.clock()) + ttlSeconds;
    const signature = this.sign(licenseId, releaseId, expiresAt);

    const url = new URL(this.options.downloadUrl);
    url.searchParams.set('license_id', licenseId);
    url.searchParams.set('release_id', releaseId);
    url.searchParams.set('expires', String(expiresAt));
    url.searchParams.set('sig', signature);

    return { url: url.toString(), expiresAt };
  }

  verify(licenseId: string, releaseId: string, expiresAt: number, signature: string): boolean {
    if (!Number.isSafeInteger(expiresAt) || expiresAt < unixSeconds(this.clock())) {
      return false;
    }
    return safeEqualHex(this.sign(licenseId, releaseId, expiresAt), signature);
  }

  verifyToken(token: DownloadToken): boolean {
    return this.verify(token.licenseId, token.releaseId, token.expiresAt, token.signature);
  }

  private sign(licenseId: string, releaseId: string, expiresAt: number): string {
    return hmacHex(`${licenseId}|${releaseId}|${expiresAt}`, this.secret);
  }
}

/**
 * Reads token fields from query parameters; null when any is missing or
 * the expiry is not an integer.
 */
export function parseDownloadToken(query: Record<string, unknown>): DownloadToken | null {
  const { license_id: licenseId, release_id: releaseId, expires, sig } = query;

  if (typeof licenseId !== 'string' || typeof releaseId !== 'string' || typeof sig !== 'string') return null;
  if (typeof expires !== 'string' || !/^\d{1,12}$/.test(expires)) return null;

  return { licenseId, releaseId, expiresAt: Number(expires), signature: sig.toLowerCase() };
}
