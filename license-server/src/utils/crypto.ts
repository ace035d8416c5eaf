/**
 * Hashing helpers shared by the key, activation and signed-URL services.
 * Everything here is one-way; nothing maps a digest back to its input.
 */
import crypto from 'crypto';

const HEX_SHA256 = /^[0-9a-f]{64}$/;

export function hmacHex(data: string, secret: string): string {
  return crypto.createHmac('sha256', secret).update(data, 'utf8').digest('hex');
}

export function sha256Hex(data: string): string {
  return crypto.createHash('sha256').update(data, 'utf8').digest('hex');
}

export function randomSecret(bytes = 32): string {
  return crypto.randomBytes(bytes).toString('hex');
}

/** Constant-time comparison of two lowercase SHA-256 hex digests. */
export function safeEqualHex(expected: string, actual: string): boolean {
  if (!HEX_SHA256.test(expected) || !HEX_SHA256.test(actual)) {
    return false;
  }
  return crypto.timingSafeEqual(Buffer.from(expected, 'hex'), Buffer.from(actual, 'hex'));
}

/** Client IPs are stored salted and hashed, never in plaintext. */
export function hashIp(ip: string | null | undefined, salt: string): string | null {
  if (!ip) return null;
  return hmacHex(ip.trim().toLowerCase(), salt);
}

export function hashUserAgent(userAgent: string | null | undefined): string | null {
  if (!userAgent) return null;
  return sha256Hex(userAgent);
}

/** First bytes of a digest, safe to put in logs. */
export function hashPrefix(hash: string): string {
  return `${hash.slice(0, 8)}...`;
}
