import crypto from 'crypto';
import os from 'os';
import { KeyGenerationError } from '../errors';
import type { LicenseRepository } from '../repositories/license.repository';
import { hashPrefix, hmacHex, safeEqualHex } from '../utils/crypto';
import { createChildLogger } from '../utils/logger';

const log = createChildLogger('key-service');

// License key format: XXXXXXXX-XXXXXXXX-XXXXXXXX-XXXXXXXX (uppercase hex)
const KEY_PATTERN = /^[0-9A-F]{8}-[0-9A-F]{8}-[0-9A-F]{8}-[0-9A-F]{8}$/;

export interface KeyHashes {
  primaryHash: string;
  verificationHash: string;
}

export interface KeySecrets {
  hashSalt: string;
  keySecret: string;
}

/**
 * Trims and uppercases a submitted key; null unless it is exactly four
 * 8-hex-digit groups. Runs before any storage access.
 */
export function canonicalizeKey(input: unknown): string | null {
  if (typeof input !== 'string') return null;
  const key = input.trim().toUpperCase();
  return KEY_PATTERN.test(key) ? key : null;
}

/** Display form for admin screens, derived from the hash only. */
export function maskKeyHash(keyHash: string): string {
  return `****-****-****-${keyHash.slice(-4).toUpperCase()}`;
}

function formatKey(raw: Buffer): string {
  const hex = raw.toString('hex').toUpperCase();
  return [hex.slice(0, 8), hex.slice(8, 16), hex.slice(16, 24), hex.slice(24, 32)].join('-');
}

export class KeyService {
  constructor(
    private readonly secrets: KeySecrets,
    private readonly licenses: Pick<LicenseRepository, 'findByKeyHash'>,
    private readonly maxAttempts = 10
  ) {}

  /**
   * Generates a key whose hash is not yet stored. Random bytes are mixed
   * with contextual entropy through SHA-256 and the first 16 bytes kept.
   */
  async generateKey(productId: string, userId: string): Promise<string> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const key = this.generateCandidate(productId, userId);

      if (!(await this.licenses.findByKeyHash(this.hashKey(key).primaryHash))) {
        return key;
      }
      log.warn({ attempt }, 'Generated license key collided with an existing key, retrying');
    }

    throw new KeyGenerationError(`Failed to generate a unique license key after ${this.maxAttempts} attempts`, {
      productId,
      attempts: this.maxAttempts,
    });
  }

  hashKey(plaintext: string): KeyHashes {
    const primaryHash = hmacHex(plaintext, this.secrets.hashSalt);
    return {
      primaryHash,
      verificationHash: hmacHex(primaryHash, this.secrets.keySecret),
    };
  }

  /** Constant-time check of a plaintext key against a stored primary hash. */
  verify(plaintext: string, storedPrimaryHash: string): boolean {
    return safeEqualHex(storedPrimaryHash, hmacHex(plaintext, this.secrets.hashSalt));
  }

  /** Checks the secondary hash recorded next to the primary one. */
  verifyChain(hashes: KeyHashes, storedVerificationHash: string): boolean {
    const ok = safeEqualHex(storedVerificationHash, hashes.verificationHash);
    if (!ok) {
      log.error({ keyHash: hashPrefix(hashes.primaryHash) }, 'License verification hash mismatch');
    }
    return ok;
  }

  private generateCandidate(productId: string, userId: string): string {
    const entropy = JSON.stringify([
      process.hrtime.bigint().toString(),
      Date.now(),
      process.pid,
      process.memoryUsage().heapUsed,
      productId,
      userId,
      os.hostname(),
    ]);
    const random = crypto.randomBytes(32);
    const digest = crypto.createHash('sha256').update(entropy).update(random).digest();

    try {
      return formatKey(digest.subarray(0, 16));
    } finally {
      random.fill(0);
      digest.fill(0);
    }
  }
}
