import { describe, expect, it, vi } from 'vitest';
import { KeyGenerationError } from '../errors';
import type { License } from '../types';
import { hmacHex } from '../utils/crypto';
import { TEST_SECRETS, makeLicense } from '../__tests__/helpers';
import { KeyService, canonicalizeKey, maskKeyHash } from './key.service';

const KEY = '0A1B2C3D-4E5F6071-8293A4B5-C6D7E8F9';

function service(findByKeyHash = vi.fn<(hash: string) => Promise<License | null>>().mockResolvedValue(null)) {
  return { keys: new KeyService(TEST_SECRETS, { findByKeyHash }, 3), findByKeyHash };
}

describe('canonicalizeKey', () => {
  it('accepts four 8-hex groups and uppercases them', () => {
    expect(canonicalizeKey(KEY)).toBe(KEY);
    expect(canonicalizeKey(`  ${KEY.toLowerCase()}\n`)).toBe(KEY);
  });

  it.each([
    '',
    '0A1B2C3D-4E5F6071-8293A4B5',
    '0A1B2C3D4E5F60718293A4B5C6D7E8F9',
    '0A1B2C3D-4E5F6071-8293A4B5-C6D7E8FG',
    '0A1B2C3D-4E5F6071-8293A4B5-C6D7E8F9-00000000',
    'XXXXXXXX-XXXXXXXX-XXXXXXXX-XXXXXXXX',
  ])('rejects %j', (input) => {
    expect(canonicalizeKey(input)).toBeNull();
  });

  it('rejects non-strings', () => {
    expect(canonicalizeKey(undefined)).toBeNull();
    expect(canonicalizeKey(12345678)).toBeNull();
  });
});

describe('KeyService', () => {
  it('generates keys in the XXXXXXXX-XXXXXXXX-XXXXXXXX-XXXXXXXX format', async () => {
    const { keys } = service();
    const key = await keys.generateKey('plugin-pro', 'owner-1');

    expect(key).toMatch(/^[0-9A-F]{8}-[0-9A-F]{8}-[0-9A-F]{8}-[0-9A-F]{8}$/);
    expect(await keys.generateKey('plugin-pro', 'owner-1')).not.toBe(key);
  });

  it('checks each candidate against stored hashes', async () => {
    const { keys, findByKeyHash } = service();
    const key = await keys.generateKey('plugin-pro', 'owner-1');

    expect(findByKeyHash).toHaveBeenCalledTimes(1);
    expect(findByKeyHash).toHaveBeenCalledWith(keys.hashKey(key).primaryHash);
  });

  it('retries on collision and gives up after the attempt budget', async () => {
    const findByKeyHash = vi.fn<(hash: string) => Promise<License | null>>().mockResolvedValue(makeLicense());
    const { keys } = service(findByKeyHash);

    await expect(keys.generateKey('plugin-pro', 'owner-1')).rejects.toBeInstanceOf(KeyGenerationError);
    expect(findByKeyHash).toHaveBeenCalledTimes(3);
  });

  it('succeeds when a later attempt is unique', async () => {
    const findByKeyHash = vi
      .fn<(hash: string) => Promise<License | null>>()
      .mockResolvedValueOnce(makeLicense())
      .mockResolvedValue(null);
    const { keys } = service(findByKeyHash);

    await expect(keys.generateKey('plugin-pro', 'owner-1')).resolves.toMatch(/^[0-9A-F]{8}-/);
    expect(findByKeyHash).toHaveBeenCalledTimes(2);
  });

  it('hashes deterministically through the salt and the secret', () => {
    const { keys } = service();
    const hashes = keys.hashKey(KEY);

    expect(keys.hashKey(KEY)).toEqual(hashes);
    expect(hashes.primaryHash).toBe(hmacHex(KEY, TEST_SECRETS.hashSalt));
    expect(hashes.verificationHash).toBe(hmacHex(hashes.primaryHash, TEST_SECRETS.keySecret));
    expect(hashes.primaryHash).not.toContain(KEY);
  });

  it('verifies a key against its stored primary hash', () => {
    const { keys } = service();
    const stored = keys.hashKey(KEY).primaryHash;

    expect(keys.verify(KEY, stored)).toBe(true);
    expect(keys.verify('0A1B2C3D-4E5F6071-8293A4B5-C6D7E8F8', stored)).toBe(false);
    expect(keys.verify(KEY, 'not-a-hash')).toBe(false);
  });

  it('checks the verification hash chain', () => {
    const { keys } = service();
    const hashes = keys.hashKey(KEY);

    expect(keys.verifyChain(hashes, hashes.verificationHash)).toBe(true);
    expect(keys.verifyChain(hashes, hmacHex(hashes.primaryHash, 'another-secret'))).toBe(false);
  });

  it('produces different hashes under a different salt', () => {
    const other = new KeyService({ ...TEST_SECRETS, hashSalt: 'test-other-salt-0123456789abcdef01' }, {
      findByKeyHash: async () => null,
    });
    expect(other.hashKey(KEY).primaryHash).not.toBe(service().keys.hashKey(KEY).primaryHash);
  });
});

describe('maskKeyHash', () => {
  it('shows only the last four hash characters', () => {
    expect(maskKeyHash('0123456789abcdef')).toBe('****-****-****-CDEF');
  });
});
