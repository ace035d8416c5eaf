import { describe, expect, it } from 'vitest';
import { ManualClock, START } from '../__tests__/helpers';
import { hmacHex } from '../utils/crypto';
import { SignedUrlService, parseDownloadToken } from './signed-url.service';

const SECRET = 'test-signing-secret-0123456789abcde';
const DOWNLOAD_URL = 'https://licenses.example.com/v1/updates/download';
const NOW = Math.floor(START.getTime() / 1000);

function setup() {
  const clock = new ManualClock();
  const signer = new SignedUrlService(SECRET, { downloadUrl: DOWNLOAD_URL, ttlSeconds: 300 }, clock.now);
  return { clock, signer };
}

function tokenFrom(url: string) {
  return parseDownloadToken(Object.fromEntries(new URL(url).searchParams));
}

function flipFirstHexChar(sig: string): string {
  return (sig[0] === '0' ? '1' : '0') + sig.slice(1);
}

describe('SignedUrlService', () => {
  it('embeds the token fields in the URL', () => {
    const { signer } = setup();
    const { url, expiresAt } = signer.issue('lic-1', 'rel-1');

    expect(expiresAt).toBe(NOW + 300);

    const parsed = new URL(url);
    expect(`${parsed.origin}${parsed.pathname}`).toBe(DOWNLOAD_URL);
    expect(parsed.searchParams.get('license_id')).toBe('lic-1');
    expect(parsed.searchParams.get('release_id')).toBe('rel-1');
    expect(parsed.searchParams.get('expires')).toBe(String(NOW + 300));
    expect(parsed.searchParams.get('sig')).toBe(hmacHex(`lic-1|rel-1|${NOW + 300}`, SECRET));
  });

  it('verifies a freshly issued token', () => {
    const { signer } = setup();
    const token = tokenFrom(signer.issue('lic-1', 'rel-1', 300).url);

    expect(token).not.toBeNull();
    expect(token && signer.verifyToken(token)).toBe(true);
  });

  it('accepts the token up to its expiry second and rejects it after', () => {
    const { clock, signer } = setup();
    const { url } = signer.issue('lic-1', 'rel-1', 300);
    const token = tokenFrom(url);
    if (!token) throw new Error('token did not parse');

    clock.advanceSeconds(300);
    expect(signer.verifyToken(token)).toBe(true);

    clock.advanceSeconds(1);
    expect(signer.verifyToken(token)).toBe(false);
  });

  it('rejects any tampered field', () => {
    const { signer } = setup();
    const { url, expiresAt } = signer.issue('lic-1', 'rel-1', 300);
    const token = tokenFrom(url);
    if (!token) throw new Error('token did not parse');

    expect(signer.verify('lic-2', 'rel-1', expiresAt, token.signature)).toBe(false);
    expect(signer.verify('lic-1', 'rel-2', expiresAt, token.signature)).toBe(false);
    expect(signer.verify('lic-1', 'rel-1', expiresAt + 60, token.signature)).toBe(false);
    expect(signer.verify('lic-1', 'rel-1', expiresAt, flipFirstHexChar(token.signature))).toBe(false);
    expect(signer.verify('lic-1', 'rel-1', expiresAt, '')).toBe(false);
  });

  it('invalidates outstanding tokens when the secret rotates', () => {
    const { clock, signer } = setup();
    const { url } = signer.issue('lic-1', 'rel-1');
    const token = tokenFrom(url);
    if (!token) throw new Error('token did not parse');

    const rotated = new SignedUrlService('test-rotated-secret-0123456789abcde', { downloadUrl: DOWNLOAD_URL, ttlSeconds: 300 }, clock.now);
    expect(rotated.verifyToken(token)).toBe(false);
  });

  it('accepts replays within the TTL', () => {
    const { clock, signer } = setup();
    const token = tokenFrom(signer.issue('lic-1', 'rel-1').url);
    if (!token) throw new Error('token did not parse');

    expect(signer.verifyToken(token)).toBe(true);
    clock.advanceSeconds(120);
    expect(signer.verifyToken(token)).toBe(true);
  });
});

describe('parseDownloadToken', () => {
  it('reads and lowercases the signature', () => {
    expect(parseDownloadToken({ license_id: 'a', release_id: 'b', expires: '1700000000', sig: 'ABCDEF' })).toEqual({
      licenseId: 'a',
      releaseId: 'b',
      expiresAt: 1700000000,
      signature: 'abcdef',
    });
  });

  it.each([
    [{ release_id: 'b', expires: '1', sig: 'x' }],
    [{ license_id: 'a', release_id: 'b', expires: 'soon', sig: 'x' }],
    [{ license_id: 'a', release_id: 'b', expires: '-5', sig: 'x' }],
    [{ license_id: ['a', 'c'], release_id: 'b', expires: '1', sig: 'x' }],
  ])('returns null for %j', (query) => {
    expect(parseDownloadToken(query)).toBeNull();
  });
});
