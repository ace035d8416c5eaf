import fs from 'fs';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { tempDir, testConfig } from './__tests__/helpers';
import { SecretProvisioningError } from './errors';
import { provisionSecrets } from './secrets';

const HEX_64 = /^[0-9a-f]{64}$/;

describe('provisionSecrets', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = tempDir();
    file = path.join(dir, 'nested', 'secrets.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('generates missing secrets and persists them owner-readable only', () => {
    const secrets = provisionSecrets(testConfig({ SECRETS_PATH: file }));

    for (const value of Object.values(secrets)) {
      expect(value).toMatch(HEX_64);
    }
    expect(new Set(Object.values(secrets)).size).toBe(5);
    expect(JSON.parse(fs.readFileSync(file, 'utf-8'))).toEqual(secrets);
    if (process.platform !== 'win32') {
      expect(fs.statSync(file).mode & 0o777).toBe(0o600);
    }
  });

  it('reuses persisted secrets on the next start', () => {
    const first = provisionSecrets(testConfig({ SECRETS_PATH: file }));
    const second = provisionSecrets(testConfig({ SECRETS_PATH: file }));

    expect(second).toEqual(first);
  });

  it('prefers environment overrides and never writes them', () => {
    const override = 'test-env-signing-secret-0123456789ab';
    const secrets = provisionSecrets(testConfig({ SECRETS_PATH: file, SIGNING_SECRET: override }));

    expect(secrets.signingSecret).toBe(override);
    const stored: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
    expect(stored).not.toHaveProperty('signingSecret');
    expect(stored).toHaveProperty('hashSalt', secrets.hashSalt);
  });

  it('writes nothing when every secret comes from the environment', () => {
    provisionSecrets(
      testConfig({
        SECRETS_PATH: file,
        LICENSE_HASH_SALT: 'test-hash-salt-0123456789abcdef0123',
        LICENSE_KEY_SECRET: 'test-key-secret-0123456789abcdef012',
        SIGNING_SECRET: 'test-signing-secret-0123456789abcde',
        IP_HASH_SALT: 'test-ip-salt-0123456789abcdef012345',
        JWT_SECRET: 'test-jwt-secret-0123456789abcdef012',
      })
    );

    expect(fs.existsSync(file)).toBe(false);
  });

  it('fills in only the secrets a partial file lacks', () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, JSON.stringify({ hashSalt: 'test-stored-hash-salt-0123456789abcd' }));

    const secrets = provisionSecrets(testConfig({ SECRETS_PATH: file }));

    expect(secrets.hashSalt).toBe('test-stored-hash-salt-0123456789abcd');
    expect(secrets.jwtSecret).toMatch(HEX_64);
    expect(JSON.parse(fs.readFileSync(file, 'utf-8'))).toEqual(secrets);
  });

  it.each([
    ['not json', '{'],
    ['too short', JSON.stringify({ keySecret: 'short' })],
  ])('refuses a %s secrets file', (_label, contents) => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, contents);

    expect(() => provisionSecrets(testConfig({ SECRETS_PATH: file }))).toThrow(SecretProvisioningError);
  });

  it('fails when the secrets cannot be persisted', () => {
    const blocker = path.join(dir, 'blocker');
    fs.writeFileSync(blocker, 'not a directory');

    expect(() => provisionSecrets(testConfig({ SECRETS_PATH: path.join(blocker, 'secrets.json') }))).toThrow(
      SecretProvisioningError
    );
  });
});
