import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { Config } from './config';
import { SecretProvisioningError } from './errors';
import { randomSecret } from './utils/crypto';
import { createChildLogger } from './utils/logger';

const log = createChildLogger('secrets');

export interface Secrets {
  hashSalt: string;
  keySecret: string;
  signingSecret: string;
  ipSalt: string;
  jwtSecret: string;
}

const SECRET_NAMES = ['hashSalt', 'keySecret', 'signingSecret', 'ipSalt', 'jwtSecret'] as const;

const secretsFileSchema = z
  .object({
    hashSalt: z.string().min(32),
    keySecret: z.string().min(32),
    signingSecret: z.string().min(32),
    ipSalt: z.string().min(32),
    jwtSecret: z.string().min(32),
  })
  .partial();

type StoredSecrets = z.infer<typeof secretsFileSchema>;

function readSecretsFile(file: string): StoredSecrets {
  if (!fs.existsSync(file)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (err) {
    throw new SecretProvisioningError('Secrets file is unreadable', { file }, { cause: err });
  }

  const parsed = secretsFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SecretProvisioningError('Secrets file is malformed', {
      file,
      fields: parsed.error.flatten().fieldErrors,
    });
  }
  return parsed.data;
}

function writeSecretsFile(file: string, secrets: StoredSecrets): void {
  try {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, JSON.stringify(secrets, null, 2), { mode: 0o600 });
    fs.chmodSync(file, 0o600);
  } catch (err) {
    throw new SecretProvisioningError('Could not persist generated secrets', { file }, { cause: err });
  }
}

/**
 * Resolves every server secret once, at startup: environment override,
 * then the secrets file, else a fresh random value that is written back.
 * Throws SecretProvisioningError when a secret can be neither read nor
 * persisted.
 */
export function provisionSecrets(config: Pick<Config, 'secrets' | 'paths'>): Secrets {
  const file = config.paths.secrets;
  const stored = readSecretsFile(file);
  const generated: Partial<Secrets> = {};

  const resolve = (name: (typeof SECRET_NAMES)[number]): string => {
    const fromEnv = config.secrets[name];
    if (fromEnv) return fromEnv;
    const fromFile = stored[name];
    if (fromFile) return fromFile;
    const fresh = randomSecret(32);
    generated[name] = fresh;
    return fresh;
  };

  const secrets: Secrets = {
    hashSalt: resolve('hashSalt'),
    keySecret: resolve('keySecret'),
    signingSecret: resolve('signingSecret'),
    ipSalt: resolve('ipSalt'),
    jwtSecret: resolve('jwtSecret'),
  };

  const names = Object.keys(generated);
  if (names.length > 0) {
    // Environment overrides are never written to disk.
    writeSecretsFile(file, { ...stored, ...generated });
    log.warn({ generated: names, file }, 'Generated and persisted new server secrets');
  }

  return secrets;
}
