import fs from 'fs';
import path from 'path';
import { ValidationError } from '../errors';
import type { LicenseRepository } from '../repositories/license.repository';
import type { NewRelease, ReleaseRepository } from '../repositories/release.repository';
import type { DownloadToken, Failure, HeartbeatResult, Release } from '../types';
import { type Clock, systemClock } from '../utils/clock';
import { createChildLogger } from '../utils/logger';
import { withTimeout } from '../utils/storage';
import type { ActivationLedger } from './activation-ledger';
import type { LicenseService } from './license.service';
import type { SignedUrlService } from './signed-url.service';

const log = createChildLogger('update-service');

const VERSION_PATTERN = /^v?(\d+)(?:\.(\d+))?(?:\.(\d+))?(?:-([0-9A-Za-z.-]+))?$/;

interface ParsedVersion {
  parts: [number, number, number];
  prerelease: string | null;
}

function parseVersion(version: string): ParsedVersion | null {
  const match = VERSION_PATTERN.exec(version.trim());
  if (!match) return null;
  return {
    parts: [Number(match[1]), Number(match[2] ?? 0), Number(match[3] ?? 0)],
    prerelease: match[4] ?? null,
  };
}

export function isValidVersion(version: string): boolean {
  return parseVersion(version) !== null;
}

/**
 * Orders dotted versions numerically. A pre-release sorts before its
 * release; unparseable input sorts before everything.
 */
export function compareVersions(a: string, b: string): number {
  const pa = parseVersion(a);
  const pb = parseVersion(b);
  if (!pa || !pb) return pa ? 1 : pb ? -1 : 0;

  for (let i = 0; i < 3; i++) {
    if (pa.parts[i] !== pb.parts[i]) return pa.parts[i] < pb.parts[i] ? -1 : 1;
  }
  if (pa.prerelease === pb.prerelease) return 0;
  if (pa.prerelease === null) return 1;
  if (pb.prerelease === null) return -1;
  return pa.prerelease < pb.prerelease ? -1 : 1;
}

export type UpdateCheckResult =
  | { success: true; updateAvailable: false; version: string }
  | {
      success: true;
      updateAvailable: true;
      version: string;
      downloadUrl: string;
      expiresAt: number;
      changelog: string | null;
      fileSize: number;
      fileHash: string;
      releasedAt: Date;
    }
  | Exclude<HeartbeatResult, { success: true }>
  | Failure<'no_release'>;

export type DownloadAuthorization =
  | { success: true; release: Release; filePath: string }
  | Failure<'signature_invalid' | 'not_found' | 'expired' | 'inactive'>;

export type ReleaseInput = Omit<NewRelease, 'now'>;

export interface UpdateServiceDeps {
  releases: ReleaseRepository;
  licenses: LicenseRepository;
  licenseService: LicenseService;
  ledger: ActivationLedger;
  signedUrls: SignedUrlService;
  releasesDir: string;
  storageTimeoutMs: number;
  clock?: Clock;
}

export class UpdateService {
  private readonly clock: Clock;

  constructor(private readonly deps: UpdateServiceDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  // ─── Releases ─────────────────────────────────────────────

  async registerRelease(input: ReleaseInput): Promise<Release> {
    if (!isValidVersion(input.version)) {
      throw new ValidationError('Release version must look like 1.2.3', { version: input.version });
    }
    if (!input.productId.trim() || !input.slug.trim()) {
      throw new ValidationError('productId and slug are required');
    }

    const release = await this.storage('register release', () =>
      this.deps.releases.create({ ...input, fileName: path.basename(input.fileName), now: this.clock() })
    );
    log.info({ releaseId: release.id, productId: release.productId, version: release.version }, 'Release registered');
    return release;
  }

  async listReleases(productId?: string): Promise<Release[]> {
    return this.storage('list releases', () => this.deps.releases.list(productId));
  }

  async setReleaseActive(releaseId: string, isActive: boolean): Promise<boolean> {
    return this.storage('set release active', () => this.deps.releases.setActive(releaseId, isActive));
  }

  async latestRelease(productId: string, slug: string): Promise<Release | null> {
    const releases = await this.storage('latest release', () => this.deps.releases.listActive(productId, slug));
    return releases.reduce<Release | null>(
      (latest, r) => (latest === null || compareVersions(r.version, latest.version) > 0 ? r : latest),
      null
    );
  }

  // ─── Client flow ──────────────────────────────────────────

  /**
   * Heartbeat first, then looks for a newer active release of the
   * license's product. A newer release comes back with a signed URL.
   */
  async checkForUpdate(
    key: unknown,
    domain: unknown,
    slug: string,
    currentVersion: string,
    ip?: string | null
  ): Promise<UpdateCheckResult> {
    const { result, license } = await this.deps.licenseService.heartbeat(key, domain, ip);
    if (!result.success) return result;
    if (!license) return { success: false, reason: 'not_found' };

    const release = await this.latestRelease(license.productId, slug);
    if (!release) return { success: false, reason: 'no_release' };

    if (compareVersions(release.version, currentVersion) <= 0) {
      return { success: true, updateAvailable: false, version: release.version };
    }

    const signed = this.deps.signedUrls.issue(license.id, release.id);
    log.info(
      { licenseId: license.id, releaseId: release.id, from: currentVersion, to: release.version },
      'Update offered'
    );

    return {
      success: true,
      updateAvailable: true,
      version: release.version,
      downloadUrl: signed.url,
      expiresAt: signed.expiresAt,
      changelog: release.changelog,
      fileSize: release.fileSize,
      fileHash: release.fileHash,
      releasedAt: release.releasedAt,
    };
  }

  /**
   * Download gate: signature, then the license must pass the same
   * expiry rules as a heartbeat and own the release's product, then the file must exist inside the
   * releases directory. Counts the download on success.
   */
  async authorizeDownload(token: DownloadToken): Promise<DownloadAuthorization> {
    if (!this.deps.signedUrls.verifyToken(token)) {
      log.warn({ licenseId: token.licenseId, releaseId: token.releaseId }, 'Rejected download token');
      return { success: false, reason: 'signature_invalid' };
    }

    const [license, release] = await Promise.all([
      this.storage('find license', () => this.deps.licenses.findById(token.licenseId)),
      this.storage('find release', () => this.deps.releases.findById(token.releaseId)),
    ]);
    if (!license || !release || !release.isActive || release.productId !== license.productId) {
      return { success: false, reason: 'not_found' };
    }

    const gate = await this.deps.ledger.admitLicense(license);
    if (!gate.allowed) return gate.failure;

    const filePath = this.resolveReleaseFile(release);
    if (!filePath) {
      log.error({ releaseId: release.id, fileName: release.fileName }, 'Release file missing');
      return { success: false, reason: 'not_found' };
    }

    await this.storage('count download', () => this.deps.releases.incrementDownloads(release.id));
    log.info({ licenseId: license.id, releaseId: release.id }, 'Release download authorized');
    return { success: true, release, filePath };
  }

  private resolveReleaseFile(release: Release): string | null {
    const root = path.resolve(this.deps.releasesDir);
    const filePath = path.resolve(root, path.basename(release.fileName));
    if (!filePath.startsWith(root + path.sep) || !fs.existsSync(filePath)) {
      return null;
    }
    return filePath;
  }

  private storage<T>(operation: string, task: () => Promise<T>): Promise<T> {
    return withTimeout(operation, this.deps.storageTimeoutMs, task);
  }
}
