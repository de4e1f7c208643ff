/**
 * Rollback Selector
 *
 * Lists earlier artifacts (local zips and S3 backups) and redeploys the one
 * the operator picks.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { DeployConfig } from '../config.js';
import type { PlatformClient } from '../aws-clients.js';
import { PreconditionError } from '../errors.js';
import { logger as defaultLogger, type OpsLogger } from '../logger.js';
import { formatBytes } from '../packaging/archiver.js';
import type { DeployResult, StorageLocation, Uploader } from './uploader.js';

export interface BackupEntry {
  /** File name for local entries, `s3://bucket/key` for remote ones */
  name: string;
  sizeBytes: number;
  modifiedAt: Date;
  source: 'local' | 's3';
}

export interface CatalogView {
  shown: BackupEntry[];
  /** Entries beyond the display limit */
  omitted: number;
}

export type RollbackSelectorConfig = Pick<DeployConfig, 'bucket' | 'bucketPrefix' | 'backupDisplayLimit'>;

export interface RollbackSelectorDeps {
  client: PlatformClient;
  uploader: Uploader;
  logger?: OpsLogger;
}

function newestFirst(a: BackupEntry, b: BackupEntry): number {
  return b.modifiedAt.getTime() - a.modifiedAt.getTime();
}

export function parseS3Uri(uri: string): StorageLocation {
  const match = /^s3:\/\/([^/]+)\/(.+)$/.exec(uri);
  if (!match || match[2].endsWith('/')) {
    throw new PreconditionError(`Malformed S3 URI: ${uri}`, 'Expected s3://<bucket>/<key>.zip');
  }
  return { bucket: match[1], key: match[2] };
}

export function isS3Uri(candidate: string): boolean {
  return candidate.startsWith('s3://');
}

export function limitCatalog(entries: BackupEntry[], limit: number): CatalogView {
  return {
    shown: entries.slice(0, limit),
    omitted: Math.max(0, entries.length - limit),
  };
}

export function formatCatalog(title: string, entries: BackupEntry[], limit: number): string[] {
  if (entries.length === 0) {
    return [`${title}: none`];
  }

  const view = limitCatalog(entries, limit);
  const lines = [`${title}:`];
  view.shown.forEach((entry, index) => {
    lines.push(`  ${index + 1}. ${entry.name}  ${formatBytes(entry.sizeBytes)}  ${entry.modifiedAt.toISOString()}`);
  });
  if (view.omitted > 0) {
    lines.push(`  +${view.omitted} more`);
  }
  return lines;
}

export class RollbackSelector {
  private client: PlatformClient;
  private uploader: Uploader;
  private logger: OpsLogger;

  constructor(
    private config: RollbackSelectorConfig,
    deps: RollbackSelectorDeps
  ) {
    this.client = deps.client;
    this.uploader = deps.uploader;
    this.logger = deps.logger ?? defaultLogger;
  }

  async listLocal(dir: string): Promise<BackupEntry[]> {
    const dirStat = await fs.stat(dir).catch(() => null);
    if (!dirStat?.isDirectory()) {
      throw new PreconditionError(`Backup directory not found: ${dir}`, 'Pass an existing directory with --dir');
    }

    const entries: BackupEntry[] = [];

    for (const entry of await fs.readdir(dir, { withFileTypes: true })) {
      if (!entry.isFile() || !entry.name.endsWith('.zip')) continue;
      const stat = await fs.stat(path.join(dir, entry.name));
      entries.push({ name: entry.name, sizeBytes: stat.size, modifiedAt: stat.mtime, source: 'local' });
    }

    return entries.sort(newestFirst);
  }

  async listRemote(): Promise<BackupEntry[]> {
    const prefix = this.config.bucketPrefix ? `${this.config.bucketPrefix}/` : '';
    const objects = await this.client.listObjects(this.config.bucket, prefix);

    return objects
      .filter((object) => object.key.endsWith('.zip'))
      .map(
        (object): BackupEntry => ({
          name: `s3://${this.config.bucket}/${object.key}`,
          sizeBytes: object.sizeBytes,
          modifiedAt: object.lastModified,
          source: 's3',
        })
      )
      .sort(newestFirst);
  }

  async printCatalog(dir: string): Promise<{ local: BackupEntry[]; remote: BackupEntry[] }> {
    const local = await this.listLocal(dir);
    for (const line of formatCatalog(`📁 Local packages in ${path.resolve(dir)}`, local, this.config.backupDisplayLimit)) {
      this.logger.info(line);
    }

    const remote = await this.listRemote();
    for (const line of formatCatalog(`☁️  Backups in s3://${this.config.bucket}/${this.config.bucketPrefix}`, remote, this.config.backupDisplayLimit)) {
      this.logger.info(line);
    }

    return { local, remote };
  }

  /**
   * Redeploy a chosen candidate: an S3 URI is deployed by reference, a
   * local file name goes through the size-based upload.
   */
  async rollback(candidate: string, dir: string): Promise<DeployResult> {
    if (isS3Uri(candidate)) {
      const location = parseS3Uri(candidate);
      this.logger.info(`⏪ Rolling back to ${candidate}`);
      return this.uploader.deployFromStorage(location);
    }

    const artifactPath = path.isAbsolute(candidate) ? candidate : path.join(dir, candidate);
    const stat = await fs.stat(artifactPath).catch(() => null);
    if (!stat?.isFile()) {
      throw new PreconditionError(`Backup not found: ${artifactPath}`, 'List candidates with `lambda-ops rollback --list`');
    }

    this.logger.info(`⏪ Rolling back to ${artifactPath}`);
    return this.uploader.deploy(artifactPath, 'rollback');
  }
}
