/**
 * Uploader/Deployer
 *
 * Ships an artifact to the function. Archives up to the direct-upload
 * limit go inline; anything larger is staged in S3 under a
 * timestamp-qualified key and deployed by reference.
 */

import * as fs from 'fs/promises';
import type { DeployConfig } from '../config.js';
import type { FunctionState, PlatformClient } from '../aws-clients.js';
import { PreconditionError, RemoteStateError } from '../errors.js';
import { pollUntil, type SleepFn } from '../retry-utils.js';
import { logger as defaultLogger, type OpsLogger } from '../logger.js';
import { formatBytes } from '../packaging/archiver.js';

export type UploadPath = 'direct' | 'staged';

/** Key prefix of staged objects: a fresh build or a rollback re-upload */
export type UploadPurpose = 'deployment' | 'rollback';

export interface StorageLocation {
  bucket: string;
  key: string;
}

export interface DeployResult {
  path: UploadPath | 'storage-reference';
  sizeBytes?: number;
  location?: StorageLocation;
  converged: boolean;
  attempts: number;
  state: FunctionState;
}

export type UploaderConfig = Pick<
  DeployConfig,
  'functionName' | 'bucket' | 'bucketPrefix' | 'directUploadLimitBytes' | 'pollMaxAttempts' | 'pollIntervalMs'
>;

export interface UploaderDeps {
  client: PlatformClient;
  logger?: OpsLogger;
  sleep?: SleepFn;
  now?: () => Date;
}

export function chooseUploadPath(sizeBytes: number, limitBytes: number): UploadPath {
  return sizeBytes <= limitBytes ? 'direct' : 'staged';
}

/** `YYYYMMDD-HHMMSS` in UTC */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `-${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

export function stagedObjectKey(prefix: string, purpose: UploadPurpose, date: Date): string {
  const name = `${purpose}-${formatTimestamp(date)}.zip`;
  return prefix ? `${prefix}/${name}` : name;
}

/**
 * Active with no update in flight. A Failed state or update is reported
 * by `assertNotFailed`, not treated as done.
 */
export function isSettled(state: FunctionState): boolean {
  return state.state === 'Active' && state.lastUpdateStatus !== 'InProgress';
}

function assertNotFailed(state: FunctionState): void {
  if (state.state === 'Failed') {
    throw new RemoteStateError(state.functionName, 'state Failed', state.stateReason);
  }
  if (state.lastUpdateStatus === 'Failed') {
    throw new RemoteStateError(state.functionName, 'update Failed', state.lastUpdateStatusReason);
  }
}

export class Uploader {
  private client: PlatformClient;
  private logger: OpsLogger;
  private sleep?: SleepFn;
  private now: () => Date;

  constructor(
    private config: UploaderConfig,
    deps: UploaderDeps
  ) {
    this.client = deps.client;
    this.logger = deps.logger ?? defaultLogger;
    this.sleep = deps.sleep;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Deploy a local artifact, choosing the path from its size.
   */
  async deploy(artifactPath: string, purpose: UploadPurpose = 'deployment'): Promise<DeployResult> {
    const stat = await fs.stat(artifactPath).catch(() => null);
    if (!stat?.isFile()) {
      throw new PreconditionError(`Deployment package not found: ${artifactPath}`, 'Build it first with `lambda-ops package`');
    }

    const body = await fs.readFile(artifactPath);
    const uploadPath = chooseUploadPath(body.length, this.config.directUploadLimitBytes);

    this.logger.info(
      `📤 ${artifactPath} is ${formatBytes(body.length)}; using the ${uploadPath} upload path (limit ${formatBytes(this.config.directUploadLimitBytes)})`
    );

    if (uploadPath === 'direct') {
      await this.client.updateFunctionCode(this.config.functionName, { kind: 'inline', zipFile: body });
      const outcome = await this.waitForActive();
      return { path: 'direct', sizeBytes: body.length, ...outcome };
    }

    const location: StorageLocation = {
      bucket: this.config.bucket,
      key: stagedObjectKey(this.config.bucketPrefix, purpose, this.now()),
    };
    this.logger.info(`☁️  Uploading to s3://${location.bucket}/${location.key}`);
    await this.client.putObject(location.bucket, location.key, body);

    await this.client.updateFunctionCode(this.config.functionName, { kind: 'storage', ...location });
    const outcome = await this.waitForActive();
    return { path: 'staged', sizeBytes: body.length, location, ...outcome };
  }

  /**
   * Point the function at an object that is already in S3. No size check.
   */
  async deployFromStorage(location: StorageLocation): Promise<DeployResult> {
    this.logger.info(`☁️  Deploying from s3://${location.bucket}/${location.key}`);
    await this.client.updateFunctionCode(this.config.functionName, { kind: 'storage', ...location });
    const outcome = await this.waitForActive();
    return { path: 'storage-reference', location, ...outcome };
  }

  /**
   * Poll until the function is Active with no update in progress.
   * Running out of attempts is a warning, not an error.
   */
  async waitForActive(): Promise<{ converged: boolean; attempts: number; state: FunctionState }> {
    this.logger.info(`⏳ Waiting for ${this.config.functionName} to become Active...`);

    const outcome = await pollUntil(
      async () => {
        const state = await this.client.getFunctionState(this.config.functionName);
        assertNotFailed(state);
        return state;
      },
      isSettled,
      {
        maxAttempts: this.config.pollMaxAttempts,
        intervalMs: this.config.pollIntervalMs,
        sleep: this.sleep,
      }
    );

    if (outcome.converged) {
      this.logger.success(`✅ ${this.config.functionName} is Active`);
    } else {
      this.logger.warn(
        `⚠️  ${this.config.functionName} still ${outcome.last.state ?? 'unknown'}/${outcome.last.lastUpdateStatus ?? 'unknown'} after ${outcome.attempts} checks; the update may still complete`
      );
    }

    return { converged: outcome.converged, attempts: outcome.attempts, state: outcome.last };
  }
}
