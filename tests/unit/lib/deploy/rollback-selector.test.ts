/**
 * Unit Tests for the Rollback Selector
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  RollbackSelector,
  formatCatalog,
  limitCatalog,
  parseS3Uri,
  type BackupEntry,
} from '../../../../src/lib/deploy/rollback-selector.js';
import { Uploader } from '../../../../src/lib/deploy/uploader.js';
import { PreconditionError } from '../../../../src/lib/errors.js';
import { FakePlatformClient, createCapturingLogger, noSleep } from '../../helpers/fakes.js';

function entry(name: string, iso: string, sizeBytes = 2048): BackupEntry {
  return { name, sizeBytes, modifiedAt: new Date(iso), source: 'local' };
}

describe('parseS3Uri', () => {
  it('should split bucket and key', () => {
    expect(parseS3Uri('s3://test-bucket/deployments/deployment-20240101-120000.zip')).toEqual({
      bucket: 'test-bucket',
      key: 'deployments/deployment-20240101-120000.zip',
    });
  });

  it('should reject URIs without a key', () => {
    expect(() => parseS3Uri('s3://test-bucket')).toThrow(PreconditionError);
    expect(() => parseS3Uri('s3://test-bucket/')).toThrow('Malformed S3 URI: s3://test-bucket/');
    expect(() => parseS3Uri('s3://test-bucket/folder/')).toThrow(PreconditionError);
  });
});

describe('catalog formatting', () => {
  const entries = [
    entry('c.zip', '2024-01-03T00:00:00.000Z'),
    entry('b.zip', '2024-01-02T00:00:00.000Z'),
    entry('a.zip', '2024-01-01T00:00:00.000Z'),
  ];

  it('should cap the listing and count the rest', () => {
    expect(limitCatalog(entries, 2)).toEqual({ shown: entries.slice(0, 2), omitted: 1 });
    expect(limitCatalog(entries, 10).omitted).toBe(0);
  });

  it('should render numbered lines and the overflow count', () => {
    expect(formatCatalog('Backups', entries, 2)).toEqual([
      'Backups:',
      '  1. c.zip  2.0 KiB  2024-01-03T00:00:00.000Z',
      '  2. b.zip  2.0 KiB  2024-01-02T00:00:00.000Z',
      '  +1 more',
    ]);
  });

  it('should say when there is nothing', () => {
    expect(formatCatalog('Backups', [], 5)).toEqual(['Backups: none']);
  });
});

describe('RollbackSelector', () => {
  let dir: string;
  let client: FakePlatformClient;

  function createSelector(directUploadLimitBytes = 1024, logger = createCapturingLogger().logger): RollbackSelector {
    const uploader = new Uploader(
      {
        functionName: 'llm-backend',
        bucket: 'test-bucket',
        bucketPrefix: 'deployments',
        directUploadLimitBytes,
        pollMaxAttempts: 2,
        pollIntervalMs: 0,
      },
      { client, logger, sleep: noSleep, now: () => new Date('2024-02-03T04:05:06.000Z') }
    );
    return new RollbackSelector(
      { bucket: 'test-bucket', bucketPrefix: 'deployments', backupDisplayLimit: 10 },
      { client, uploader, logger }
    );
  }

  function writeZip(name: string, iso: string, size = 8): void {
    const file = path.join(dir, name);
    fs.writeFileSync(file, Buffer.alloc(size));
    const when = new Date(iso);
    fs.utimesSync(file, when, when);
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'lambda-ops-rollback-'));
    client = new FakePlatformClient();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should list local zips newest first', async () => {
    writeZip('older.zip', '2024-01-01T00:00:00.000Z');
    writeZip('newest.zip', '2024-01-03T00:00:00.000Z');
    writeZip('middle.zip', '2024-01-02T00:00:00.000Z');
    fs.writeFileSync(path.join(dir, 'notes.txt'), 'ignored');

    const local = await createSelector().listLocal(dir);

    expect(local.map((e) => e.name)).toEqual(['newest.zip', 'middle.zip', 'older.zip']);
    expect(local[0].sizeBytes).toBe(8);
  });

  it('should reject a local directory that does not exist', async () => {
    const missing = path.join(dir, 'no-such-dir');

    await expect(createSelector().listLocal(missing)).rejects.toBeInstanceOf(PreconditionError);
    await expect(createSelector().printCatalog(missing)).rejects.toThrow(`Backup directory not found: ${missing}`);
    expect(client.calls).toEqual([]);
  });

  it('should print the local catalog before listing S3', async () => {
    writeZip('previous.zip', '2024-01-01T00:00:00.000Z');
    client.listFailure = new Error('AccessDenied');
    const capture = createCapturingLogger();

    await expect(createSelector(1024, capture.logger).printCatalog(dir)).rejects.toThrow('AccessDenied');

    expect(capture.messages()).toEqual([
      `📁 Local packages in ${path.resolve(dir)}:`,
      '  1. previous.zip  8 B  2024-01-01T00:00:00.000Z',
    ]);
  });

  it('should list remote zips under the prefix newest first', async () => {
    client.objects = [
      { key: 'deployments/deployment-20240101-000000.zip', sizeBytes: 10, lastModified: new Date('2024-01-01T00:00:00Z') },
      { key: 'deployments/rollback-20240105-000000.zip', sizeBytes: 20, lastModified: new Date('2024-01-05T00:00:00Z') },
      { key: 'deployments/readme.txt', sizeBytes: 1, lastModified: new Date('2024-01-09T00:00:00Z') },
      { key: 'other/deployment-20240110-000000.zip', sizeBytes: 30, lastModified: new Date('2024-01-10T00:00:00Z') },
    ];

    const remote = await createSelector().listRemote();

    expect(remote.map((e) => e.name)).toEqual([
      's3://test-bucket/deployments/rollback-20240105-000000.zip',
      's3://test-bucket/deployments/deployment-20240101-000000.zip',
    ]);
    expect(client.calls[0]).toEqual({ op: 'listObjects', bucket: 'test-bucket', prefix: 'deployments/' });
  });

  it('should redeploy an S3 backup by reference', async () => {
    const result = await createSelector().rollback('s3://test-bucket/deployments/deployment-20240101-000000.zip', dir);

    expect(result.path).toBe('storage-reference');
    expect(client.calls[0]).toEqual({
      op: 'updateFunctionCode',
      functionName: 'llm-backend',
      source: { kind: 'storage', bucket: 'test-bucket', key: 'deployments/deployment-20240101-000000.zip' },
    });
  });

  it('should re-upload a large local backup under the rollback prefix', async () => {
    writeZip('previous.zip', '2024-01-01T00:00:00.000Z', 64);

    const result = await createSelector(32).rollback('previous.zip', dir);

    expect(result.path).toBe('staged');
    expect(result.location?.key).toBe('deployments/rollback-20240203-040506.zip');
  });

  it('should reject a local candidate that does not exist', async () => {
    await expect(createSelector().rollback('gone.zip', dir)).rejects.toBeInstanceOf(PreconditionError);
    expect(client.calls).toEqual([]);
  });

  it('should reject a malformed S3 candidate before any remote call', async () => {
    await expect(createSelector().rollback('s3://test-bucket', dir)).rejects.toThrow('Malformed S3 URI');
    expect(client.calls).toEqual([]);
  });
});
