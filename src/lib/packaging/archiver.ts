/**
 * Archiver
 *
 * Zips the sanitized staging tree plus the application sources into one
 * deployment artifact. Entries are flat (no folder records), keyed by
 * their posix path, sorted, and written with a fixed timestamp so the
 * same inputs always give the same bytes.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import JSZip from 'jszip';
import type { DeployConfig } from '../config.js';
import { ArtifactTooLargeError, PreconditionError } from '../errors.js';
import { logger as defaultLogger, type OpsLogger } from '../logger.js';

/** Earliest date a zip header can carry; used for every entry */
export const FIXED_ENTRY_DATE = new Date(Date.UTC(1980, 0, 1, 0, 0, 0));

export interface ArchiveEntry {
  /** Logical path inside the archive (posix) */
  name: string;
  absolutePath: string;
  sizeBytes: number;
  mode: number;
  origin: 'dependency' | 'source';
}

export interface ArchiveRequest {
  stagingDir: string;
  sourcePaths: string[];
  outputPath: string;
}

export interface ArchiveResult {
  path: string;
  sizeBytes: number;
  entryCount: number;
  uncompressedBytes: number;
  /** Logical paths present in both the staging tree and the sources */
  duplicates: string[];
}

function skipInSources(name: string, isDirectory: boolean): boolean {
  return isDirectory ? name === '__pycache__' : name.endsWith('.pyc') || name.endsWith('.pyo');
}

async function walk(
  root: string,
  prefix: string,
  origin: ArchiveEntry['origin'],
  out: ArchiveEntry[]
): Promise<void> {
  const entries = await fs.readdir(root, { withFileTypes: true });

  for (const entry of entries) {
    const absolutePath = path.join(root, entry.name);
    const name = prefix ? `${prefix}/${entry.name}` : entry.name;

    if (origin === 'source' && skipInSources(entry.name, entry.isDirectory())) {
      continue;
    }

    if (entry.isDirectory()) {
      await walk(absolutePath, name, origin, out);
    } else if (entry.isFile()) {
      const stat = await fs.stat(absolutePath);
      out.push({ name, absolutePath, sizeBytes: stat.size, mode: stat.mode, origin });
    }
  }
}

/**
 * Gather archive entries. Sources are added after dependencies and win on
 * a path collision, so each logical path appears once.
 */
export async function collectEntries(
  stagingDir: string,
  sourcePaths: string[]
): Promise<{ entries: ArchiveEntry[]; duplicates: string[] }> {
  const dependencyEntries: ArchiveEntry[] = [];
  await walk(stagingDir, '', 'dependency', dependencyEntries);

  const sourceEntries: ArchiveEntry[] = [];
  for (const sourcePath of sourcePaths) {
    const stat = await fs.stat(sourcePath).catch(() => null);
    if (!stat) {
      throw new PreconditionError(`Source path not found: ${sourcePath}`, 'Check DEPLOY_SOURCE_PATHS');
    }
    const base = path.basename(path.resolve(sourcePath));
    if (stat.isDirectory()) {
      await walk(sourcePath, base, 'source', sourceEntries);
    } else {
      sourceEntries.push({ name: base, absolutePath: sourcePath, sizeBytes: stat.size, mode: stat.mode, origin: 'source' });
    }
  }

  const byName = new Map<string, ArchiveEntry>();
  const duplicates = new Set<string>();

  for (const entry of [...dependencyEntries, ...sourceEntries]) {
    if (byName.has(entry.name)) {
      duplicates.add(entry.name);
    }
    byName.set(entry.name, entry);
  }

  const entries = [...byName.values()].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  return { entries, duplicates: [...duplicates].sort() };
}

export async function listArchiveEntries(archivePath: string): Promise<string[]> {
  const zip = await JSZip.loadAsync(await fs.readFile(archivePath));
  return Object.values(zip.files)
    .filter((file) => !file.dir)
    .map((file) => file.name)
    .sort();
}

export class Archiver {
  private logger: OpsLogger;

  constructor(
    private config: Pick<DeployConfig, 'unzippedLimitBytes'>,
    deps: { logger?: OpsLogger } = {}
  ) {
    this.logger = deps.logger ?? defaultLogger;
  }

  async archive(request: ArchiveRequest): Promise<ArchiveResult> {
    const stagingStat = await fs.stat(request.stagingDir).catch(() => null);
    if (!stagingStat?.isDirectory()) {
      throw new PreconditionError(`Staging directory not found: ${request.stagingDir}`);
    }

    const { entries, duplicates } = await collectEntries(request.stagingDir, request.sourcePaths);
    const uncompressedBytes = entries.reduce((sum, entry) => sum + entry.sizeBytes, 0);

    if (uncompressedBytes > this.config.unzippedLimitBytes) {
      throw new ArtifactTooLargeError(uncompressedBytes, this.config.unzippedLimitBytes);
    }

    for (const duplicate of duplicates) {
      this.logger.warn(`⚠️  ${duplicate} exists in both dependencies and sources; keeping the source copy`);
    }

    const zip = new JSZip();
    for (const entry of entries) {
      zip.file(entry.name, await fs.readFile(entry.absolutePath), {
        date: FIXED_ENTRY_DATE,
        unixPermissions: entry.mode,
        createFolders: false,
      });
    }

    const buffer = await zip.generateAsync({
      type: 'nodebuffer',
      compression: 'DEFLATE',
      compressionOptions: { level: 9 },
      platform: 'UNIX',
    });

    await fs.mkdir(path.dirname(path.resolve(request.outputPath)), { recursive: true });
    await fs.writeFile(request.outputPath, buffer);

    this.logger.info(`🗜️  ${request.outputPath}: ${entries.length} files, ${formatBytes(buffer.length)} (${formatBytes(uncompressedBytes)} unzipped)`);

    return {
      path: request.outputPath,
      sizeBytes: buffer.length,
      entryCount: entries.length,
      uncompressedBytes,
      duplicates,
    };
  }
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KiB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MiB`;
}
