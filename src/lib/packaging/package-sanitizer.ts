/**
 * Package Sanitizer
 *
 * Strips build and test artifacts from the staging tree, and removes
 * root-level modules that would shadow a Python built-in. Some wheels
 * (old `typing` or `enum34` backports) install `typing.py` / `enum.py`
 * at the top of site-packages; at the root of the function package they
 * take precedence over the standard library and break every import of it.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { PreconditionError } from '../errors.js';
import { logger as defaultLogger, type OpsLogger } from '../logger.js';

/** Built-in module names that must never appear as `<name>.py` at the package root */
export const RESERVED_MODULE_NAMES: readonly string[] = [
  'typing',
  'http',
  'types',
  'abc',
  'collections',
  'enum',
  'json',
  'email',
  'logging',
  'dataclasses',
  'asyncio',
  'socket',
  'ssl',
  'uuid',
  'decimal',
  'functools',
];

const ARTIFACT_DIR_NAMES = new Set(['__pycache__', 'tests', 'test']);
const ARTIFACT_DIR_SUFFIXES = ['.dist-info', '.egg-info'];
const ARTIFACT_FILE_SUFFIXES = ['.pyc', '.pyo'];

export interface SanitizeResult {
  /** Paths relative to the staging root */
  removedArtifacts: string[];
  removedConflicts: string[];
}

export function isArtifactDirectory(name: string): boolean {
  return ARTIFACT_DIR_NAMES.has(name) || ARTIFACT_DIR_SUFFIXES.some((suffix) => name.endsWith(suffix));
}

export function isArtifactFile(name: string): boolean {
  return ARTIFACT_FILE_SUFFIXES.some((suffix) => name.endsWith(suffix));
}

export function isReservedModuleFile(name: string): boolean {
  if (!name.endsWith('.py')) return false;
  return RESERVED_MODULE_NAMES.includes(name.slice(0, -'.py'.length));
}

export class PackageSanitizer {
  private logger: OpsLogger;

  constructor(deps: { logger?: OpsLogger } = {}) {
    this.logger = deps.logger ?? defaultLogger;
  }

  async sanitize(stagingDir: string): Promise<SanitizeResult> {
    const stat = await fs.stat(stagingDir).catch(() => null);
    if (!stat?.isDirectory()) {
      throw new PreconditionError(`Staging directory not found: ${stagingDir}`, 'Vendor dependencies first (drop --skip-package)');
    }

    const result: SanitizeResult = { removedArtifacts: [], removedConflicts: [] };

    for (const entry of await fs.readdir(stagingDir, { withFileTypes: true })) {
      if (entry.isFile() && isReservedModuleFile(entry.name)) {
        await fs.rm(path.join(stagingDir, entry.name), { force: true });
        result.removedConflicts.push(entry.name);
        this.logger.warn(`⚠️  Removed ${entry.name}: it shadows the built-in '${entry.name.slice(0, -3)}' module`);
      }
    }

    await this.removeArtifacts(stagingDir, '', result.removedArtifacts);

    result.removedArtifacts.sort();
    result.removedConflicts.sort();

    if (result.removedConflicts.length === 0) {
      this.logger.debug('No built-in module conflicts found');
    }
    this.logger.info(`🧹 Removed ${result.removedArtifacts.length} build/test artifacts`);

    return result;
  }

  private async removeArtifacts(root: string, relative: string, removed: string[]): Promise<void> {
    const dir = path.join(root, relative);

    for (const entry of await fs.readdir(dir, { withFileTypes: true })) {
      const entryRelative = relative ? `${relative}/${entry.name}` : entry.name;
      const entryPath = path.join(dir, entry.name);

      if (entry.isDirectory()) {
        if (isArtifactDirectory(entry.name)) {
          await fs.rm(entryPath, { recursive: true, force: true });
          removed.push(entryRelative);
        } else {
          await this.removeArtifacts(root, entryRelative, removed);
        }
      } else if (entry.isFile() && isArtifactFile(entry.name)) {
        await fs.rm(entryPath, { force: true });
        removed.push(entryRelative);
      }
    }
  }
}
