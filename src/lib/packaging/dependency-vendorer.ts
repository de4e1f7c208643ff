/**
 * Dependency Vendorer
 *
 * Installs the function's Python dependencies into the staging directory,
 * resolved for the Lambda execution environment (manylinux2014, CPython,
 * target runtime version) instead of the operator's machine.
 */

import * as fs from 'fs/promises';
import { existsSync } from 'fs';
import type { DeployConfig } from '../config.js';
import { CommandFailedError, PreconditionError, ToolingCapabilityError } from '../errors.js';
import { formatCommand, SpawnCommandRunner, type CommandResult, type CommandRunner } from '../command-runner.js';
import { logger as defaultLogger, type OpsLogger } from '../logger.js';

/** First pip release whose resolver honours --platform with --only-binary=:all: for manylinux2014 */
export const MIN_PIP_VERSION = '20.3';

export type VendorerConfig = Pick<DeployConfig, 'requirementsFile' | 'stagingDir' | 'runtime' | 'architecture'>;

export interface VendorerDeps {
  runner?: CommandRunner;
  logger?: OpsLogger;
  /** Executable that runs pip (default: `pip`) */
  pipCommand?: string;
}

export interface VendorResult {
  stagingDir: string;
  pipVersion: string;
  installedDistributions: number;
}

export function parsePipVersion(output: string): string | null {
  const match = /^pip\s+(\d+(?:\.\d+)*)/m.exec(output.trim());
  return match ? match[1] : null;
}

/**
 * Numeric dotted-version comparison; missing components count as 0.
 */
export function compareVersions(a: string, b: string): number {
  const left = a.split('.').map((part) => parseInt(part, 10) || 0);
  const right = b.split('.').map((part) => parseInt(part, 10) || 0);
  const length = Math.max(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return diff < 0 ? -1 : 1;
  }
  return 0;
}

export function platformTag(architecture: VendorerConfig['architecture']): string {
  return architecture === 'arm64' ? 'manylinux2014_aarch64' : 'manylinux2014_x86_64';
}

export function buildPipInstallArgs(config: VendorerConfig): string[] {
  return [
    'install',
    '-r', config.requirementsFile,
    '--target', config.stagingDir,
    '--platform', platformTag(config.architecture),
    '--implementation', 'cp',
    '--python-version', config.runtime,
    '--only-binary=:all:',
    '--upgrade',
  ];
}

export class DependencyVendorer {
  private runner: CommandRunner;
  private logger: OpsLogger;
  private pipCommand: string;

  constructor(
    private config: VendorerConfig,
    deps: VendorerDeps = {}
  ) {
    this.runner = deps.runner ?? new SpawnCommandRunner();
    this.logger = deps.logger ?? defaultLogger;
    this.pipCommand = deps.pipCommand ?? 'pip';
  }

  /**
   * Verify pip can do cross-platform binary-only installs.
   * Returns the detected version.
   */
  async checkResolverCapability(): Promise<string> {
    let result: CommandResult;
    try {
      result = await this.runner.run(this.pipCommand, ['--version']);
    } catch (error) {
      throw new PreconditionError(
        `Could not run ${this.pipCommand}: ${error instanceof Error ? error.message : String(error)}`,
        'Install Python 3 with pip, or activate the virtualenv that has it'
      );
    }
    if (result.exitCode !== 0) {
      throw new CommandFailedError(formatCommand(this.pipCommand, ['--version']), result.exitCode, result.stderr);
    }

    const version = parsePipVersion(result.stdout);
    if (!version) {
      throw new ToolingCapabilityError(this.pipCommand, 'unknown', MIN_PIP_VERSION);
    }
    if (compareVersions(version, MIN_PIP_VERSION) < 0) {
      throw new ToolingCapabilityError(this.pipCommand, version, MIN_PIP_VERSION);
    }

    this.logger.debug(`pip ${version} supports cross-platform installs`);
    return version;
  }

  /**
   * Wipe the staging directory and install every requirement into it.
   */
  async vendor(): Promise<VendorResult> {
    if (!existsSync(this.config.requirementsFile)) {
      throw new PreconditionError(
        `Requirements file not found: ${this.config.requirementsFile}`,
        'Run from the project root or pass the path with DEPLOY_REQUIREMENTS_FILE'
      );
    }

    const pipVersion = await this.checkResolverCapability();

    await fs.rm(this.config.stagingDir, { recursive: true, force: true });
    await fs.mkdir(this.config.stagingDir, { recursive: true });

    const args = buildPipInstallArgs(this.config);
    this.logger.info(`📦 Installing dependencies for ${platformTag(this.config.architecture)} / Python ${this.config.runtime}`);
    this.logger.debug(`🔧 ${formatCommand(this.pipCommand, args)}`);

    const result = await this.runner.run(this.pipCommand, args, { inherit: true });
    if (result.exitCode !== 0) {
      throw new CommandFailedError(formatCommand(this.pipCommand, args), result.exitCode, result.stderr);
    }

    const entries = await fs.readdir(this.config.stagingDir);
    const installedDistributions = entries.filter((entry) => entry.endsWith('.dist-info')).length;

    return { stagingDir: this.config.stagingDir, pipVersion, installedDistributions };
  }
}
