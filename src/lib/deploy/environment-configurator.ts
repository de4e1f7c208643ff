/**
 * Environment Configurator
 *
 * Pushes an env file to the function as its complete environment. The
 * submitted mapping replaces whatever was set before.
 */

import * as fs from 'fs/promises';
import type { PlatformClient } from '../aws-clients.js';
import { PreconditionError } from '../errors.js';
import { logger as defaultLogger, type OpsLogger } from '../logger.js';
import { displayValue, filterReservedKeys, parseEnvFile } from './env-file.js';
import type { Uploader } from './uploader.js';

export interface EnvironmentUpdateResult {
  submitted: Record<string, string>;
  rejected: string[];
  dryRun: boolean;
  converged?: boolean;
}

export interface EnvironmentConfiguratorDeps {
  client: PlatformClient;
  /** Supplies the wait-for-Active poll shared with code updates */
  uploader: Uploader;
  logger?: OpsLogger;
}

export class EnvironmentConfigurator {
  private client: PlatformClient;
  private uploader: Uploader;
  private logger: OpsLogger;

  constructor(
    private functionName: string,
    deps: EnvironmentConfiguratorDeps
  ) {
    this.client = deps.client;
    this.uploader = deps.uploader;
    this.logger = deps.logger ?? defaultLogger;
  }

  async load(envFile: string): Promise<{ accepted: Record<string, string>; rejected: string[] }> {
    let content: string;
    try {
      content = await fs.readFile(envFile, 'utf-8');
    } catch (error) {
      throw new PreconditionError(
        `Cannot read environment file ${envFile}: ${error instanceof Error ? error.message : String(error)}`,
        'Create it with KEY=VALUE lines or pass --env-file <path>'
      );
    }
    return filterReservedKeys(parseEnvFile(content));
  }

  async apply(envFile: string, options: { dryRun?: boolean } = {}): Promise<EnvironmentUpdateResult> {
    const { accepted, rejected } = await this.load(envFile);
    const dryRun = options.dryRun ?? false;

    for (const key of rejected) {
      this.logger.warn(`⚠️  Skipping ${key}: reserved by the Lambda runtime`);
    }

    this.logger.info(`📋 ${Object.keys(accepted).length} variables from ${envFile}:`);
    for (const [key, value] of Object.entries(accepted)) {
      this.logger.info(`   ✓ ${key}=${displayValue(key, value)}`);
    }

    if (dryRun) {
      this.logger.info('🔍 Dry run: nothing submitted');
      return { submitted: accepted, rejected, dryRun };
    }

    await this.client.updateFunctionEnvironment(this.functionName, accepted);
    this.logger.success(`✅ Environment of ${this.functionName} replaced`);

    const { converged } = await this.uploader.waitForActive();
    return { submitted: accepted, rejected, dryRun, converged };
  }
}
