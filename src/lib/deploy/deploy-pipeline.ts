/**
 * Deploy pipeline
 *
 * vendor → sanitize → archive → upload → environment → smoke test, with
 * `[i/n]` progress and per-step durations. A failing step stops the run;
 * smoke-test failures only change the exit code.
 */

import { existsSync } from 'fs';
import type { DeployConfig } from '../config.js';
import { PreconditionError } from '../errors.js';
import { logger as defaultLogger, type OpsLogger } from '../logger.js';
import type { DependencyVendorer, VendorResult } from '../packaging/dependency-vendorer.js';
import type { PackageSanitizer, SanitizeResult } from '../packaging/package-sanitizer.js';
import { formatBytes, type Archiver, type ArchiveResult } from '../packaging/archiver.js';
import type { DeployResult, Uploader } from './uploader.js';
import type { EnvironmentConfigurator, EnvironmentUpdateResult } from './environment-configurator.js';
import type { HealthReport, HealthVerifier } from './health-verifier.js';

/** Exit code when the deploy went through but smoke checks failed */
export const SMOKE_FAILURE_EXIT_CODE = 2;

export interface PipelineStep {
  name: string;
  description: string;
  execute: () => Promise<void>;
}

export interface PipelineOptions {
  /** Deploy an existing archive instead of building one */
  skipPackage?: boolean;
  skipTest?: boolean;
  skipEnv?: boolean;
  /** Archive to deploy (default: the configured artifact name) */
  packageFile?: string;
  envFile?: string;
  endpoint?: string;
  prompts?: string[];
  withDatabase?: boolean;
}

export interface PackageOutcome {
  vendor: VendorResult;
  sanitize: SanitizeResult;
  archive: ArchiveResult;
}

export interface PipelineResult {
  artifactPath: string;
  package?: PackageOutcome;
  deploy?: DeployResult;
  environment?: EnvironmentUpdateResult;
  health?: HealthReport;
  exitCode: number;
}

export interface DeployPipelineDeps {
  vendorer: DependencyVendorer;
  sanitizer: PackageSanitizer;
  archiver: Archiver;
  uploader: Uploader;
  environment: EnvironmentConfigurator;
  health: HealthVerifier;
  logger?: OpsLogger;
  clock?: () => number;
}

export type PipelineConfig = Pick<DeployConfig, 'functionName' | 'region' | 'stagingDir' | 'sourcePaths' | 'artifactName' | 'envFile'>;

export class DeployPipeline {
  private logger: OpsLogger;
  private clock: () => number;

  constructor(
    private config: PipelineConfig,
    private deps: DeployPipelineDeps
  ) {
    this.logger = deps.logger ?? defaultLogger;
    this.clock = deps.clock ?? Date.now;
  }

  /**
   * Build the deployment archive: vendored dependencies, cleaned, plus the
   * application sources.
   */
  async buildPackage(outputPath: string = this.config.artifactName): Promise<PackageOutcome> {
    const vendor = await this.deps.vendorer.vendor();
    const sanitize = await this.deps.sanitizer.sanitize(vendor.stagingDir);
    const archive = await this.deps.archiver.archive({
      stagingDir: vendor.stagingDir,
      sourcePaths: this.config.sourcePaths,
      outputPath,
    });
    return { vendor, sanitize, archive };
  }

  planSteps(options: PipelineOptions, result: PipelineResult): PipelineStep[] {
    const steps: PipelineStep[] = [];
    const artifactPath = result.artifactPath;

    if (!options.skipPackage) {
      let vendor: VendorResult | undefined;
      let sanitize: SanitizeResult | undefined;

      steps.push(
        {
          name: 'vendor',
          description: 'Install dependencies for the target platform',
          execute: async () => {
            vendor = await this.deps.vendorer.vendor();
          },
        },
        {
          name: 'sanitize',
          description: 'Remove build artifacts and conflicting modules',
          execute: async () => {
            sanitize = await this.deps.sanitizer.sanitize(vendor?.stagingDir ?? this.config.stagingDir);
          },
        },
        {
          name: 'archive',
          description: 'Create the deployment archive',
          execute: async () => {
            const archive = await this.deps.archiver.archive({
              stagingDir: vendor?.stagingDir ?? this.config.stagingDir,
              sourcePaths: this.config.sourcePaths,
              outputPath: artifactPath,
            });
            if (vendor && sanitize) {
              result.package = { vendor, sanitize, archive };
            }
          },
        }
      );
    }

    steps.push({
      name: 'upload',
      description: `Deploy code to ${this.config.functionName}`,
      execute: async () => {
        result.deploy = await this.deps.uploader.deploy(artifactPath, 'deployment');
      },
    });

    const envFile = options.envFile ?? this.config.envFile;
    if (!options.skipEnv && existsSync(envFile)) {
      steps.push({
        name: 'environment',
        description: `Apply environment from ${envFile}`,
        execute: async () => {
          result.environment = await this.deps.environment.apply(envFile);
        },
      });
    }

    if (!options.skipTest) {
      steps.push({
        name: 'smoke-test',
        description: 'Smoke-test the API',
        execute: async () => {
          result.health = await this.deps.health.verify({
            endpoint: options.endpoint,
            prompts: options.prompts,
            withDatabase: options.withDatabase,
          });
        },
      });
    }

    return steps;
  }

  async run(options: PipelineOptions = {}): Promise<PipelineResult> {
    const result: PipelineResult = {
      artifactPath: options.packageFile ?? this.config.artifactName,
      exitCode: 0,
    };

    if (options.skipPackage && !existsSync(result.artifactPath)) {
      throw new PreconditionError(
        `Deployment package not found: ${result.artifactPath}`,
        'Build it with `lambda-ops package` or drop --skip-package'
      );
    }

    const envFile = options.envFile ?? this.config.envFile;
    if (!options.skipEnv && !existsSync(envFile)) {
      this.logger.info(`ℹ️  ${envFile} not found; keeping the current environment`);
    }

    const steps = this.planSteps(options, result);
    const started = this.clock();

    this.logger.info(`🚀 Deploying ${this.config.functionName} in ${this.config.region}`);

    for (const [index, step] of steps.entries()) {
      this.logger.info(`📦 [${index + 1}/${steps.length}] ${step.description}`);
      const stepStarted = this.clock();
      try {
        await step.execute();
      } catch (error) {
        this.logger.error(`❌ ${step.description} failed after ${Math.round((this.clock() - stepStarted) / 1000)}s`, error);
        throw error;
      }
      this.logger.step(`✅ ${step.description}`, this.clock() - stepStarted);
    }

    if (result.package) {
      this.logger.info(`📦 Package: ${result.artifactPath} (${formatBytes(result.package.archive.sizeBytes)})`);
    }
    if (result.health && !result.health.ok) {
      result.exitCode = SMOKE_FAILURE_EXIT_CODE;
      this.logger.warn(`⚠️  Deployed, but ${result.health.failed} smoke check(s) failed`);
    } else {
      this.logger.success(`🎉 Deploy finished in ${Math.round((this.clock() - started) / 1000)}s`);
    }

    return result;
  }
}
