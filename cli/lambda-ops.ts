#!/usr/bin/env node

/**
 * lambda-ops CLI
 * Package, deploy, configure, roll back and smoke-test the Lambda HTTP API.
 */

import { Command } from 'commander';
import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { loadDeployConfig, type DeployConfig, type DeployConfigInput } from '../src/lib/config.js';
import { describeError, exitCodeFor } from '../src/lib/errors.js';
import { logger as defaultLogger, type OpsLogger } from '../src/lib/logger.js';
import { AwsPlatformClient, type PlatformClient } from '../src/lib/aws-clients.js';
import type { CommandRunner } from '../src/lib/command-runner.js';
import type { SleepFn } from '../src/lib/retry-utils.js';
import { VERSION } from '../src/lib/version.js';
import { DependencyVendorer } from '../src/lib/packaging/dependency-vendorer.js';
import { PackageSanitizer } from '../src/lib/packaging/package-sanitizer.js';
import { Archiver, formatBytes } from '../src/lib/packaging/archiver.js';
import { Uploader } from '../src/lib/deploy/uploader.js';
import { EnvironmentConfigurator } from '../src/lib/deploy/environment-configurator.js';
import { HealthVerifier, type FetchFn } from '../src/lib/deploy/health-verifier.js';
import { RollbackSelector } from '../src/lib/deploy/rollback-selector.js';
import { DeployPipeline, SMOKE_FAILURE_EXIT_CODE } from '../src/lib/deploy/deploy-pipeline.js';

// ============================================================================
// WIRING
// ============================================================================

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  /** Directory searched for `.env` */
  cwd?: string;
  createClient?: (config: DeployConfig) => PlatformClient;
  runner?: CommandRunner;
  fetch?: FetchFn;
  sleep?: SleepFn;
  logger?: OpsLogger;
  /** Receives the exit code of each command */
  setExitCode?: (code: number) => void;
}

export interface Toolkit {
  config: DeployConfig;
  client: PlatformClient;
  uploader: Uploader;
  environment: EnvironmentConfigurator;
  health: HealthVerifier;
  rollback: RollbackSelector;
  pipeline: DeployPipeline;
}

export function createToolkit(config: DeployConfig, deps: CliDeps = {}): Toolkit {
  const logger = deps.logger ?? defaultLogger;
  const client = deps.createClient
    ? deps.createClient(config)
    : new AwsPlatformClient({ region: config.region, profile: config.profile });

  const uploader = new Uploader(config, { client, logger, sleep: deps.sleep });
  const environment = new EnvironmentConfigurator(config.functionName, { client, uploader, logger });
  const health = new HealthVerifier(config, { client, fetch: deps.fetch, logger });
  const rollback = new RollbackSelector(config, { client, uploader, logger });
  const pipeline = new DeployPipeline(config, {
    vendorer: new DependencyVendorer(config, { runner: deps.runner, logger }),
    sanitizer: new PackageSanitizer({ logger }),
    archiver: new Archiver(config, { logger }),
    uploader,
    environment,
    health,
    logger,
  });

  return { config, client, uploader, environment, health, rollback, pipeline };
}

// ============================================================================
// OPTIONS
// ============================================================================

const globalOptionsSchema = z.object({
  region: z.string().optional(),
  profile: z.string().optional(),
  function: z.string().optional(),
  bucket: z.string().optional(),
  logFormat: z.enum(['pretty', 'json']).optional(),
  verbose: z.boolean().optional(),
});

const packageOptionsSchema = globalOptionsSchema.extend({
  output: z.string().optional(),
});

const deployOptionsSchema = globalOptionsSchema.extend({
  package: z.string().optional(),
  skipPackage: z.boolean().optional(),
  skipTest: z.boolean().optional(),
  skipEnv: z.boolean().optional(),
  envFile: z.string().optional(),
  endpoint: z.string().optional(),
  withDb: z.boolean().optional(),
});

const envOptionsSchema = globalOptionsSchema.extend({
  envFile: z.string().optional(),
  dryRun: z.boolean().optional(),
});

const rollbackOptionsSchema = globalOptionsSchema.extend({
  list: z.boolean().optional(),
  dir: z.string().default('.'),
});

const testOptionsSchema = globalOptionsSchema.extend({
  endpoint: z.string().optional(),
  prompt: z.array(z.string()).optional(),
  withDb: z.boolean().optional(),
});

type GlobalOptions = z.infer<typeof globalOptionsSchema>;

export function toConfigOverrides(options: GlobalOptions): Partial<DeployConfigInput> {
  return {
    region: options.region,
    profile: options.profile,
    functionName: options.function,
    bucket: options.bucket,
    logFormat: options.logFormat,
    logLevel: options.verbose ? 'DEBUG' : undefined,
  };
}

// ============================================================================
// PROGRAM
// ============================================================================

export function buildProgram(deps: CliDeps = {}): Command {
  const logger = deps.logger ?? defaultLogger;
  const setExitCode =
    deps.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });

  /**
   * Load config, wire components and run one command body; any thrown
   * error becomes a printed message and a non-zero exit code.
   */
  async function execute<S extends z.ZodType<GlobalOptions, z.ZodTypeDef, unknown>>(
    name: string,
    command: Command,
    schema: S,
    body: (toolkit: Toolkit, options: z.infer<S>) => Promise<number>
  ): Promise<void> {
    let code: number;
    try {
      const options = schema.parse(command.optsWithGlobals());
      const config = loadDeployConfig(deps.env ?? process.env, toConfigOverrides(options), { cwd: deps.cwd });
      logger.configure({ minLevel: config.logLevel, format: config.logFormat });
      logger.setContext({ command: name, functionName: config.functionName, region: config.region });
      code = await body(createToolkit(config, deps), options);
    } catch (error) {
      logger.error(`❌ ${describeError(error)}`);
      code = exitCodeFor(error);
    }
    setExitCode(code);
  }

  const program = new Command();

  program
    .name('lambda-ops')
    .description('Deploy, configure, roll back and smoke-test the Lambda HTTP API')
    .version(VERSION)
    .option('--region <region>', 'AWS region (env: AWS_REGION)')
    .option('--profile <profile>', 'AWS named profile (env: AWS_PROFILE)')
    .option('--function <name>', 'Lambda function name (env: LAMBDA_FUNCTION_NAME)')
    .option('--bucket <name>', 'Deployment bucket (env: DEPLOY_BUCKET)')
    .option('--log-format <format>', 'pretty or json (env: LOG_FORMAT)')
    .option('-v, --verbose', 'Debug logging');

  program
    .command('package')
    .description('Vendor dependencies, clean them and build the deployment archive')
    .option('-o, --output <file>', 'Archive path (default: DEPLOY_ARTIFACT_NAME)')
    .action(async (_options: unknown, command: Command) =>
      execute('package', command, packageOptionsSchema, async (toolkit, options) => {
        const outcome = await toolkit.pipeline.buildPackage(options.output);
        logger.success(
          `✅ ${outcome.archive.path}: ${formatBytes(outcome.archive.sizeBytes)}, ${outcome.archive.entryCount} files`
        );
        return 0;
      })
    );

  program
    .command('deploy')
    .description('Build (unless skipped), upload, configure and smoke-test')
    .option('-p, --package <file>', 'Archive to deploy')
    .option('--skip-package', 'Deploy an existing archive')
    .option('--skip-test', 'Skip the smoke test')
    .option('--skip-env', 'Leave the function environment unchanged')
    .option('--env-file <path>', 'Environment file (default: .env.lambda)')
    .option('--endpoint <url>', 'API base URL (default: looked up by API name)')
    .option('--with-db', 'Also smoke-test the database-backed endpoint')
    .action(async (_options: unknown, command: Command) =>
      execute('deploy', command, deployOptionsSchema, async (toolkit, options) => {
        const result = await toolkit.pipeline.run({
          packageFile: options.package,
          skipPackage: options.skipPackage,
          skipTest: options.skipTest,
          skipEnv: options.skipEnv,
          envFile: options.envFile,
          endpoint: options.endpoint,
          withDatabase: options.withDb,
        });
        return result.exitCode;
      })
    );

  program
    .command('env')
    .description('Replace the function environment with the contents of an env file')
    .option('--env-file <path>', 'Environment file (default: .env.lambda)')
    .option('--dry-run', 'Show what would be submitted')
    .action(async (_options: unknown, command: Command) =>
      execute('env', command, envOptionsSchema, async (toolkit, options) => {
        await toolkit.environment.apply(options.envFile ?? toolkit.config.envFile, { dryRun: options.dryRun });
        return 0;
      })
    );

  program
    .command('rollback')
    .description('List earlier packages, or redeploy one of them')
    .argument('[candidate]', 'Local archive name or s3://bucket/key')
    .option('-l, --list', 'List local and S3 backups')
    .option('-d, --dir <path>', 'Directory holding local archives', '.')
    .action(async (candidate: string | undefined, _options: unknown, command: Command) =>
      execute('rollback', command, rollbackOptionsSchema, async (toolkit, options) => {
        if (options.list || !candidate) {
          await toolkit.rollback.printCatalog(options.dir);
          return 0;
        }
        await toolkit.rollback.rollback(candidate, options.dir);
        return 0;
      })
    );

  program
    .command('test')
    .description('Smoke-test the deployed API')
    .option('--endpoint <url>', 'API base URL (default: looked up by API name)')
    .option('--prompt <text...>', 'Prompts sent to /ai/ask')
    .option('--with-db', 'Also test the database-backed endpoint')
    .action(async (_options: unknown, command: Command) =>
      execute('test', command, testOptionsSchema, async (toolkit, options) => {
        const report = await toolkit.health.verify({
          endpoint: options.endpoint,
          prompts: options.prompt,
          withDatabase: options.withDb,
        });
        return report.ok ? 0 : SMOKE_FAILURE_EXIT_CODE;
      })
    );

  program.addHelpText(
    'after',
    `
Environment Variables:
  AWS_REGION              AWS region (default: us-east-1)
  LAMBDA_FUNCTION_NAME    Function to deploy (default: llm-backend)
  LAMBDA_API_NAME         HTTP API name used to find the endpoint
  DEPLOY_BUCKET           Bucket for staged and backup archives

Exit codes:
  0  success
  1  fatal error
  2  deployed, but smoke checks failed

Examples:
  $ lambda-ops package
  $ lambda-ops deploy --skip-test
  $ lambda-ops env --dry-run
  $ lambda-ops rollback --list
  $ lambda-ops rollback s3://llm-backend-deployments/deployments/deployment-20240101-120000.zip
  $ lambda-ops test --prompt "What is 2+2?" --with-db
`
  );

  return program;
}

async function main(): Promise<void> {
  await buildProgram().parseAsync(process.argv);
}

function isEntryPoint(): boolean {
  if (!process.argv[1]) return false;
  try {
    return fileURLToPath(import.meta.url) === realpathSync(process.argv[1]);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main().catch((error: unknown) => {
    console.error(describeError(error));
    process.exit(1);
  });
}
