/**
 * Deploy configuration
 *
 * One DeployConfig object is built per invocation and handed to every
 * component. Precedence, lowest first: defaults, `.env` in the working
 * directory, the process environment, CLI overrides.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse as parseDotenv } from 'dotenv';
import { z } from 'zod';
import { PreconditionError } from './errors.js';

export const MIB = 1024 * 1024;

/** Largest archive the code-update API accepts inline */
export const DIRECT_UPLOAD_LIMIT_BYTES = 50 * MIB;

/** Largest unzipped function package the platform accepts */
export const UNZIPPED_LIMIT_BYTES = 250 * MIB;

const csv = z
  .string()
  .transform((value) => value.split(',').map((item) => item.trim()).filter((item) => item.length > 0));

export const deployConfigSchema = z.object({
  region: z.string().min(1).default('us-east-1'),
  profile: z.string().min(1).optional(),
  functionName: z.string().min(1).default('llm-backend'),
  apiName: z.string().min(1).default('llm-backend-api'),
  bucket: z.string().min(3).default('llm-backend-deployments'),
  bucketPrefix: z
    .string()
    .default('deployments')
    .transform((prefix) => prefix.replace(/^\/+|\/+$/g, '')),
  runtime: z.string().regex(/^3\.\d+$/, 'expected a Python version such as 3.12').default('3.12'),
  architecture: z.enum(['x86_64', 'arm64']).default('x86_64'),
  requirementsFile: z.string().min(1).default('requirements.txt'),
  stagingDir: z.string().min(1).default('package'),
  sourcePaths: z.union([csv, z.array(z.string().min(1))]).default(['app', 'lambda_handler.py']),
  artifactName: z.string().regex(/\.zip$/, 'artifact name must end in .zip').default('lambda-deployment.zip'),
  envFile: z.string().min(1).default('.env.lambda'),
  directUploadLimitBytes: z.coerce.number().int().positive().default(DIRECT_UPLOAD_LIMIT_BYTES),
  unzippedLimitBytes: z.coerce.number().int().positive().default(UNZIPPED_LIMIT_BYTES),
  pollMaxAttempts: z.coerce.number().int().min(1).default(30),
  pollIntervalMs: z.coerce.number().int().min(0).default(2000),
  httpTimeoutMs: z.coerce.number().int().positive().default(30000),
  backupDisplayLimit: z.coerce.number().int().min(1).default(10),
  logLevel: z.enum(['DEBUG', 'INFO', 'SUCCESS', 'WARN', 'ERROR']).default('INFO'),
  logFormat: z.enum(['pretty', 'json']).default('pretty'),
});

export type DeployConfig = z.output<typeof deployConfigSchema>;
export type DeployConfigInput = z.input<typeof deployConfigSchema>;

/** Environment variable backing each setting */
export const ENV_KEYS: Record<keyof DeployConfig, string> = {
  region: 'AWS_REGION',
  profile: 'AWS_PROFILE',
  functionName: 'LAMBDA_FUNCTION_NAME',
  apiName: 'LAMBDA_API_NAME',
  bucket: 'DEPLOY_BUCKET',
  bucketPrefix: 'DEPLOY_BUCKET_PREFIX',
  runtime: 'LAMBDA_PYTHON_VERSION',
  architecture: 'LAMBDA_ARCHITECTURE',
  requirementsFile: 'DEPLOY_REQUIREMENTS_FILE',
  stagingDir: 'DEPLOY_STAGING_DIR',
  sourcePaths: 'DEPLOY_SOURCE_PATHS',
  artifactName: 'DEPLOY_ARTIFACT_NAME',
  envFile: 'DEPLOY_ENV_FILE',
  directUploadLimitBytes: 'DEPLOY_DIRECT_UPLOAD_LIMIT_BYTES',
  unzippedLimitBytes: 'DEPLOY_UNZIPPED_LIMIT_BYTES',
  pollMaxAttempts: 'DEPLOY_POLL_MAX_ATTEMPTS',
  pollIntervalMs: 'DEPLOY_POLL_INTERVAL_MS',
  httpTimeoutMs: 'DEPLOY_HTTP_TIMEOUT_MS',
  backupDisplayLimit: 'DEPLOY_BACKUP_DISPLAY_LIMIT',
  logLevel: 'LOG_LEVEL',
  logFormat: 'LOG_FORMAT',
};

export interface LoadConfigOptions {
  /** Directory searched for `.env` (default: process.cwd()) */
  cwd?: string;
  /** Skip reading `.env` */
  skipDotenv?: boolean;
}

function isConfigField(field: string): field is keyof DeployConfig {
  return Object.prototype.hasOwnProperty.call(ENV_KEYS, field);
}

function readDotenv(cwd: string): Record<string, string> {
  const dotenvPath = path.join(cwd, '.env');
  if (!fs.existsSync(dotenvPath)) {
    return {};
  }
  return parseDotenv(fs.readFileSync(dotenvPath));
}

/**
 * Build and validate the configuration for one invocation.
 */
export function loadDeployConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<DeployConfigInput> = {},
  options: LoadConfigOptions = {}
): DeployConfig {
  const fileValues: Record<string, string> = options.skipDotenv ? {} : readDotenv(options.cwd ?? process.cwd());
  const merged: Record<string, unknown> = {};

  for (const [field, envKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey] ?? fileValues[envKey];
    if (value !== undefined && value !== '') {
      merged[field] = value;
    }
  }

  for (const [field, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      merged[field] = value;
    }
  }

  const result = deployConfigSchema.safeParse(merged);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => {
        const field = issue.path.join('.');
        const envKey = isConfigField(field) ? ENV_KEYS[field] : field;
        return `${field} (${envKey}): ${issue.message}`;
      })
      .join('; ');
    throw new PreconditionError(`Invalid configuration: ${problems}`, 'Fix the value in your environment, .env or CLI flags');
  }

  return result.data;
}
