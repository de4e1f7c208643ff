/**
 * Unit Tests for the Environment Configurator
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { EnvironmentConfigurator } from '../../../../src/lib/deploy/environment-configurator.js';
import { Uploader } from '../../../../src/lib/deploy/uploader.js';
import { PreconditionError } from '../../../../src/lib/errors.js';
import { FakePlatformClient, createCapturingLogger, noSleep } from '../../helpers/fakes.js';

describe('EnvironmentConfigurator', () => {
  let dir: string;
  let envFile: string;
  let client: FakePlatformClient;

  function createConfigurator(logger = createCapturingLogger().logger): EnvironmentConfigurator {
    const uploader = new Uploader(
      {
        functionName: 'llm-backend',
        bucket: 'test-bucket',
        bucketPrefix: 'deployments',
        directUploadLimitBytes: 1024,
        pollMaxAttempts: 3,
        pollIntervalMs: 0,
      },
      { client, logger, sleep: noSleep }
    );
    return new EnvironmentConfigurator('llm-backend', { client, uploader, logger });
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'lambda-ops-env-'));
    envFile = path.join(dir, '.env.lambda');
    fs.writeFileSync(
      envFile,
      ['BEDROCK_MODEL_ID=abc', 'AWS_REGION=us-east-1', 'OPENAI_API_KEY=mysecretvalue1234'].join('\n')
    );
    client = new FakePlatformClient();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should submit the accepted variables as the full environment', async () => {
    const result = await createConfigurator().apply(envFile);

    expect(result).toEqual({
      submitted: { BEDROCK_MODEL_ID: 'abc', OPENAI_API_KEY: 'mysecretvalue1234' },
      rejected: ['AWS_REGION'],
      dryRun: false,
      converged: true,
    });
    expect(client.calls[0]).toEqual({
      op: 'updateFunctionEnvironment',
      functionName: 'llm-backend',
      variables: { BEDROCK_MODEL_ID: 'abc', OPENAI_API_KEY: 'mysecretvalue1234' },
    });
    expect(client.opsCalled()).toEqual(['updateFunctionEnvironment', 'getFunctionState']);
  });

  it('should mask secrets in the preview', async () => {
    const { logger, messages } = createCapturingLogger();
    await createConfigurator(logger).apply(envFile, { dryRun: true });

    expect(messages()).toContain('   ✓ OPENAI_API_KEY=myse...1234');
    expect(messages()).toContain('   ✓ BEDROCK_MODEL_ID=abc');
    expect(messages()).toContain('⚠️  Skipping AWS_REGION: reserved by the Lambda runtime');
    expect(messages().some((m) => m.includes('mysecretvalue1234'))).toBe(false);
  });

  it('should not call the platform on a dry run', async () => {
    const result = await createConfigurator().apply(envFile, { dryRun: true });

    expect(result.dryRun).toBe(true);
    expect(result.converged).toBeUndefined();
    expect(client.calls).toEqual([]);
  });

  it('should fail on an unreadable file', async () => {
    await expect(createConfigurator().apply(path.join(dir, 'missing.env'))).rejects.toBeInstanceOf(PreconditionError);
    expect(client.calls).toEqual([]);
  });
});
