/**
 * Health Verifier
 *
 * Smoke-tests the deployed HTTP API: GET /health, POST /ai/ask, and
 * optionally the database-backed POST /ai/match-cv. Each check is pass,
 * fail, or inconclusive when the failure comes from a backing database
 * that is commonly left unconfigured.
 */

import type { DeployConfig } from '../config.js';
import type { PlatformClient } from '../aws-clients.js';
import { PreconditionError } from '../errors.js';
import { logger as defaultLogger, type OpsLogger } from '../logger.js';

export type CheckOutcome = 'pass' | 'fail' | 'inconclusive';

export interface Evaluation {
  outcome: CheckOutcome;
  detail: string;
}

export interface SmokeCheck {
  name: string;
  method: 'GET' | 'POST';
  path: string;
  body?: Record<string, unknown>;
  /** Failures caused by an unconfigured database count as inconclusive */
  dependsOnDatabase?: boolean;
  evaluate: (statusCode: number, body: unknown, text: string) => Evaluation;
}

export interface CheckResult {
  name: string;
  method: SmokeCheck['method'];
  path: string;
  outcome: CheckOutcome;
  detail: string;
  statusCode?: number;
  durationMs: number;
  /** Raw response body */
  body?: string;
}

export interface HealthReport {
  endpoint: string;
  results: CheckResult[];
  passed: number;
  failed: number;
  inconclusive: number;
  /** No check failed */
  ok: boolean;
}

export interface VerifyOptions {
  endpoint?: string;
  prompts?: string[];
  withDatabase?: boolean;
}

export type FetchFn = typeof fetch;

export const DEFAULT_PROMPTS = ['Reply with one short sentence: is the service up?'];

export const SAMPLE_CV_TEXT =
  'Backend engineer with six years of Python, FastAPI and AWS Lambda experience. Built data pipelines on PostgreSQL.';

const DATABASE_FAILURE = /database|DATABASE_URL|connection refused|could not connect|not configured/i;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSuccess(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

function truncate(text: string, max = 500): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

function unexpected(statusCode: number, text: string): Evaluation {
  return { outcome: 'fail', detail: `HTTP ${statusCode}, unexpected body: ${truncate(text) || '<empty>'}` };
}

export function isDatabaseUnavailable(body: unknown, text: string): boolean {
  if (isRecord(body) && typeof body.detail === 'string') {
    return DATABASE_FAILURE.test(body.detail);
  }
  return DATABASE_FAILURE.test(text);
}

export function evaluateHealth(statusCode: number, body: unknown, text: string): Evaluation {
  if (isSuccess(statusCode) && isRecord(body) && body.status === 'ok') {
    const version = typeof body.version === 'string' ? body.version : 'unknown';
    return { outcome: 'pass', detail: `status=ok version=${version}` };
  }
  return unexpected(statusCode, text);
}

export function evaluateAsk(statusCode: number, body: unknown, text: string): Evaluation {
  if (!isSuccess(statusCode) || !isRecord(body)) {
    return unexpected(statusCode, text);
  }
  if (typeof body.answer !== 'string' || typeof body.model !== 'string') {
    return { outcome: 'fail', detail: `HTTP ${statusCode}, missing answer/model: ${truncate(text)}` };
  }

  let detail = `model=${body.model}`;
  if (isRecord(body.usage)) {
    const input = body.usage.input_tokens;
    const output = body.usage.output_tokens;
    if (typeof input === 'number' && typeof output === 'number') {
      detail += ` tokens=${input}/${output}`;
    }
  }
  return { outcome: 'pass', detail };
}

export function evaluateMatchCv(statusCode: number, body: unknown, text: string): Evaluation {
  if (isSuccess(statusCode) && isRecord(body) && Array.isArray(body.matches)) {
    return { outcome: 'pass', detail: `${body.matches.length} matches` };
  }
  return unexpected(statusCode, text);
}

export function buildSmokeChecks(options: Pick<VerifyOptions, 'prompts' | 'withDatabase'> = {}): SmokeCheck[] {
  const prompts = options.prompts && options.prompts.length > 0 ? options.prompts : DEFAULT_PROMPTS;

  const checks: SmokeCheck[] = [
    { name: 'health', method: 'GET', path: '/health', evaluate: evaluateHealth },
    ...prompts.map(
      (prompt, index): SmokeCheck => ({
        name: prompts.length > 1 ? `ask #${index + 1}` : 'ask',
        method: 'POST',
        path: '/ai/ask',
        body: { prompt },
        evaluate: evaluateAsk,
      })
    ),
  ];

  if (options.withDatabase) {
    checks.push({
      name: 'match-cv',
      method: 'POST',
      path: '/ai/match-cv',
      body: { cv_text: SAMPLE_CV_TEXT },
      dependsOnDatabase: true,
      evaluate: evaluateMatchCv,
    });
  }

  return checks;
}

export interface HealthVerifierDeps {
  client: PlatformClient;
  fetch?: FetchFn;
  logger?: OpsLogger;
}

export class HealthVerifier {
  private client: PlatformClient;
  private fetchFn: FetchFn;
  private logger: OpsLogger;

  constructor(
    private config: Pick<DeployConfig, 'apiName' | 'httpTimeoutMs'>,
    deps: HealthVerifierDeps
  ) {
    this.client = deps.client;
    this.fetchFn = deps.fetch ?? ((input, init) => fetch(input, init));
    this.logger = deps.logger ?? defaultLogger;
  }

  /**
   * Use the override if given, otherwise look the API up by name.
   */
  async resolveEndpoint(override?: string): Promise<string> {
    if (override) {
      return override.replace(/\/+$/, '');
    }

    const apis = await this.client.listApis();
    const api = apis.find((candidate) => candidate.name === this.config.apiName);
    if (!api) {
      throw new PreconditionError(
        `No API named ${this.config.apiName} found`,
        'Pass the base URL with --endpoint or set LAMBDA_API_NAME'
      );
    }
    if (!api.apiEndpoint) {
      throw new PreconditionError(`API ${api.name} (${api.apiId}) has no endpoint`, 'Pass the base URL with --endpoint');
    }
    return api.apiEndpoint.replace(/\/+$/, '');
  }

  async runCheck(endpoint: string, check: SmokeCheck): Promise<CheckResult> {
    const started = Date.now();
    const base = { name: check.name, method: check.method, path: check.path };

    let response: Response;
    let text: string;
    try {
      response = await this.fetchFn(`${endpoint}${check.path}`, {
        method: check.method,
        headers: check.body ? { 'Content-Type': 'application/json' } : undefined,
        body: check.body ? JSON.stringify(check.body) : undefined,
        signal: AbortSignal.timeout(this.config.httpTimeoutMs),
      });
      // The body read can still time out or lose the connection.
      text = await response.text();
    } catch (error) {
      return {
        ...base,
        outcome: 'fail',
        detail: `request failed: ${error instanceof Error ? error.message : String(error)}`,
        durationMs: Date.now() - started,
      };
    }

    let body: unknown = undefined;
    try {
      body = text ? JSON.parse(text) : undefined;
    } catch {
      body = undefined;
    }

    let evaluation = check.evaluate(response.status, body, text);
    if (
      evaluation.outcome === 'fail' &&
      check.dependsOnDatabase &&
      response.status >= 500 &&
      isDatabaseUnavailable(body, text)
    ) {
      evaluation = { outcome: 'inconclusive', detail: `HTTP ${response.status}, database unavailable: ${truncate(text, 200)}` };
    }

    return {
      ...base,
      ...evaluation,
      statusCode: response.status,
      durationMs: Date.now() - started,
      body: text,
    };
  }

  async verify(options: VerifyOptions = {}): Promise<HealthReport> {
    const endpoint = await this.resolveEndpoint(options.endpoint);
    this.logger.info(`🏥 Smoke-testing ${endpoint}`);

    const results: CheckResult[] = [];
    for (const check of buildSmokeChecks(options)) {
      const result = await this.runCheck(endpoint, check);
      results.push(result);

      const label = `${check.method} ${check.path} (${check.name})`;
      if (result.outcome === 'pass') {
        this.logger.success(`✅ ${label}: ${result.detail}`);
      } else if (result.outcome === 'inconclusive') {
        this.logger.warn(`⚠️  ${label}: inconclusive, ${result.detail}`);
      } else {
        this.logger.error(`❌ ${label}: ${result.detail}`);
      }
    }

    const count = (outcome: CheckOutcome) => results.filter((result) => result.outcome === outcome).length;
    const report: HealthReport = {
      endpoint,
      results,
      passed: count('pass'),
      failed: count('fail'),
      inconclusive: count('inconclusive'),
      ok: count('fail') === 0,
    };

    this.logger.info(`📊 ${report.passed} passed, ${report.failed} failed, ${report.inconclusive} inconclusive`);
    return report;
  }
}
