/**
 * In-memory stand-ins for the platform client and the log sink.
 */

import type {
  ApiSummary,
  CodeSource,
  FunctionState,
  PlatformClient,
  StorageObject,
} from '../../../src/lib/aws-clients.js';
import { OpsLogger, type LogLevel } from '../../../src/lib/logger.js';
import type { SleepFn } from '../../../src/lib/retry-utils.js';

export type RecordedCall =
  | { op: 'updateFunctionCode'; functionName: string; source: CodeSource }
  | { op: 'updateFunctionEnvironment'; functionName: string; variables: Record<string, string> }
  | { op: 'getFunctionState'; functionName: string }
  | { op: 'listApis' }
  | { op: 'putObject'; bucket: string; key: string; size: number }
  | { op: 'listObjects'; bucket: string; prefix: string };

export class FakePlatformClient implements PlatformClient {
  calls: RecordedCall[] = [];
  /** Returned by successive getFunctionState calls; the last one repeats */
  states: Array<Partial<FunctionState>> = [{ state: 'Active', lastUpdateStatus: 'Successful' }];
  apis: ApiSummary[] = [];
  objects: StorageObject[] = [];
  environment: Record<string, string> = {};
  failWith?: Error;
  /** Thrown by listObjects only */
  listFailure?: Error;
  private stateIndex = 0;

  async updateFunctionCode(functionName: string, source: CodeSource): Promise<FunctionState> {
    this.calls.push({ op: 'updateFunctionCode', functionName, source });
    if (this.failWith) throw this.failWith;
    return { functionName, state: 'Active', lastUpdateStatus: 'InProgress' };
  }

  async updateFunctionEnvironment(functionName: string, variables: Record<string, string>): Promise<FunctionState> {
    this.calls.push({ op: 'updateFunctionEnvironment', functionName, variables });
    if (this.failWith) throw this.failWith;
    this.environment = { ...variables };
    return { functionName, state: 'Active', lastUpdateStatus: 'InProgress', environment: variables };
  }

  async getFunctionState(functionName: string): Promise<FunctionState> {
    this.calls.push({ op: 'getFunctionState', functionName });
    const next = this.states[Math.min(this.stateIndex, this.states.length - 1)];
    this.stateIndex++;
    return { functionName, ...next };
  }

  async listApis(): Promise<ApiSummary[]> {
    this.calls.push({ op: 'listApis' });
    return this.apis;
  }

  async putObject(bucket: string, key: string, body: Uint8Array): Promise<void> {
    this.calls.push({ op: 'putObject', bucket, key, size: body.length });
    if (this.failWith) throw this.failWith;
    this.objects.push({ key, sizeBytes: body.length, lastModified: new Date() });
  }

  async listObjects(bucket: string, prefix: string): Promise<StorageObject[]> {
    this.calls.push({ op: 'listObjects', bucket, prefix });
    if (this.listFailure) throw this.listFailure;
    return this.objects.filter((object) => object.key.startsWith(prefix));
  }

  opsCalled(): string[] {
    return this.calls.map((call) => call.op);
  }
}

export interface CapturedLine {
  level: LogLevel;
  line: string;
}

/** A JSON-format logger whose lines land in `lines` */
export function createCapturingLogger(): { logger: OpsLogger; lines: CapturedLine[]; messages: () => string[] } {
  const lines: CapturedLine[] = [];
  const logger = new OpsLogger({
    minLevel: 'DEBUG',
    format: 'json',
    sink: (line, level) => lines.push({ level, line }),
    now: () => new Date('2024-01-01T00:00:00.000Z'),
  });
  const messages = () =>
    lines.map(({ line }) => {
      const parsed: unknown = JSON.parse(line);
      return typeof parsed === 'object' && parsed !== null && 'message' in parsed ? String(parsed.message) : line;
    });
  return { logger, lines, messages };
}

export const noSleep: SleepFn = async () => undefined;
