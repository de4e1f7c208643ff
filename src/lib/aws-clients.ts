/**
 * Typed access to the compute platform and object storage.
 *
 * Components depend on the PlatformClient interface only; production code
 * uses AwsPlatformClient (AWS SDK v3), tests use an in-memory fake.
 */

import {
  LambdaClient,
  LambdaServiceException,
  UpdateFunctionCodeCommand,
  UpdateFunctionConfigurationCommand,
  GetFunctionConfigurationCommand,
  type FunctionConfiguration,
} from '@aws-sdk/client-lambda';
import {
  S3Client,
  S3ServiceException,
  PutObjectCommand,
  ListObjectsV2Command,
} from '@aws-sdk/client-s3';
import {
  ApiGatewayV2Client,
  ApiGatewayV2ServiceException,
  GetApisCommand,
} from '@aws-sdk/client-apigatewayv2';
import { fromIni } from '@aws-sdk/credential-providers';
import { RemoteCallError } from './errors.js';

// ============================================================================
// TYPES
// ============================================================================

export type CodeSource =
  | { kind: 'inline'; zipFile: Uint8Array }
  | { kind: 'storage'; bucket: string; key: string };

export interface FunctionState {
  functionName: string;
  /** Pending | Active | Inactive | Failed */
  state?: string;
  stateReason?: string;
  /** InProgress | Successful | Failed */
  lastUpdateStatus?: string;
  lastUpdateStatusReason?: string;
  codeSha256?: string;
  codeSize?: number;
  lastModified?: string;
  memorySize?: number;
  timeout?: number;
  environment?: Record<string, string>;
}

export interface ApiSummary {
  apiId: string;
  name: string;
  apiEndpoint?: string;
  protocolType?: string;
}

export interface StorageObject {
  key: string;
  sizeBytes: number;
  lastModified: Date;
}

export interface PlatformClient {
  updateFunctionCode(functionName: string, source: CodeSource): Promise<FunctionState>;
  updateFunctionEnvironment(functionName: string, variables: Record<string, string>): Promise<FunctionState>;
  getFunctionState(functionName: string): Promise<FunctionState>;
  listApis(): Promise<ApiSummary[]>;
  putObject(bucket: string, key: string, body: Uint8Array): Promise<void>;
  listObjects(bucket: string, prefix: string): Promise<StorageObject[]>;
}

export interface AwsClientOptions {
  region: string;
  profile?: string;
}

// ============================================================================
// HELPERS
// ============================================================================

export function toFunctionState(functionName: string, config: FunctionConfiguration): FunctionState {
  return {
    functionName: config.FunctionName ?? functionName,
    state: config.State,
    stateReason: config.StateReason,
    lastUpdateStatus: config.LastUpdateStatus,
    lastUpdateStatusReason: config.LastUpdateStatusReason,
    codeSha256: config.CodeSha256,
    codeSize: config.CodeSize,
    lastModified: config.LastModified,
    memorySize: config.MemorySize,
    timeout: config.Timeout,
    environment: config.Environment?.Variables,
  };
}

/**
 * Wrap an SDK failure so the operator sees which call failed and why.
 */
export function toRemoteCallError(operation: string, error: unknown): RemoteCallError {
  if (
    error instanceof LambdaServiceException ||
    error instanceof S3ServiceException ||
    error instanceof ApiGatewayV2ServiceException
  ) {
    return new RemoteCallError(operation, error.name, error.message, error.$metadata.httpStatusCode);
  }
  if (error instanceof Error) {
    return new RemoteCallError(operation, error.name, error.message);
  }
  return new RemoteCallError(operation, 'UnknownError', String(error));
}

// ============================================================================
// AWS SDK IMPLEMENTATION
// ============================================================================

export class AwsPlatformClient implements PlatformClient {
  private lambda: LambdaClient;
  private s3: S3Client;
  private apiGateway: ApiGatewayV2Client;

  constructor(options: AwsClientOptions) {
    const credentials = options.profile ? fromIni({ profile: options.profile }) : undefined;

    this.lambda = new LambdaClient({ region: options.region, credentials });
    this.s3 = new S3Client({ region: options.region, credentials });
    this.apiGateway = new ApiGatewayV2Client({ region: options.region, credentials });
  }

  async updateFunctionCode(functionName: string, source: CodeSource): Promise<FunctionState> {
    const command =
      source.kind === 'inline'
        ? new UpdateFunctionCodeCommand({ FunctionName: functionName, ZipFile: source.zipFile })
        : new UpdateFunctionCodeCommand({ FunctionName: functionName, S3Bucket: source.bucket, S3Key: source.key });

    try {
      const response = await this.lambda.send(command);
      return toFunctionState(functionName, response);
    } catch (error) {
      throw toRemoteCallError('lambda:UpdateFunctionCode', error);
    }
  }

  async updateFunctionEnvironment(functionName: string, variables: Record<string, string>): Promise<FunctionState> {
    try {
      const response = await this.lambda.send(
        new UpdateFunctionConfigurationCommand({
          FunctionName: functionName,
          Environment: { Variables: variables },
        })
      );
      return toFunctionState(functionName, response);
    } catch (error) {
      throw toRemoteCallError('lambda:UpdateFunctionConfiguration', error);
    }
  }

  async getFunctionState(functionName: string): Promise<FunctionState> {
    try {
      const response = await this.lambda.send(new GetFunctionConfigurationCommand({ FunctionName: functionName }));
      return toFunctionState(functionName, response);
    } catch (error) {
      throw toRemoteCallError('lambda:GetFunctionConfiguration', error);
    }
  }

  async listApis(): Promise<ApiSummary[]> {
    const apis: ApiSummary[] = [];
    let nextToken: string | undefined;

    try {
      do {
        const response = await this.apiGateway.send(new GetApisCommand({ NextToken: nextToken }));
        for (const item of response.Items ?? []) {
          if (item.ApiId && item.Name) {
            apis.push({
              apiId: item.ApiId,
              name: item.Name,
              apiEndpoint: item.ApiEndpoint,
              protocolType: item.ProtocolType,
            });
          }
        }
        nextToken = response.NextToken;
      } while (nextToken);
    } catch (error) {
      throw toRemoteCallError('apigatewayv2:GetApis', error);
    }

    return apis;
  }

  async putObject(bucket: string, key: string, body: Uint8Array): Promise<void> {
    try {
      await this.s3.send(
        new PutObjectCommand({
          Bucket: bucket,
          Key: key,
          Body: body,
          ContentType: 'application/zip',
        })
      );
    } catch (error) {
      throw toRemoteCallError(`s3:PutObject s3://${bucket}/${key}`, error);
    }
  }

  async listObjects(bucket: string, prefix: string): Promise<StorageObject[]> {
    const objects: StorageObject[] = [];
    let continuationToken: string | undefined;

    try {
      do {
        const response = await this.s3.send(
          new ListObjectsV2Command({
            Bucket: bucket,
            Prefix: prefix,
            ContinuationToken: continuationToken,
          })
        );
        for (const item of response.Contents ?? []) {
          if (item.Key) {
            objects.push({
              key: item.Key,
              sizeBytes: item.Size ?? 0,
              lastModified: item.LastModified ?? new Date(0),
            });
          }
        }
        continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
      } while (continuationToken);
    } catch (error) {
      throw toRemoteCallError(`s3:ListObjectsV2 s3://${bucket}/${prefix}`, error);
    }

    return objects;
  }
}
