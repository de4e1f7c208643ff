/**
 * Error taxonomy for deploy operations.
 *
 * Every fatal failure surfaces as a DeployError subclass; the CLI turns it
 * into a non-zero exit code and prints the hint when there is one.
 */

export class DeployError extends Error {
  constructor(
    message: string,
    public readonly hint?: string,
    public readonly exitCode: number = 1
  ) {
    super(message);
    this.name = 'DeployError';
  }
}

/** Missing input file, missing artifact, malformed S3 URI, invalid config. No remote call was made. */
export class PreconditionError extends DeployError {
  constructor(message: string, hint?: string) {
    super(message, hint);
    this.name = 'PreconditionError';
  }
}

/** The local dependency resolver cannot produce binaries for the target platform. */
export class ToolingCapabilityError extends DeployError {
  constructor(
    public readonly tool: string,
    public readonly foundVersion: string,
    public readonly requiredVersion: string
  ) {
    super(
      `${tool} ${foundVersion} cannot install cross-platform binary wheels (requires >= ${requiredVersion})`,
      `Upgrade it with: python -m pip install --upgrade "pip>=${requiredVersion}"`
    );
    this.name = 'ToolingCapabilityError';
  }
}

/** A subprocess exited non-zero. */
export class CommandFailedError extends DeployError {
  constructor(
    public readonly command: string,
    public readonly commandExitCode: number,
    public readonly stderr: string
  ) {
    super(`Command failed (exit ${commandExitCode}): ${command}${stderr ? `\n${stderr.trim()}` : ''}`);
    this.name = 'CommandFailedError';
  }
}

/** A compute or storage API call returned a failure. */
export class RemoteCallError extends DeployError {
  constructor(
    public readonly operation: string,
    public readonly remoteErrorName: string,
    public readonly remoteMessage: string,
    public readonly statusCode?: number
  ) {
    super(
      `${operation} failed: ${remoteErrorName}${statusCode !== undefined ? ` (HTTP ${statusCode})` : ''}: ${remoteMessage}`,
      remoteErrorName === 'AccessDeniedException' || remoteErrorName === 'AccessDenied'
        ? 'Check that your AWS credentials allow this operation'
        : undefined
    );
    this.name = 'RemoteCallError';
  }
}

/** The function reported a Failed state after an update. */
export class RemoteStateError extends DeployError {
  constructor(
    public readonly functionName: string,
    public readonly state: string,
    public readonly reason?: string
  ) {
    super(`Function ${functionName} reported ${state}${reason ? `: ${reason}` : ''}`);
    this.name = 'RemoteStateError';
  }
}

export class ArtifactTooLargeError extends DeployError {
  constructor(
    public readonly uncompressedBytes: number,
    public readonly limitBytes: number
  ) {
    super(
      `Unzipped package size ${uncompressedBytes} bytes exceeds the platform limit of ${limitBytes} bytes`,
      'Drop unused dependencies or move large ones to a Lambda layer'
    );
    this.name = 'ArtifactTooLargeError';
  }
}

/**
 * Render any thrown value for the operator.
 */
export function describeError(error: unknown): string {
  if (error instanceof DeployError) {
    return error.hint ? `${error.message}\n💡 ${error.hint}` : error.message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function exitCodeFor(error: unknown): number {
  return error instanceof DeployError ? error.exitCode : 1;
}
