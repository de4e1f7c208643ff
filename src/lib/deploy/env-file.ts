/**
 * KEY=VALUE environment files: parsing, reserved-key filtering, masking.
 */

/** Variables the Lambda runtime injects itself; setting them breaks the execution environment */
export const RESERVED_ENV_KEYS: ReadonlySet<string> = new Set([
  'AWS_REGION',
  'AWS_DEFAULT_REGION',
  'AWS_ACCESS_KEY_ID',
  'AWS_SECRET_ACCESS_KEY',
  'AWS_SESSION_TOKEN',
  'AWS_EXECUTION_ENV',
  'AWS_LAMBDA_FUNCTION_NAME',
  'AWS_LAMBDA_FUNCTION_MEMORY_SIZE',
  'AWS_LAMBDA_FUNCTION_VERSION',
  'AWS_LAMBDA_INITIALIZATION_TYPE',
  'AWS_LAMBDA_LOG_GROUP_NAME',
  'AWS_LAMBDA_LOG_STREAM_NAME',
  'AWS_LAMBDA_RUNTIME_API',
  'AWS_XRAY_CONTEXT_MISSING',
  'AWS_XRAY_DAEMON_ADDRESS',
  '_AWS_XRAY_DAEMON_ADDRESS',
  '_AWS_XRAY_DAEMON_PORT',
  '_HANDLER',
  '_X_AMZN_TRACE_ID',
  'LAMBDA_TASK_ROOT',
  'LAMBDA_RUNTIME_DIR',
]);

const SENSITIVE_TOKENS = ['KEY', 'SECRET', 'PASSWORD', 'TOKEN'];

/**
 * Parse `KEY=VALUE` lines. Blank lines, `#` comments, lines without `=`
 * and lines with an empty value are skipped. One pair of matching single
 * or double quotes around the value is stripped. Later keys win; first
 * appearance fixes the order.
 */
export function parseEnvFile(content: string): Record<string, string> {
  const vars = new Map<string, string>();

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;

    const separator = line.indexOf('=');
    if (separator <= 0) continue;

    const key = line.slice(0, separator).trim();
    let value = line.slice(separator + 1).trim();

    if (value.length >= 2) {
      const first = value[0];
      if ((first === '"' || first === "'") && value.endsWith(first)) {
        value = value.slice(1, -1);
      }
    }

    if (!key || !value) continue;
    vars.set(key, value);
  }

  // fromEntries defines own properties, so `__proto__` is kept as a key.
  return Object.fromEntries(vars);
}

export function isReservedKey(key: string): boolean {
  return RESERVED_ENV_KEYS.has(key);
}

export function filterReservedKeys(vars: Record<string, string>): {
  accepted: Record<string, string>;
  rejected: string[];
} {
  const accepted = new Map<string, string>();
  const rejected: string[] = [];

  for (const [key, value] of Object.entries(vars)) {
    if (isReservedKey(key)) {
      rejected.push(key);
    } else {
      accepted.set(key, value);
    }
  }

  return { accepted: Object.fromEntries(accepted), rejected };
}

export function isSensitiveKey(key: string): boolean {
  const upper = key.toUpperCase();
  return SENSITIVE_TOKENS.some((token) => upper.includes(token));
}

/**
 * Keep the first and last four characters of a long value; short values
 * are hidden entirely.
 */
export function maskValue(value: string): string {
  if (value.length <= 8) return '****';
  return `${value.slice(0, 4)}...${value.slice(-4)}`;
}

export function displayValue(key: string, value: string): string {
  if (isSensitiveKey(key)) return maskValue(value);
  return value.length > 60 ? `${value.substring(0, 60)}...` : value;
}
