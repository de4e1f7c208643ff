/**
 * Unit Tests for the console logger
 */

import { describe, it, expect } from 'vitest';
import { OpsLogger, type LogLevel } from '../../../src/lib/logger.js';

function capture(options: ConstructorParameters<typeof OpsLogger>[0] = {}) {
  const lines: Array<{ line: string; level: LogLevel }> = [];
  const logger = new OpsLogger({
    now: () => new Date('2024-03-05T10:20:30.000Z'),
    sink: (line, level) => lines.push({ line, level }),
    ...options,
  });
  return { logger, lines };
}

describe('OpsLogger', () => {
  it('should drop messages below the minimum level', () => {
    const { logger, lines } = capture({ minLevel: 'WARN', format: 'json' });
    logger.debug('d');
    logger.info('i');
    logger.success('s');
    logger.warn('w');
    logger.error('e');
    expect(lines.map((l) => l.level)).toEqual(['WARN', 'ERROR']);
  });

  it('should write one JSON object per line with context', () => {
    const { logger, lines } = capture({ format: 'json' });
    logger.setContext({ command: 'deploy', functionName: 'llm-backend', region: 'eu-west-1' });
    logger.info('hello', { attempt: 2 });

    expect(JSON.parse(lines[0].line)).toEqual({
      timestamp: '2024-03-05T10:20:30.000Z',
      level: 'INFO',
      message: 'hello',
      service: 'lambda-ops',
      command: 'deploy',
      functionName: 'llm-backend',
      region: 'eu-west-1',
      meta: { attempt: 2 },
    });
  });

  it('should include error fields in JSON output', () => {
    const { logger, lines } = capture({ format: 'json' });
    const error = new TypeError('boom');
    logger.error('failed', error);

    const entry = JSON.parse(lines[0].line);
    expect(entry.errorName).toBe('TypeError');
    expect(entry.errorMessage).toBe('boom');
    expect(lines[0].level).toBe('ERROR');
  });

  it('should colour pretty lines and append the error', () => {
    const { logger, lines } = capture({ format: 'pretty' });
    logger.error('failed', new Error('boom'));

    expect(lines[0].line).toBe(
      '\x1b[31m[2024-03-05T10:20:30.000Z] failed\x1b[0m\n\x1b[31m  Error: boom\x1b[0m'
    );
  });

  it('should log step durations in whole seconds', () => {
    const { logger, lines } = capture({ format: 'json' });
    logger.step('Upload', 2600);

    const entry = JSON.parse(lines[0].line);
    expect(entry.message).toBe('Upload (3s)');
    expect(entry.level).toBe('SUCCESS');
    expect(entry.meta).toEqual({ durationMs: 2600 });
  });

  it('should switch level and format through configure', () => {
    const { logger, lines } = capture({ format: 'pretty', minLevel: 'INFO' });
    logger.configure({ minLevel: 'DEBUG', format: 'json' });
    logger.debug('visible');

    expect(JSON.parse(lines[0].line).message).toBe('visible');
  });

  it('should merge appended context and clear it', () => {
    const { logger, lines } = capture({ format: 'json' });
    logger.setContext({ command: 'env' });
    logger.appendContext({ region: 'us-east-1' });
    logger.info('one');
    logger.clearContext();
    logger.info('two');

    expect(JSON.parse(lines[0].line)).toMatchObject({ command: 'env', region: 'us-east-1' });
    expect(JSON.parse(lines[1].line).command).toBeUndefined();
  });
});
