/**
 * Unit Tests for env file parsing and masking
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  RESERVED_ENV_KEYS,
  displayValue,
  filterReservedKeys,
  isReservedKey,
  isSensitiveKey,
  maskValue,
  parseEnvFile,
} from '../../../../src/lib/deploy/env-file.js';

describe('parseEnvFile', () => {
  it('should skip comments, blank lines and lines without a key', () => {
    const vars = parseEnvFile(
      ['# model settings', '', 'BEDROCK_MODEL_ID=abc', 'not a pair', '=orphan', '  LOG_LEVEL = debug  '].join('\n')
    );

    expect(vars).toEqual({ BEDROCK_MODEL_ID: 'abc', LOG_LEVEL: 'debug' });
  });

  it('should strip one pair of matching quotes', () => {
    const vars = parseEnvFile(`A="double quoted"\nB='single'\nC="mismatched'\nD=""x""`);

    expect(vars).toEqual({ A: 'double quoted', B: 'single', C: `"mismatched'`, D: '"x"' });
  });

  it('should split on the first equals sign only', () => {
    expect(parseEnvFile('DATABASE_URL=postgres://u:p@host/db?sslmode=require')).toEqual({
      DATABASE_URL: 'postgres://u:p@host/db?sslmode=require',
    });
  });

  it('should drop empty values', () => {
    expect(parseEnvFile('EMPTY=\nQUOTED_EMPTY=""\nKEPT=1')).toEqual({ KEPT: '1' });
  });

  it('should let later lines win', () => {
    expect(parseEnvFile('A=1\r\nA=2\r\n')).toEqual({ A: '2' });
  });

  it('should keep keys that name Object.prototype members', () => {
    const vars = parseEnvFile('__proto__=x\nconstructor=y\nA=1');

    expect(Object.entries(vars)).toEqual([
      ['__proto__', 'x'],
      ['constructor', 'y'],
      ['A', '1'],
    ]);
    expect(Object.entries(filterReservedKeys(vars).accepted)).toEqual(Object.entries(vars));
  });
});

// ─── Generators ───

const keyArb = fc.stringMatching(/^[A-Z][A-Z0-9_]{0,15}$/);
const valueArb = fc.stringMatching(/^[a-zA-Z0-9:/@.=-]{1,24}$/);
const varsArb = fc.dictionary(fc.oneof(keyArb, fc.constantFrom(...RESERVED_ENV_KEYS)), valueArb);

describe('parseEnvFile properties', () => {
  it('should read back every KEY=VALUE line it is given', () => {
    fc.assert(
      fc.property(varsArb, (vars) => {
        const text = Object.entries(vars)
          .map(([key, value]) => `${key}=${value}`)
          .join('\n');
        expect(parseEnvFile(text)).toEqual(vars);
      })
    );
  });
});

describe('filterReservedKeys', () => {
  it('should partition keys into accepted and reserved', () => {
    fc.assert(
      fc.property(varsArb, (vars) => {
        const { accepted, rejected } = filterReservedKeys(vars);

        expect([...Object.keys(accepted), ...rejected].sort()).toEqual(Object.keys(vars).sort());
        expect(rejected.every(isReservedKey)).toBe(true);
        expect(Object.keys(accepted).some(isReservedKey)).toBe(false);
      })
    );
  });

  it('should keep application keys and reject runtime-owned ones', () => {
    const { accepted, rejected } = filterReservedKeys({
      BEDROCK_MODEL_ID: 'abc',
      AWS_REGION: 'us-east-1',
      AWS_LAMBDA_FUNCTION_NAME: 'x',
      RAILWAY_DATABASE_URL: 'postgres://localhost/test',
    });

    expect(accepted).toEqual({ BEDROCK_MODEL_ID: 'abc', RAILWAY_DATABASE_URL: 'postgres://localhost/test' });
    expect(rejected).toEqual(['AWS_REGION', 'AWS_LAMBDA_FUNCTION_NAME']);
  });

  it('should not reserve application keys that merely start with AWS', () => {
    expect(isReservedKey('AWS_BEDROCK_REGION')).toBe(false);
    expect(isReservedKey('_HANDLER')).toBe(true);
  });
});

describe('masking', () => {
  it('should detect sensitive keys case-insensitively', () => {
    expect(isSensitiveKey('API_KEY')).toBe(true);
    expect(isSensitiveKey('db_password')).toBe(true);
    expect(isSensitiveKey('SLACK_TOKEN')).toBe(true);
    expect(isSensitiveKey('BEDROCK_MODEL_ID')).toBe(false);
  });

  it('should keep four characters on each side of long values', () => {
    expect(maskValue('mysecretvalue1234')).toBe('myse...1234');
    expect(maskValue('123456789')).toBe('1234...6789');
  });

  it('should hide short values entirely', () => {
    expect(maskValue('12345678')).toBe('****');
    expect(maskValue('x')).toBe('****');
  });

  it('should display plain values and truncate long ones', () => {
    expect(displayValue('API_KEY', 'test-secret-value')).toBe('test...alue');
    expect(displayValue('MODEL', 'abc')).toBe('abc');
    expect(displayValue('PROMPT', 'a'.repeat(61))).toBe(`${'a'.repeat(60)}...`);
  });
});
