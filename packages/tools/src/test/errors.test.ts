import { describe, expect, it } from '@jest/globals';
import { parseArgs } from 'util';
import { parseCommandLine } from '../utils/args';
import { errorCode, errorMessage, UsageError } from '../utils/errors';

describe('errorCode', () => {
  it('reads the code of any object carrying one', () => {
    expect(errorCode({ code: 'ENOENT', message: 'missing' })).toBe('ENOENT');
    expect(errorCode({ code: 2 })).toBe(2);
  });

  it('returns undefined for values without a code', () => {
    expect(errorCode(new Error('plain'))).toBeUndefined();
    expect(errorCode('ENOENT')).toBeUndefined();
    expect(errorCode(null)).toBeUndefined();
  });
});

describe('errorMessage', () => {
  it('uses the message of error-shaped objects', () => {
    expect(errorMessage({ message: 'from another realm' })).toBe('from another realm');
    expect(errorMessage(new UsageError('bad flag'))).toBe('bad flag');
  });

  it('stringifies anything else', () => {
    expect(errorMessage(42)).toBe('42');
    expect(errorMessage({ message: 7 })).toBe('[object Object]');
  });
});

describe('parseCommandLine', () => {
  it('turns an unknown option into a UsageError', () => {
    expect(() =>
      parseCommandLine(() => parseArgs({ args: ['--bogus'], options: {}, strict: true }))
    ).toThrow(UsageError);
  });

  it('turns any ERR_PARSE_ARGS error into a UsageError with its message', () => {
    const raised = { code: 'ERR_PARSE_ARGS_UNKNOWN_OPTION', message: "Unknown option '--x'" };
    expect(() =>
      parseCommandLine(() => {
        throw raised;
      })
    ).toThrow(new UsageError("Unknown option '--x'"));
  });

  it('rethrows other errors unchanged', () => {
    const raised = { code: 'EACCES', message: 'denied' };
    let caught: unknown;
    try {
      parseCommandLine(() => {
        throw raised;
      });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBe(raised);
  });
});
