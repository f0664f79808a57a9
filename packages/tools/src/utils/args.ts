import { errorCode, errorMessage, UsageError } from './errors';

function isParseArgsError(error: unknown): boolean {
  const code = errorCode(error);
  return typeof code === 'string' && code.startsWith('ERR_PARSE_ARGS');
}

/**
 * Runs a `util.parseArgs` call and turns its argument errors into UsageError.
 */
export function parseCommandLine<T>(parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    if (isParseArgsError(error)) {
      throw new UsageError(errorMessage(error));
    }
    throw error;
  }
}

export function parsePositiveInteger(raw: string, flag: string): number {
  const value = raw.trim();
  if (!/^\d+$/.test(value) || Number.parseInt(value, 10) <= 0) {
    throw new UsageError(`${flag} expects a positive integer, got '${raw}'`);
  }
  return Number.parseInt(value, 10);
}
