/**
 * @fileoverview Environment parsing helpers
 *
 * Strict parsing for environment-driven configuration values. Invalid values
 * are reported through the optional logger and replaced by the fallback.
 */

export interface EnvParseLogger {
  warn: (message: string, context?: Record<string, unknown>) => void;
}

export interface ParseEnvBooleanOptions {
  name: string;
  fallback: boolean;
  logger?: EnvParseLogger;
}

export interface ParseEnvChoiceOptions<T extends string> {
  name: string;
  choices: readonly T[];
  fallback: T;
  logger?: EnvParseLogger;
}

export interface ParseEnvStringOptions {
  name: string;
  fallback: string;
  logger?: EnvParseLogger;
}

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);

function logInvalid(
  logger: EnvParseLogger | undefined,
  name: string,
  raw: string,
  reason: string,
  fallback: string | boolean
): void {
  logger?.warn('Invalid environment value, using fallback', {
    variable: name,
    value: raw,
    reason,
    fallback,
  });
}

/**
 * Parse a boolean environment value with fallback.
 */
export function parseEnvBoolean(
  raw: string | undefined,
  options: ParseEnvBooleanOptions
): boolean {
  if (raw === undefined) {
    return options.fallback;
  }

  const normalized = raw.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) {
    return true;
  }
  if (FALSE_VALUES.has(normalized)) {
    return false;
  }

  logInvalid(options.logger, options.name, raw, 'invalid_boolean', options.fallback);
  return options.fallback;
}

/**
 * Parse an environment value that must be one of a fixed set (case-insensitive).
 */
export function parseEnvChoice<T extends string>(
  raw: string | undefined,
  options: ParseEnvChoiceOptions<T>
): T {
  if (raw === undefined) {
    return options.fallback;
  }

  const normalized = raw.trim().toLowerCase();
  const match = options.choices.find((choice) => choice === normalized);
  if (match === undefined) {
    logInvalid(options.logger, options.name, raw, `expected_one_of_${options.choices.join('|')}`, options.fallback);
    return options.fallback;
  }
  return match;
}

/**
 * Parse a non-blank string environment value.
 */
export function parseEnvString(
  raw: string | undefined,
  options: ParseEnvStringOptions
): string {
  if (raw === undefined) {
    return options.fallback;
  }

  const trimmed = raw.trim();
  if (trimmed.length === 0) {
    logInvalid(options.logger, options.name, raw, 'blank', options.fallback);
    return options.fallback;
  }
  return trimmed;
}
