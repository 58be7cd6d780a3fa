export type Env = Record<string, string | undefined>;

export type ReadNumberEnvOptions = {
  min?: number;
  max?: number;
  /**
   * - "fallback" (default): ignore invalid values and continue to next key; if none are valid, return fallback.
   * - "throw": throw an Error if a non-empty value is present but invalid.
   */
  onInvalid?: 'fallback' | 'throw';
};

export type ReadBoolEnvOptions = {
  onInvalid?: 'fallback' | 'throw';
};

type NumberParser = (value: string) => number | null;

function asKeyList(keys: readonly string[] | string): readonly string[] {
  return typeof keys === 'string' ? [keys] : keys;
}

const parseInteger: NumberParser = (value) => {
  const parsed = Number(value);
  return Number.isSafeInteger(parsed) ? parsed : null;
};

const parseFinite: NumberParser = (value) => {
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
};

function parseBoolean(value: string): boolean | null {
  const normalized = value.toLowerCase();
  if (['true', '1', 'yes', 'y', 'on'].includes(normalized)) {
    return true;
  }
  if (['false', '0', 'no', 'n', 'off'].includes(normalized)) {
    return false;
  }
  return null;
}

function readParsedEnv(
  env: Env,
  keys: readonly string[] | string,
  fallback: number,
  parse: NumberParser,
  kind: string,
  options: ReadNumberEnvOptions,
): number {
  const onInvalid = options.onInvalid ?? 'fallback';

  for (const key of asKeyList(keys)) {
    const trimmed = env[key]?.trim();
    if (!trimmed) {
      continue;
    }

    const parsed = parse(trimmed);
    if (parsed === null) {
      if (onInvalid === 'throw') {
        throw new Error(`${key} must be ${kind} (got "${trimmed}")`);
      }
      continue;
    }

    if (options.min !== undefined && parsed < options.min) {
      if (onInvalid === 'throw') {
        throw new Error(`${key} must be >= ${options.min} (got "${trimmed}")`);
      }
      continue;
    }
    if (options.max !== undefined && parsed > options.max) {
      if (onInvalid === 'throw') {
        throw new Error(`${key} must be <= ${options.max} (got "${trimmed}")`);
      }
      continue;
    }

    return parsed;
  }

  return fallback;
}

export function readIntEnv(
  env: Env,
  keys: readonly string[] | string,
  fallback: number,
  options: ReadNumberEnvOptions = {},
): number {
  return readParsedEnv(env, keys, fallback, parseInteger, 'an integer', options);
}

export function readNumberEnv(
  env: Env,
  keys: readonly string[] | string,
  fallback: number,
  options: ReadNumberEnvOptions = {},
): number {
  return readParsedEnv(env, keys, fallback, parseFinite, 'a number', options);
}

export function readBoolEnv(
  env: Env,
  keys: readonly string[] | string,
  fallback: boolean,
  options: ReadBoolEnvOptions = {},
): boolean {
  const onInvalid = options.onInvalid ?? 'fallback';

  for (const key of asKeyList(keys)) {
    const trimmed = env[key]?.trim();
    if (!trimmed) {
      continue;
    }

    const parsed = parseBoolean(trimmed);
    if (parsed === null) {
      if (onInvalid === 'throw') {
        throw new Error(
          `${key} must be a boolean ("true"/"false"/"1"/"0"/"yes"/"no"/"on"/"off") (got "${trimmed}")`,
        );
      }
      continue;
    }

    return parsed;
  }

  return fallback;
}

export function readStringEnv(
  env: Env,
  keys: readonly string[] | string,
  fallback: string,
): string {
  for (const key of asKeyList(keys)) {
    const trimmed = env[key]?.trim();
    if (trimmed) {
      return trimmed;
    }
  }

  return fallback;
}
