import { Verbosity } from '../interfaces/logger';
import { UsageError } from './errors';

type Env = Record<string, string | undefined>;

export const DEFAULT_REGION = 'us-east-1';

/**
 * Parse an integer flag value. Anything that is not a whole number of at
 * least `min` is a usage error.
 */
export function parseIntegerOption(
  raw: string | undefined,
  name: string,
  fallback: number,
  min: number = 1,
): number {
  if (raw === undefined) {
    return fallback;
  }
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed) || Number(trimmed) < min) {
    const expected = min > 0 ? 'a positive integer' : 'a non-negative integer';
    throw new UsageError(`--${name} must be ${expected}, got "${raw}"`);
  }
  return Number(trimmed);
}

export function resolveRegion(explicit?: string, env: Env = process.env): string {
  return explicit || env.AWS_REGION || env.AWS_DEFAULT_REGION || DEFAULT_REGION;
}

/**
 * Custom endpoint for S3-compatible stores (MinIO, R2, ...).
 */
export function resolveEndpoint(
  explicit?: string,
  env: Env = process.env,
): string | undefined {
  return explicit || env.AWS_ENDPOINT_URL_S3 || env.AWS_ENDPOINT_URL || undefined;
}

export function resolveBucket(
  explicit?: string,
  env: Env = process.env,
): string | undefined {
  return explicit || env.S3_BUCKET || undefined;
}

export function resolvePrefix(explicit?: string, env: Env = process.env): string {
  return explicit ?? env.S3_PREFIX ?? '';
}

export function resolveVerbosity(flags: {
  quiet?: boolean;
  debug?: boolean;
}): Verbosity {
  if (flags.debug) {
    return Verbosity.Verbose;
  }
  return flags.quiet ? Verbosity.Quiet : Verbosity.Normal;
}
