import path from 'node:path';

/**
 * Normalizes a configured key prefix: backslashes become '/', surrounding
 * slashes are removed.
 */
export function normalizePrefix(prefix: string | undefined): string {
  if (!prefix) {
    return '';
  }
  return prefix.replace(/\\/g, '/').replace(/^\/+|\/+$/g, '');
}

/**
 * Directory-style listing prefix: "photos" lists "photos/..." and never
 * "photos2/...". The empty prefix lists the whole container.
 */
export function listingPrefix(prefix: string): string {
  const normalized = normalizePrefix(prefix);
  return normalized ? `${normalized}/` : '';
}

/**
 * Maps a path relative to the scan root onto its remote key.
 */
export function toRemoteKey(relativeKey: string, prefix: string): string {
  const normalizedPath = relativeKey.replace(/\\/g, '/');

  if (
    normalizedPath === '' ||
    normalizedPath === '.' ||
    normalizedPath === '..' ||
    normalizedPath.startsWith('../') ||
    path.posix.isAbsolute(normalizedPath)
  ) {
    throw new Error(`Path escapes the scan root: ${relativeKey}`);
  }

  const normalizedPrefix = normalizePrefix(prefix);
  return normalizedPrefix
    ? `${normalizedPrefix}/${normalizedPath}`
    : normalizedPath;
}

/**
 * Last path segment of a remote key.
 */
export function keyBaseName(key: string): string {
  return key.substring(key.lastIndexOf('/') + 1);
}
