/**
 * File scanner related interfaces and types
 */

/**
 * A local file selected for verification
 */
export interface FileRecord {
  readonly localPath: string;
  /** Path relative to the scan root, using the platform separator */
  readonly relativeKey: string;
  /** Bytes; read lazily during reconciliation when absent */
  readonly size?: number;
}

/**
 * Results from a file system scan operation
 */
export interface ScanResult {
  files: FileRecord[];
  excludedCount: number;
  unreadableDirectories: string[];
}
