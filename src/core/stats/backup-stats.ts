import { BackupStats } from '../../interfaces/backup';
import { formatBytes, formatCount } from '../../utils/format-utils';

export function createEmptyStats(): BackupStats {
  return {
    filesScanned: 0,
    filesAlreadyPresent: 0,
    filesUploaded: 0,
    uploadFailures: 0,
    scanErrors: 0,
    bytesUploaded: 0,
    filesDeleted: 0,
    deleteFailures: 0,
  };
}

export function mergeStats(a: BackupStats, b: BackupStats): BackupStats {
  return {
    filesScanned: a.filesScanned + b.filesScanned,
    filesAlreadyPresent: a.filesAlreadyPresent + b.filesAlreadyPresent,
    filesUploaded: a.filesUploaded + b.filesUploaded,
    uploadFailures: a.uploadFailures + b.uploadFailures,
    scanErrors: a.scanErrors + b.scanErrors,
    bytesUploaded: a.bytesUploaded + b.bytesUploaded,
    filesDeleted: a.filesDeleted + b.filesDeleted,
    deleteFailures: a.deleteFailures + b.deleteFailures,
  };
}

/**
 * Stats for a chunk that could not be processed: every file is counted as
 * scanned and as a scan error.
 */
export function failedChunkStats(fileCount: number): BackupStats {
  return {
    ...createEmptyStats(),
    filesScanned: fileCount,
    scanErrors: fileCount,
  };
}

export function countErrors(stats: BackupStats): number {
  return stats.uploadFailures + stats.scanErrors + stats.deleteFailures;
}

export function hasFailures(stats: BackupStats): boolean {
  return countErrors(stats) > 0;
}

export function formatSummary(
  stats: BackupStats,
  options: { includeDeletes?: boolean } = {},
): string[] {
  const lines = [
    `Files scanned: ${formatCount(stats.filesScanned)}`,
    `Already in store: ${formatCount(stats.filesAlreadyPresent)}`,
    `Uploaded: ${formatCount(stats.filesUploaded)}`,
    `Upload failures: ${formatCount(stats.uploadFailures)}`,
    `Scan errors: ${formatCount(stats.scanErrors)}`,
  ];
  if (options.includeDeletes) {
    lines.push(
      `Orphans deleted: ${formatCount(stats.filesDeleted)}`,
      `Delete failures: ${formatCount(stats.deleteFailures)}`,
    );
  }
  lines.push(`Data uploaded: ${formatBytes(stats.bytesUploaded)}`);
  return lines;
}
