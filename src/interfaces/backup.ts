/**
 * Run-level statistics. Every counter is a plain sum so partial results from
 * concurrent chunks merge in any order.
 */
export interface BackupStats {
  filesScanned: number;
  filesAlreadyPresent: number;
  filesUploaded: number;
  uploadFailures: number;
  scanErrors: number;
  bytesUploaded: number;
  filesDeleted: number;
  deleteFailures: number;
}

export type ReconcileAction = 'skip' | 'upload';

export type ReconcileReason = 'present' | 'missing' | 'stale';

export interface ReconcileDecision {
  action: ReconcileAction;
  reason: ReconcileReason;
}

export interface RunOutcome {
  stats: BackupStats;
  cancelled: boolean;
}
