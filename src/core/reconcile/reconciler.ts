/**
 * Reconciler
 * Decides, per local file, whether the remote copy is good enough or the file
 * must be (re-)uploaded, and carries out the upload.
 */

import fs from 'node:fs';
import * as logger from '../../utils/logger';
import { formatBytes } from '../../utils/format-utils';
import { toRemoteKey } from '../storage/remote-key';
import { createEmptyStats, mergeStats } from '../stats/backup-stats';
import type { ObjectStoreGateway } from '../storage/object-store-gateway';
import { FileRecord } from '../../interfaces/file-scanner';
import { ExistenceProbe } from '../../interfaces/object-store';
import { BackupStats, ReconcileDecision } from '../../interfaces/backup';

/**
 * Size-based staleness check. A remote copy at least as large as the local
 * file, or smaller by no more than `sizeTolerance` bytes, is kept.
 */
export function decide(
  localSize: number,
  probe: ExistenceProbe,
  sizeTolerance: number,
): ReconcileDecision {
  if (!probe.exists) {
    return { action: 'upload', reason: 'missing' };
  }
  const remoteSize = probe.size ?? 0;
  if (localSize <= remoteSize + sizeTolerance) {
    return { action: 'skip', reason: 'present' };
  }
  return { action: 'upload', reason: 'stale' };
}

export interface ReconcilerOptions {
  gateway: ObjectStoreGateway;
  bucket: string;
  prefix: string;
  dryRun?: boolean;
  sizeTolerance?: number;
  verbosity?: number;
}

export function createReconciler(options: ReconcilerOptions) {
  const { gateway, bucket, prefix } = options;
  const dryRun = options.dryRun ?? false;
  const sizeTolerance = options.sizeTolerance ?? 0;
  const verbosity = logger.consoleVerbosity(
    options.verbosity ?? logger.Verbosity.Normal,
    dryRun,
  );

  const remoteKeyFor = (record: FileRecord): string =>
    toRemoteKey(record.relativeKey, prefix);

  const reconcileFile = async (
    record: FileRecord,
    key: string,
    probe: ExistenceProbe,
  ): Promise<BackupStats> => {
    const stats = createEmptyStats();
    const localSize = record.size ?? fs.statSync(record.localPath).size;
    const decision = decide(localSize, probe, sizeTolerance);

    if (decision.action === 'skip') {
      logger.verbose(
        `Skipping ${key}: already in store (local ${localSize} B, remote ${probe.size ?? 0} B)`,
        verbosity,
      );
      stats.filesAlreadyPresent = 1;
      return stats;
    }

    if (dryRun) {
      logger.info(
        `[DRY RUN] Would upload ${key} (${decision.reason}, ${formatBytes(localSize)})`,
        verbosity,
      );
      stats.filesUploaded = 1;
      return stats;
    }

    logger.verbose(`Uploading ${key} (${decision.reason})`, verbosity);
    const result = await gateway.upload(bucket, key, record.localPath);
    if (result.success) {
      stats.filesUploaded = 1;
      stats.bytesUploaded = result.bytesSent;
    } else {
      stats.uploadFailures = 1;
    }
    return stats;
  };

  /**
   * Reconciles every record of one chunk in turn. `probes` holds the
   * pre-resolved existence state keyed by remote key; a record whose key is
   * absent from it is probed individually. A failure on one file is counted
   * as a scan error and never stops its siblings.
   */
  const processChunk = async (
    records: readonly FileRecord[],
    probes: ReadonlyMap<string, ExistenceProbe>,
  ): Promise<BackupStats> => {
    let total = createEmptyStats();

    for (const record of records) {
      let fileStats: BackupStats;
      try {
        const key = remoteKeyFor(record);
        const probe = probes.get(key) ?? (await gateway.exists(bucket, key));
        fileStats = await reconcileFile(record, key, probe);
      } catch (error) {
        const errorMessage =
          error instanceof Error ? error.message : String(error);
        logger.error(`Error processing ${record.relativeKey}: ${errorMessage}`);
        fileStats = { ...createEmptyStats(), scanErrors: 1 };
      }
      total = mergeStats(total, { ...fileStats, filesScanned: 1 });
    }

    return total;
  };

  return { remoteKeyFor, processChunk };
}

export type Reconciler = ReturnType<typeof createReconciler>;
