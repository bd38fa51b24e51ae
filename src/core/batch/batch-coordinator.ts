/**
 * BatchCoordinator
 * Runs the reconciliation pipeline over the scanned files: fixed-size batches
 * processed one after another, each split into one chunk per worker.
 */

import * as logger from '../../utils/logger';
import { processPool } from '../pool/work-pool';
import {
  createEmptyStats,
  failedChunkStats,
  mergeStats,
} from '../stats/backup-stats';
import type { ObjectStoreGateway } from '../storage/object-store-gateway';
import type { Reconciler } from '../reconcile/reconciler';
import type { ProgressReporter } from '../progress/progress-reporter';
import { FileRecord } from '../../interfaces/file-scanner';
import { RunOutcome } from '../../interfaces/backup';

/**
 * Consecutive slices of at most `size` items.
 */
export function chunkBySize<T>(items: readonly T[], size: number): T[][] {
  const step = Math.max(1, Math.floor(size));
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += step) {
    chunks.push(items.slice(i, i + step));
  }
  return chunks;
}

/**
 * At most `parts` contiguous, roughly equal slices.
 */
export function splitIntoChunks<T>(items: readonly T[], parts: number): T[][] {
  return chunkBySize(items, Math.ceil(items.length / Math.max(1, parts)));
}

export interface BatchCoordinatorOptions {
  gateway: ObjectStoreGateway;
  reconciler: Reconciler;
  bucket: string;
  batchSize?: number;
  maxWorkers?: number;
  progress?: ProgressReporter;
  signal?: AbortSignal;
  verbosity?: number;
}

export function createBatchCoordinator(options: BatchCoordinatorOptions) {
  const { gateway, reconciler, bucket, progress, signal } = options;
  const batchSize = options.batchSize ?? 100;
  const maxWorkers = options.maxWorkers ?? 4;
  const verbosity = options.verbosity ?? logger.Verbosity.Normal;

  const processChunk = async (records: FileRecord[]) => {
    const keys = records.map(reconciler.remoteKeyFor);
    const probes = await gateway.batchExists(bucket, keys);
    return reconciler.processChunk(records, probes);
  };

  const run = async (records: readonly FileRecord[]): Promise<RunOutcome> => {
    let stats = createEmptyStats();
    const batches = chunkBySize(records, batchSize);
    progress?.initialize(records.length);

    for (const [index, batch] of batches.entries()) {
      if (signal?.aborted) {
        break;
      }
      logger.verbose(
        `Processing batch ${index + 1}/${batches.length} (${batch.length} files)`,
        verbosity,
      );

      // Resolves only once every chunk of this batch has settled.
      await processPool(splitIntoChunks(batch, maxWorkers), processChunk, maxWorkers, {
        signal,
        onSettled: (result) => {
          if (result.success) {
            stats = mergeStats(stats, result.value);
          } else {
            logger.error(
              `Chunk of ${result.item.length} files failed: ${result.error.message}`,
            );
            stats = mergeStats(stats, failedChunkStats(result.item.length));
          }
          progress?.update(result.item.length);
        },
      });
    }

    progress?.finish();
    const cancelled = signal?.aborted ?? false;
    if (cancelled) {
      logger.warning(
        `Run cancelled after ${stats.filesScanned} of ${records.length} files`,
        verbosity,
      );
    }
    return { stats, cancelled };
  };

  return { run };
}

export type BatchCoordinator = ReturnType<typeof createBatchCoordinator>;
