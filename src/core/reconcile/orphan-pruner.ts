/**
 * OrphanPruner
 * Removes remote objects under the prefix that no longer have a local file.
 */

import * as logger from '../../utils/logger';
import { matchesAnyPattern } from '../../utils/pattern-utils';
import { keyBaseName } from '../storage/remote-key';
import { createEmptyStats } from '../stats/backup-stats';
import { processPool } from '../pool/work-pool';
import type { ObjectStoreGateway } from '../storage/object-store-gateway';
import { BackupStats } from '../../interfaces/backup';

export interface OrphanPrunerOptions {
  gateway: ObjectStoreGateway;
  bucket: string;
  prefix: string;
  dryRun?: boolean;
  /** Remote objects whose base name matches are never treated as orphans. */
  excludePatterns?: readonly string[];
  maxConcurrency?: number;
  signal?: AbortSignal;
  verbosity?: number;
}

export function createOrphanPruner(options: OrphanPrunerOptions) {
  const { gateway, bucket, prefix, signal } = options;
  const dryRun = options.dryRun ?? false;
  const excludePatterns = options.excludePatterns ?? [];
  const maxConcurrency = options.maxConcurrency ?? 4;
  const verbosity = logger.consoleVerbosity(
    options.verbosity ?? logger.Verbosity.Normal,
    dryRun,
  );

  const findOrphans = async (
    localKeys: ReadonlySet<string>,
  ): Promise<string[]> => {
    const remoteKeys = await gateway.list(bucket, prefix);
    return [...remoteKeys]
      .filter(
        (key) =>
          !localKeys.has(key) &&
          !matchesAnyPattern(keyBaseName(key), excludePatterns),
      )
      .sort();
  };

  const prune = async (localKeys: ReadonlySet<string>): Promise<BackupStats> => {
    const stats = createEmptyStats();
    const orphans = await findOrphans(localKeys);

    if (orphans.length === 0) {
      logger.info('No orphaned remote objects found', verbosity);
      return stats;
    }

    logger.info(
      `Found ${orphans.length} remote objects with no local counterpart`,
      verbosity,
    );

    if (dryRun) {
      for (const key of orphans) {
        logger.info(`[DRY RUN] Would delete ${key}`, verbosity);
      }
      stats.filesDeleted = orphans.length;
      return stats;
    }

    const results = await processPool(
      orphans,
      (key) => gateway.delete(bucket, key),
      maxConcurrency,
      { signal },
    );

    for (const result of results) {
      if (result.success && result.value) {
        stats.filesDeleted++;
      } else {
        stats.deleteFailures++;
      }
    }
    return stats;
  };

  return { findOrphans, prune };
}

export type OrphanPruner = ReturnType<typeof createOrphanPruner>;
