import fs from 'node:fs';
import * as logger from './utils/logger';
import { Verbosity } from './interfaces/logger';
import { ConfigurationError } from './utils/errors';
import { DEFAULT_REGION } from './utils/env-utils';
import { createFileScanner } from './core/file-scanner';
import {
  createS3Client,
  createS3ObjectStore,
  S3ConnectionOptions,
} from './core/storage/s3-object-store';
import {
  createObjectStoreGateway,
  ObjectStoreGatewayOptions,
} from './core/storage/object-store-gateway';
import { normalizePrefix } from './core/storage/remote-key';
import { createReconciler } from './core/reconcile/reconciler';
import { createOrphanPruner } from './core/reconcile/orphan-pruner';
import { createBatchCoordinator } from './core/batch/batch-coordinator';
import { createProgressReporter } from './core/progress/progress-reporter';
import { createEmptyStats, mergeStats } from './core/stats/backup-stats';
import { ObjectStoreClient } from './interfaces/object-store';
import { RunOutcome } from './interfaces/backup';

export interface VerifyOptions {
  sourceDir: string;
  bucket: string;
  prefix?: string;
  threads?: number;
  batchSize?: number;
  dryRun?: boolean;
  sizeTolerance?: number;
  excludePatterns?: string[];
  warmCache?: boolean;
  deleteOrphans?: boolean;
  region?: string;
  endpoint?: string;
  verbosity?: Verbosity;
  signal?: AbortSignal;
}

export interface VerifyDependencies {
  createObjectStore?: (connection: S3ConnectionOptions) => ObjectStoreClient;
  createFileScanner?: typeof createFileScanner;
  createProgressReporter?: typeof createProgressReporter;
  gatewayOptions?: Pick<ObjectStoreGatewayOptions, 'retryDelayMs' | 'sleep'>;
}

const createDefaultObjectStore = (
  connection: S3ConnectionOptions,
): ObjectStoreClient => createS3ObjectStore(createS3Client(connection));

/**
 * One verification run: validate, scan, reconcile in batches, and optionally
 * prune orphans. Only configuration problems throw; everything else ends up
 * in the returned statistics.
 */
export async function verifyBackup(
  options: VerifyOptions,
  dependencies: VerifyDependencies = {},
): Promise<RunOutcome> {
  const makeObjectStore =
    dependencies.createObjectStore ?? createDefaultObjectStore;
  const makeFileScanner = dependencies.createFileScanner ?? createFileScanner;
  const makeProgressReporter =
    dependencies.createProgressReporter ?? createProgressReporter;

  const dryRun = options.dryRun ?? false;
  const verbosity = logger.consoleVerbosity(
    options.verbosity ?? Verbosity.Normal,
    dryRun,
  );
  const prefix = normalizePrefix(options.prefix);
  const threads = options.threads ?? 4;
  const excludePatterns = options.excludePatterns ?? [];
  const { bucket, signal } = options;

  const sourceStat = fs.statSync(options.sourceDir, { throwIfNoEntry: false });
  if (!sourceStat) {
    throw new ConfigurationError(
      `Source directory does not exist: ${options.sourceDir}`,
    );
  }
  if (!sourceStat.isDirectory()) {
    throw new ConfigurationError(
      `Source path is not a directory: ${options.sourceDir}`,
    );
  }
  if (!bucket) {
    throw new ConfigurationError('No bucket configured');
  }

  const store = makeObjectStore({
    region: options.region ?? DEFAULT_REGION,
    endpoint: options.endpoint,
  });
  const gateway = createObjectStoreGateway(store, {
    ...dependencies.gatewayOptions,
    verbosity,
  });

  logger.info(`Checking bucket ${bucket}...`, verbosity);
  if (!(await gateway.validateContainer(bucket))) {
    throw new ConfigurationError(`Bucket ${bucket} is not accessible`);
  }

  const scanner = makeFileScanner(options.sourceDir, {
    excludePatterns,
    verbosity,
  });
  const scanResult = await scanner.scan();
  if (scanResult.files.length === 0) {
    logger.warning('No files found to process', verbosity);
    return { stats: createEmptyStats(), cancelled: false };
  }

  if (options.warmCache) {
    await gateway.warmCache(bucket, prefix);
  }

  if (dryRun) {
    logger.info('Dry run: nothing will be uploaded or deleted', verbosity);
  }
  logger.info(
    `Processing ${scanResult.files.length} files in batches of ${options.batchSize ?? 100} with ${threads} workers`,
    verbosity,
  );

  const reconciler = createReconciler({
    gateway,
    bucket,
    prefix,
    dryRun,
    sizeTolerance: options.sizeTolerance,
    verbosity,
  });
  const coordinator = createBatchCoordinator({
    gateway,
    reconciler,
    bucket,
    batchSize: options.batchSize,
    maxWorkers: threads,
    progress: makeProgressReporter({ verbosity }),
    signal,
    verbosity,
  });

  const outcome = await coordinator.run(scanResult.files);
  if (!options.deleteOrphans || outcome.cancelled) {
    return outcome;
  }

  if (scanResult.unreadableDirectories.length > 0) {
    logger.warning(
      `Skipping orphan deletion: ${scanResult.unreadableDirectories.length} directories could not be read`,
      verbosity,
    );
    return outcome;
  }

  const pruner = createOrphanPruner({
    gateway,
    bucket,
    prefix,
    dryRun,
    excludePatterns,
    maxConcurrency: threads,
    signal,
    verbosity,
  });
  const localKeys = new Set(scanResult.files.map(reconciler.remoteKeyFor));
  const pruneStats = await pruner.prune(localKeys);

  return {
    stats: mergeStats(outcome.stats, pruneStats),
    cancelled: signal?.aborted ?? false,
  };
}
