#!/usr/bin/env node

import fs from 'node:fs';
import path from 'node:path';
import { parseArgs } from 'node:util';
import chalk from 'chalk';
import { verifyBackup, VerifyOptions } from './src/backup-verify';
import * as logger from './src/utils/logger';
import { bold } from './src/utils/logger';
import { ConfigurationError, UsageError } from './src/utils/errors';
import {
  parseIntegerOption,
  resolveBucket,
  resolveEndpoint,
  resolvePrefix,
  resolveRegion,
  resolveVerbosity,
} from './src/utils/env-utils';
import { normalizePatterns } from './src/utils/pattern-utils';
import { formatDuration } from './src/utils/format-utils';
import {
  countErrors,
  formatSummary,
  hasFailures,
} from './src/core/stats/backup-stats';
import { RunOutcome } from './src/interfaces/backup';

export const EXIT_OK = 0;
export const EXIT_FAILURES = 1;
export const EXIT_USAGE = 2;
export const EXIT_CANCELLED = 130;

function readVersion(): string {
  // package.json sits next to index.ts, or one level up from dist/
  for (const candidate of [
    path.join(__dirname, 'package.json'),
    path.join(__dirname, '..', 'package.json'),
  ]) {
    if (!fs.existsSync(candidate)) {
      continue;
    }
    const packageJson: unknown = JSON.parse(fs.readFileSync(candidate, 'utf8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  }
  return 'unknown';
}

const VERSION = readVersion();

export function parseCliArgs(args: string[]) {
  try {
    const { values, positionals } = parseArgs({
      args,
      options: {
        source: { type: 'string' },
        bucket: { type: 'string' },
        prefix: { type: 'string' },
        threads: { type: 'string' },
        'batch-size': { type: 'string' },
        'dry-run': { type: 'boolean' },
        'size-tolerance': { type: 'string' },
        exclude: { type: 'string', multiple: true },
        debug: { type: 'boolean' },
        quiet: { type: 'boolean' },
        'warm-cache': { type: 'boolean' },
        'delete-orphans': { type: 'boolean' },
        region: { type: 'string' },
        endpoint: { type: 'string' },
        'log-dir': { type: 'string' },
        help: { type: 'boolean', short: 'h' },
        version: { type: 'boolean', short: 'v' },
      },
      allowPositionals: true,
    });

    if (positionals.length > 1) {
      throw new Error(`Unexpected argument: ${positionals[1]}`);
    }

    return {
      ...values,
      sourceDir: positionals[0] || values.source,
    };
  } catch (error: unknown) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    throw new UsageError(errorMessage);
  }
}

export type CliArgs = ReturnType<typeof parseCliArgs>;

/**
 * Turn parsed flags plus environment fallbacks into run options.
 */
export function buildVerifyOptions(
  args: CliArgs,
  env: Record<string, string | undefined> = process.env,
): VerifyOptions {
  if (!args.sourceDir) {
    throw new UsageError('Source directory is required');
  }

  const bucket = resolveBucket(args.bucket, env);
  if (!bucket) {
    throw new UsageError('Bucket is required: pass --bucket or set S3_BUCKET');
  }

  return {
    sourceDir: args.sourceDir,
    bucket,
    prefix: resolvePrefix(args.prefix, env),
    threads: parseIntegerOption(args.threads, 'threads', 4),
    batchSize: parseIntegerOption(args['batch-size'], 'batch-size', 100),
    sizeTolerance: parseIntegerOption(
      args['size-tolerance'],
      'size-tolerance',
      0,
      0,
    ),
    dryRun: args['dry-run'] ?? false,
    excludePatterns: normalizePatterns(args.exclude),
    warmCache: args['warm-cache'] ?? false,
    deleteOrphans: args['delete-orphans'] ?? false,
    region: resolveRegion(args.region, env),
    endpoint: resolveEndpoint(args.endpoint, env),
    verbosity: resolveVerbosity(args),
  };
}

export function exitCodeFor(outcome: RunOutcome): number {
  if (outcome.cancelled) {
    return EXIT_CANCELLED;
  }
  return hasFailures(outcome.stats) ? EXIT_FAILURES : EXIT_OK;
}

export function printSummary(
  outcome: RunOutcome,
  details: {
    dryRun: boolean;
    deleteOrphans: boolean;
    logPath: string;
    elapsedSeconds: number;
  },
): void {
  logger.always('');
  logger.always(bold('Backup verification summary'));
  for (const line of formatSummary(outcome.stats, {
    includeDeletes: details.deleteOrphans,
  })) {
    logger.always(`  ${line}`);
  }
  if (details.dryRun) {
    logger.always(chalk.yellow('Dry run: no files were uploaded or deleted'));
  }
  if (outcome.cancelled) {
    logger.always(chalk.yellow('Run cancelled before all files were processed'));
  }
  logger.always(`Detailed log: ${details.logPath}`);

  if (hasFailures(outcome.stats)) {
    logger.error(`Completed with ${countErrors(outcome.stats)} errors`);
  } else if (!outcome.cancelled) {
    logger.always(
      chalk.green(`Completed in ${formatDuration(details.elapsedSeconds)}`),
    );
  }
}

function showHelp() {
  console.log(`
${bold(`S3 Backup Verifier v${VERSION} - Verify a local tree is backed up to S3 and upload what is missing`)}

${bold('Usage: s3-backup-verify <source-dir> --bucket=<name> [options]')}

${bold('Options:')}
  --source=<path>         Source directory to verify (can also be positional)
  --bucket=<name>         Target bucket (default: $S3_BUCKET)
  --prefix=<prefix>       Key prefix inside the bucket (default: $S3_PREFIX)
  --threads=<number>      Concurrent workers (default: 4)
  --batch-size=<number>   Files per batch (default: 100)
  --size-tolerance=<n>    Bytes a remote copy may be smaller and still count (default: 0)
  --exclude=<pattern>     Skip files whose name matches (repeatable, comma-separated)
  --dry-run               Report what would be uploaded without uploading
  --warm-cache            List the prefix once up front instead of probing each file
  --delete-orphans        Delete remote objects with no local file
  --region=<region>       AWS region (default: $AWS_REGION or us-east-1)
  --endpoint=<url>        S3-compatible endpoint (default: $AWS_ENDPOINT_URL_S3)
  --log-dir=<path>        Directory for the detailed run log (default: current directory)
  --debug                 Show per-file decisions
  --quiet                 Show only errors and the summary
  --help, -h              Show this help message
  --version, -v           Show version information

${bold('Examples:')}
  s3-backup-verify /mnt/disk/Photos --bucket=my-backups --prefix=photos
  s3-backup-verify /mnt/disk/Photos --bucket=my-backups --dry-run --exclude="Thumbs.db,*.tmp"
  s3-backup-verify /mnt/disk/Photos --bucket=my-backups --warm-cache --threads=8
`);
}

function showVersion() {
  console.log(`s3-backup-verify v${VERSION}`);
}

export interface CliDependencies {
  verify?: typeof verifyBackup;
  env?: Record<string, string | undefined>;
  signal?: AbortSignal;
  now?: () => number;
}

/**
 * Runs the CLI and resolves with the process exit code.
 */
export async function runCli(
  rawArgs: string[],
  dependencies: CliDependencies = {},
): Promise<number> {
  const verify = dependencies.verify ?? verifyBackup;
  const now = dependencies.now ?? Date.now;

  let options: VerifyOptions;
  let logDir: string;
  try {
    const args = parseCliArgs(rawArgs);
    if (args.help || rawArgs.length === 0) {
      showHelp();
      return EXIT_OK;
    }
    if (args.version) {
      showVersion();
      return EXIT_OK;
    }
    options = buildVerifyOptions(args, dependencies.env);
    logDir = args['log-dir'] ?? process.cwd();
  } catch (error: unknown) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    console.error(logger.red(`Error: ${errorMessage}`));
    console.error('Run with --help for usage.');
    return EXIT_USAGE;
  }

  const logPath = logger.createRunLogPath(logDir);
  logger.attachRunLog(logPath);
  const startedAt = now();
  try {
    logger.verbose(
      `Detailed log: ${logPath}`,
      options.verbosity ?? logger.Verbosity.Normal,
    );
    const outcome = await verify({ ...options, signal: dependencies.signal });
    printSummary(outcome, {
      dryRun: options.dryRun ?? false,
      deleteOrphans: options.deleteOrphans ?? false,
      logPath,
      elapsedSeconds: (now() - startedAt) / 1000,
    });
    return exitCodeFor(outcome);
  } catch (error: unknown) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    if (error instanceof ConfigurationError) {
      logger.error(`Configuration error: ${errorMessage}`);
    } else {
      logger.error(`Unexpected error: ${errorMessage}`);
    }
    return EXIT_FAILURES;
  } finally {
    logger.detachRunLog();
  }
}

async function main() {
  const controller = new AbortController();
  process.on('SIGINT', () => {
    if (controller.signal.aborted) {
      process.exit(EXIT_CANCELLED);
    }
    logger.warning(
      'Interrupted: finishing in-flight uploads. Press Ctrl+C again to quit immediately.',
      logger.Verbosity.Normal,
    );
    controller.abort();
  });

  const exitCode = await runCli(process.argv.slice(2), {
    signal: controller.signal,
  });
  process.exit(exitCode);
}

if (require.main === module) {
  main().catch((err) => {
    const errorMessage = err instanceof Error ? err.message : String(err);
    console.error(logger.red(`Error: ${errorMessage}`));
    process.exit(EXIT_FAILURES);
  });
}
