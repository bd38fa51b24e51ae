import fs from 'node:fs';
import path from 'node:path';
import * as logger from '../utils/logger';
import { matchesAnyPattern } from '../utils/pattern-utils';
import { ScanResult } from '../interfaces/file-scanner';

export interface FileScannerOptions {
  excludePatterns?: readonly string[];
  verbosity?: number;
}

export function createFileScanner(
  sourceDir: string,
  options: FileScannerOptions = {},
) {
  const resolvedDir = path.resolve(sourceDir);
  const excludePatterns = options.excludePatterns ?? [];
  const verbosity = options.verbosity ?? logger.Verbosity.Normal;

  // Symlinked files are followed; symlinked directories are not descended.
  const isRegularFile = (entry: fs.Dirent, fullPath: string): boolean => {
    if (entry.isFile()) {
      return true;
    }
    if (entry.isSymbolicLink()) {
      return fs.statSync(fullPath, { throwIfNoEntry: false })?.isFile() ?? false;
    }
    return false;
  };

  const scanDirectory = (dir: string, result: ScanResult): void => {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : String(error);
      if (dir === resolvedDir) {
        logger.error(`Error scanning directory ${dir}: ${errorMessage}`);
      } else {
        logger.warning(
          `Skipping unreadable directory ${dir}: ${errorMessage}`,
          verbosity,
        );
      }
      result.unreadableDirectories.push(dir);
      return;
    }

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      try {
        if (entry.isDirectory()) {
          scanDirectory(fullPath, result);
          continue;
        }

        if (!isRegularFile(entry, fullPath)) {
          continue;
        }

        const relativeKey = path.relative(resolvedDir, fullPath);
        if (matchesAnyPattern(entry.name, excludePatterns)) {
          logger.verbose(`Excluded ${relativeKey}`, verbosity);
          result.excludedCount++;
          continue;
        }

        result.files.push({ localPath: fullPath, relativeKey });
      } catch (error) {
        const errorMessage =
          error instanceof Error ? error.message : String(error);
        logger.warning(
          `Error processing ${entry.name} in ${dir}: ${errorMessage}`,
          verbosity,
        );
      }
    }
  };

  const scan = async (): Promise<ScanResult> => {
    const result: ScanResult = {
      files: [],
      excludedCount: 0,
      unreadableDirectories: [],
    };

    if (!fs.existsSync(resolvedDir)) {
      logger.error(`Directory does not exist: ${resolvedDir}`);
      return result;
    }

    logger.info(`Scanning files in ${resolvedDir}...`, verbosity);
    scanDirectory(resolvedDir, result);

    logger.info(`Found ${result.files.length} files to process.`, verbosity);
    if (result.excludedCount > 0) {
      logger.info(
        `${result.excludedCount} files matched exclusion patterns.`,
        verbosity,
      );
    }

    return result;
  };

  return { scan, rootDir: resolvedDir };
}

export type FileScanner = ReturnType<typeof createFileScanner>;
