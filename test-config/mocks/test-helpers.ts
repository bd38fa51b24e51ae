/**
 * Consolidated Test Helpers
 *
 * Fakes implement the same interfaces as the real collaborators, enabling
 * direct dependency injection without module mocking.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { vi } from 'vitest';
import type {
  ListOptions,
  ListPage,
  ObjectStoreClient,
  StoreOutcome,
} from '../../src/interfaces/object-store';
import type { ProgressReporter } from '../../src/core/progress/progress-reporter';

/**
 * Creates a temporary directory populated with the given files. A string
 * value is written as the file content; a number creates a file of that
 * many bytes.
 */
export function createTempTree(files: Record<string, string | number>): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), 'backup-verify-'));
  for (const [relativePath, content] of Object.entries(files)) {
    const fullPath = path.join(root, relativePath);
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    fs.writeFileSync(
      fullPath,
      typeof content === 'number' ? Buffer.alloc(content, 0x61) : content,
    );
  }
  return root;
}

export function removeTempTree(root: string): void {
  fs.rmSync(root, { recursive: true, force: true });
}

/**
 * Captures everything written to process.stdout until restored.
 */
export function captureOutput() {
  const lines: string[] = [];
  const spy = vi
    .spyOn(process.stdout, 'write')
    .mockImplementation((chunk: string | Uint8Array) => {
      lines.push(
        typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf8'),
      );
      return true;
    });

  return {
    lines,
    text: (): string => lines.join(''),
    restore: (): void => {
      spy.mockRestore();
    },
  };
}

export interface InMemoryObjectStoreOptions {
  bucket?: string;
  /** Initial objects as key -> size in bytes. */
  objects?: Record<string, number>;
}

/**
 * In-memory ObjectStoreClient holding a single bucket. Requests for any other
 * bucket answer not-found, the same way a missing S3 bucket does.
 */
export function createInMemoryObjectStore(
  options: InMemoryObjectStoreOptions = {},
) {
  const bucketName = options.bucket ?? 'test-bucket';
  const objects = new Map<string, number>(Object.entries(options.objects ?? {}));
  const calls = {
    listObjects: 0,
    headObject: 0,
    putObjectFromFile: 0,
    deleteObject: 0,
  };
  const putFailures = new Map<string, number>();
  const headFailures = new Set<string>();
  const deleteFailures = new Set<string>();
  let listFailsAfterPages: number | null = null;
  let listPagesServed = 0;

  const injectedError = (code: string): StoreOutcome<never> => ({
    status: 'error',
    code,
    message: `${code} injected by test`,
  });

  const listObjects = async (
    bucket: string,
    prefix: string,
    listOptions: ListOptions = {},
  ): Promise<StoreOutcome<ListPage>> => {
    calls.listObjects++;
    if (bucket !== bucketName) {
      return { status: 'not-found' };
    }
    if (listFailsAfterPages !== null && listPagesServed >= listFailsAfterPages) {
      return injectedError('InternalError');
    }
    listPagesServed++;

    const keys = [...objects.keys()].filter((key) => key.startsWith(prefix)).sort();
    const start = Number(listOptions.continuationToken ?? '0');
    const end = start + (listOptions.maxKeys ?? 1000);
    return {
      status: 'ok',
      value: {
        objects: keys
          .slice(start, end)
          .map((key) => ({ key, size: objects.get(key) ?? 0 })),
        nextContinuationToken: end < keys.length ? String(end) : undefined,
      },
    };
  };

  const headObject = async (
    bucket: string,
    key: string,
  ): Promise<StoreOutcome<{ size: number }>> => {
    calls.headObject++;
    if (headFailures.has(key)) {
      return injectedError('AccessDenied');
    }
    const size = bucket === bucketName ? objects.get(key) : undefined;
    return size === undefined
      ? { status: 'not-found' }
      : { status: 'ok', value: { size } };
  };

  const putObjectFromFile = async (
    bucket: string,
    key: string,
    localPath: string,
  ): Promise<StoreOutcome<{ etag?: string }>> => {
    calls.putObjectFromFile++;
    if (bucket !== bucketName) {
      return { status: 'not-found' };
    }
    const remaining = putFailures.get(key) ?? 0;
    if (remaining > 0) {
      putFailures.set(key, remaining - 1);
      return injectedError('SlowDown');
    }
    objects.set(key, fs.statSync(localPath).size);
    return { status: 'ok', value: { etag: `"etag-${key}"` } };
  };

  const deleteObject = async (
    bucket: string,
    key: string,
  ): Promise<StoreOutcome<{ key: string }>> => {
    calls.deleteObject++;
    if (deleteFailures.has(key)) {
      return injectedError('AccessDenied');
    }
    if (bucket !== bucketName || !objects.delete(key)) {
      return { status: 'not-found' };
    }
    return { status: 'ok', value: { key } };
  };

  const client: ObjectStoreClient = {
    listObjects,
    headObject,
    putObjectFromFile,
    deleteObject,
  };

  return {
    client,
    bucket: bucketName,
    objects,
    calls,
    /** Fail the next `times` uploads of `key`. */
    failUploads: (key: string, times: number): void => {
      putFailures.set(key, times);
    },
    failHead: (key: string): void => {
      headFailures.add(key);
    },
    failDelete: (key: string): void => {
      deleteFailures.add(key);
    },
    /** Serve `pages` listing pages, then fail every later listing request. */
    failListingAfter: (pages: number): void => {
      listFailsAfterPages = pages;
      listPagesServed = 0;
    },
    snapshot: (): Record<string, number> => Object.fromEntries(objects),
  };
}

export type InMemoryObjectStore = ReturnType<typeof createInMemoryObjectStore>;

/**
 * Creates a mock ProgressReporter matching the factory return type
 */
export function createMockProgressReporter(): ProgressReporter {
  return {
    initialize: vi.fn(),
    update: vi.fn(),
    finish: vi.fn(),
    getProgressPercentage: vi.fn(() => 0),
    isComplete: vi.fn(() => false),
  };
}

/** Resolves immediately so retry backoff does not slow tests down. */
export const noDelay = (): Promise<void> => Promise.resolve();
