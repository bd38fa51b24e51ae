/**
 * ObjectStoreGateway
 * Existence checks, uploads, listings and deletes against one object store,
 * fronted by a run-scoped existence cache.
 */

import fs from 'node:fs';
import * as logger from '../../utils/logger';
import { listingPrefix } from './remote-key';
import { LIST_PAGE_SIZE } from './s3-object-store';
import {
  ExistenceProbe,
  ObjectStoreClient,
  RemoteObject,
  UploadResult,
} from '../../interfaces/object-store';

export interface ObjectStoreGatewayOptions {
  verbosity?: number;
  /** Delay before the second attempt; doubles on each further attempt. */
  retryDelayMs?: number;
  maxAttempts?: number;
  listPageSize?: number;
  sleep?: (ms: number) => Promise<void>;
}

const MISSING: ExistenceProbe = { exists: false, size: null };

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export function createObjectStoreGateway(
  store: ObjectStoreClient,
  options: ObjectStoreGatewayOptions = {},
) {
  const verbosity = options.verbosity ?? logger.Verbosity.Normal;
  const retryDelayMs = options.retryDelayMs ?? 1000;
  const maxAttempts = Math.max(1, options.maxAttempts ?? 3);
  const listPageSize = options.listPageSize ?? LIST_PAGE_SIZE;
  const sleep = options.sleep ?? defaultSleep;

  // Grows for the lifetime of the run; entries are never evicted.
  const cache = new Map<string, ExistenceProbe>();
  const cacheKey = (bucket: string, key: string): string => `${bucket}/${key}`;

  const validateContainer = async (bucket: string): Promise<boolean> => {
    const outcome = await store.listObjects(bucket, '', { maxKeys: 1 });
    switch (outcome.status) {
      case 'ok':
        logger.success(`Bucket ${bucket} is accessible`, verbosity);
        return true;
      case 'not-found':
        logger.error(`Bucket ${bucket} does not exist`);
        return false;
      case 'error':
        logger.error(
          `Cannot access bucket ${bucket}: ${outcome.code}: ${outcome.message}`,
        );
        return false;
    }
  };

  const probe = async (bucket: string, key: string): Promise<ExistenceProbe> => {
    const outcome = await store.headObject(bucket, key);
    switch (outcome.status) {
      case 'ok':
        return { exists: true, size: outcome.value.size };
      case 'not-found':
        return MISSING;
      case 'error':
        logger.warning(
          `Existence check failed for ${key} (${outcome.code}: ${outcome.message}); treating as missing`,
          verbosity,
        );
        return MISSING;
    }
  };

  const exists = async (bucket: string, key: string): Promise<ExistenceProbe> => {
    const id = cacheKey(bucket, key);
    const cached = cache.get(id);
    if (cached) {
      return cached;
    }

    const result = await probe(bucket, key);
    // A write-through that landed while the probe was in flight wins.
    const current = cache.get(id);
    if (current) {
      return current;
    }
    cache.set(id, result);
    return result;
  };

  const batchExists = async (
    bucket: string,
    keys: readonly string[],
  ): Promise<Map<string, ExistenceProbe>> => {
    const results = new Map<string, ExistenceProbe>();
    const misses: string[] = [];

    for (const key of keys) {
      const cached = cache.get(cacheKey(bucket, key));
      if (cached) {
        results.set(key, cached);
      } else {
        misses.push(key);
      }
    }

    for (const key of misses) {
      results.set(key, await exists(bucket, key));
    }

    if (misses.length > 0) {
      logger.verbose(
        `Existence check: ${keys.length - misses.length} cached, ${misses.length} probed`,
        verbosity,
      );
    }
    return results;
  };

  /**
   * Pages through every object under the prefix. A listing that fails part
   * way returns what was collected so far.
   */
  const listObjects = async (
    bucket: string,
    prefix: string,
  ): Promise<RemoteObject[]> => {
    const listPrefix = listingPrefix(prefix);
    const collected: RemoteObject[] = [];
    let continuationToken: string | undefined;

    do {
      const outcome = await store.listObjects(bucket, listPrefix, {
        maxKeys: listPageSize,
        continuationToken,
      });
      if (outcome.status !== 'ok') {
        const reason =
          outcome.status === 'error'
            ? `${outcome.code}: ${outcome.message}`
            : 'bucket not found';
        logger.warning(
          `Listing ${bucket}/${listPrefix} stopped after ${collected.length} objects: ${reason}`,
          verbosity,
        );
        return collected;
      }
      collected.push(...outcome.value.objects);
      continuationToken = outcome.value.nextContinuationToken;
    } while (continuationToken);

    return collected;
  };

  const warmCache = async (bucket: string, prefix: string): Promise<number> => {
    const objects = await listObjects(bucket, prefix);
    for (const object of objects) {
      cache.set(cacheKey(bucket, object.key), {
        exists: true,
        size: object.size,
      });
    }
    logger.info(
      `Loaded ${objects.length} remote objects into the existence cache`,
      verbosity,
    );
    return objects.length;
  };

  const list = async (bucket: string, prefix: string): Promise<Set<string>> => {
    const objects = await listObjects(bucket, prefix);
    return new Set(objects.map((object) => object.key));
  };

  const upload = async (
    bucket: string,
    key: string,
    localPath: string,
  ): Promise<UploadResult> => {
    let size: number;
    try {
      size = fs.statSync(localPath).size;
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : String(error);
      logger.error(`Cannot read ${localPath}: ${errorMessage}`);
      return { success: false, bytesSent: 0 };
    }

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const outcome = await store.putObjectFromFile(bucket, key, localPath);
      if (outcome.status === 'ok') {
        cache.set(cacheKey(bucket, key), { exists: true, size });
        logger.verbose(`Uploaded ${key} (${size} bytes)`, verbosity);
        return { success: true, bytesSent: size };
      }

      const reason =
        outcome.status === 'error'
          ? `${outcome.code}: ${outcome.message}`
          : 'bucket not found';
      if (attempt >= maxAttempts) {
        logger.error(
          `Upload failed for ${key} after ${maxAttempts} attempts: ${reason}`,
        );
        break;
      }

      const delay = retryDelayMs * Math.pow(2, attempt - 1);
      logger.warning(
        `Upload attempt ${attempt} failed for ${key}: ${reason}. Retrying in ${delay}ms`,
        verbosity,
      );
      await sleep(delay);
    }

    return { success: false, bytesSent: 0 };
  };

  const deleteObject = async (bucket: string, key: string): Promise<boolean> => {
    const outcome = await store.deleteObject(bucket, key);
    if (outcome.status === 'error') {
      logger.error(`Delete failed for ${key}: ${outcome.code}: ${outcome.message}`);
      return false;
    }
    cache.set(cacheKey(bucket, key), MISSING);
    logger.verbose(`Deleted ${key}`, verbosity);
    return true;
  };

  return {
    validateContainer,
    exists,
    batchExists,
    warmCache,
    list,
    upload,
    delete: deleteObject,
    cacheSize: (): number => cache.size,
  };
}

export type ObjectStoreGateway = ReturnType<typeof createObjectStoreGateway>;
