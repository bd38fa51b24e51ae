import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createOrphanPruner } from './orphan-pruner';
import { createObjectStoreGateway } from '../storage/object-store-gateway';
import {
  captureOutput,
  createInMemoryObjectStore,
} from '../../../test-config/mocks/test-helpers';

describe('createOrphanPruner', () => {
  let output: ReturnType<typeof captureOutput>;

  beforeEach(() => {
    output = captureOutput();
  });

  afterEach(() => {
    output.restore();
  });

  const remoteObjects = {
    'backup/a.txt': 5,
    'backup/old.jpg': 3,
    'backup/sub/older.jpg': 4,
    'backup/sub/Thumbs.db': 1,
    'backup2/unrelated.jpg': 7,
    'elsewhere.txt': 2,
  };

  it('should list only unmatched keys under the prefix', async () => {
    const fake = createInMemoryObjectStore({ objects: remoteObjects });
    const pruner = createOrphanPruner({
      gateway: createObjectStoreGateway(fake.client),
      bucket: 'test-bucket',
      prefix: 'backup',
      excludePatterns: ['Thumbs.db'],
    });

    const orphans = await pruner.findOrphans(new Set(['backup/a.txt']));

    expect(orphans).toEqual(['backup/old.jpg', 'backup/sub/older.jpg']);
  });

  it('should delete orphans and count them', async () => {
    const fake = createInMemoryObjectStore({ objects: remoteObjects });
    const pruner = createOrphanPruner({
      gateway: createObjectStoreGateway(fake.client),
      bucket: 'test-bucket',
      prefix: 'backup',
      excludePatterns: ['Thumbs.db'],
      maxConcurrency: 2,
    });

    const stats = await pruner.prune(new Set(['backup/a.txt']));

    expect(stats.filesDeleted).toBe(2);
    expect(stats.deleteFailures).toBe(0);
    expect(Object.keys(fake.snapshot()).sort()).toEqual([
      'backup/a.txt',
      'backup/sub/Thumbs.db',
      'backup2/unrelated.jpg',
      'elsewhere.txt',
    ]);
  });

  it('should count failed deletes', async () => {
    const fake = createInMemoryObjectStore({ objects: remoteObjects });
    fake.failDelete('backup/old.jpg');
    const pruner = createOrphanPruner({
      gateway: createObjectStoreGateway(fake.client),
      bucket: 'test-bucket',
      prefix: 'backup',
      excludePatterns: ['Thumbs.db'],
    });

    const stats = await pruner.prune(new Set(['backup/a.txt']));

    expect(stats.filesDeleted).toBe(1);
    expect(stats.deleteFailures).toBe(1);
    expect(fake.objects.has('backup/old.jpg')).toBe(true);
  });

  it('should only report deletions in dry-run mode', async () => {
    const fake = createInMemoryObjectStore({ objects: remoteObjects });
    const before = fake.snapshot();
    const pruner = createOrphanPruner({
      gateway: createObjectStoreGateway(fake.client),
      bucket: 'test-bucket',
      prefix: 'backup',
      dryRun: true,
    });

    const stats = await pruner.prune(new Set(['backup/a.txt']));

    expect(stats.filesDeleted).toBe(3);
    expect(fake.calls.deleteObject).toBe(0);
    expect(fake.snapshot()).toEqual(before);
    expect(output.text()).toContain('[DRY RUN] Would delete backup/old.jpg');
  });

  it('should do nothing when every remote key has a local file', async () => {
    const fake = createInMemoryObjectStore({ objects: { 'a.txt': 5 } });
    const pruner = createOrphanPruner({
      gateway: createObjectStoreGateway(fake.client),
      bucket: 'test-bucket',
      prefix: '',
    });

    const stats = await pruner.prune(new Set(['a.txt']));

    expect(stats.filesDeleted).toBe(0);
    expect(fake.calls.deleteObject).toBe(0);
  });

  it('should stop deleting once cancelled', async () => {
    const fake = createInMemoryObjectStore({ objects: remoteObjects });
    const controller = new AbortController();
    controller.abort();
    const pruner = createOrphanPruner({
      gateway: createObjectStoreGateway(fake.client),
      bucket: 'test-bucket',
      prefix: 'backup',
      signal: controller.signal,
    });

    const stats = await pruner.prune(new Set());

    expect(stats.filesDeleted).toBe(0);
    expect(stats.deleteFailures).toBe(0);
    expect(fake.calls.deleteObject).toBe(0);
  });
});
