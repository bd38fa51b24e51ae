/**
 * Tests for createFileScanner factory function
 */

import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createFileScanner } from './file-scanner';
import { Verbosity } from '../interfaces/logger';
import {
  captureOutput,
  createTempTree,
  removeTempTree,
} from '../../test-config/mocks/test-helpers';

function relativeKeys(files: Array<{ relativeKey: string }>): string[] {
  return files.map((file) => file.relativeKey).sort();
}

describe('createFileScanner', () => {
  let root: string;
  let output: ReturnType<typeof captureOutput>;

  beforeEach(() => {
    output = captureOutput();
    root = createTempTree({
      'a.txt': 'hello',
      'sub/b.jpg': 'hi',
      'sub/deeper/c.dng': 'raw data',
      'Thumbs.db': 'x',
      'sub/cache.tmp': 'y',
    });
  });

  afterEach(() => {
    output.restore();
    removeTempTree(root);
  });

  it('should find every regular file recursively', async () => {
    const scanner = createFileScanner(root);
    const result = await scanner.scan();

    expect(relativeKeys(result.files)).toEqual([
      'Thumbs.db',
      'a.txt',
      path.join('sub', 'b.jpg'),
      path.join('sub', 'cache.tmp'),
      path.join('sub', 'deeper', 'c.dng'),
    ]);
    expect(result.unreadableDirectories).toEqual([]);
  });

  it('should record absolute local paths', async () => {
    const scanner = createFileScanner(root);
    const result = await scanner.scan();
    const record = result.files.find((file) => file.relativeKey === 'a.txt');

    expect(record?.localPath).toBe(path.join(path.resolve(root), 'a.txt'));
    expect(record?.size).toBeUndefined();
  });

  it('should drop files matching exclusion patterns by base name', async () => {
    const scanner = createFileScanner(root, {
      excludePatterns: ['Thumbs.db', '*.tmp'],
    });
    const result = await scanner.scan();

    expect(relativeKeys(result.files)).toEqual([
      'a.txt',
      path.join('sub', 'b.jpg'),
      path.join('sub', 'deeper', 'c.dng'),
    ]);
    expect(result.excludedCount).toBe(2);
  });

  it('should not match exclusion patterns against directory names', async () => {
    const scanner = createFileScanner(root, { excludePatterns: ['sub'] });
    const result = await scanner.scan();

    expect(result.files).toHaveLength(5);
  });

  it('should match exclusion patterns case-sensitively', async () => {
    const scanner = createFileScanner(root, { excludePatterns: ['thumbs.db'] });
    const result = await scanner.scan();

    expect(relativeKeys(result.files)).toContain('Thumbs.db');
  });

  it('should return an empty result for a missing root', async () => {
    const scanner = createFileScanner(path.join(root, 'does-not-exist'));
    const result = await scanner.scan();

    expect(result.files).toEqual([]);
    expect(output.text()).toContain('Directory does not exist');
  });

  it('should skip unreadable directories and keep scanning', async () => {
    const realReaddir = fs.readdirSync;
    vi.spyOn(fs, 'readdirSync')
      .mockImplementationOnce(realReaddir)
      .mockImplementationOnce(() => {
        throw new Error('EACCES: permission denied');
      });

    const flat = createTempTree({ 'top.txt': 'a', 'locked/inner.txt': 'b' });
    try {
      const scanner = createFileScanner(flat, { verbosity: Verbosity.Normal });
      const result = await scanner.scan();

      expect(relativeKeys(result.files)).toEqual(['top.txt']);
      expect(result.unreadableDirectories).toEqual([
        path.join(path.resolve(flat), 'locked'),
      ]);
      expect(output.text()).toContain('Skipping unreadable directory');
    } finally {
      removeTempTree(flat);
    }
  });

  it('should follow symlinks to files but not to directories', async () => {
    fs.symlinkSync(path.join(root, 'a.txt'), path.join(root, 'link.txt'));
    fs.symlinkSync(path.join(root, 'sub'), path.join(root, 'linked-dir'));
    fs.symlinkSync(path.join(root, 'gone.txt'), path.join(root, 'broken.txt'));

    const scanner = createFileScanner(root, { excludePatterns: ['*.tmp'] });
    const result = await scanner.scan();

    expect(relativeKeys(result.files)).toEqual([
      'Thumbs.db',
      'a.txt',
      'link.txt',
      path.join('sub', 'b.jpg'),
      path.join('sub', 'deeper', 'c.dng'),
    ]);
  });
});
