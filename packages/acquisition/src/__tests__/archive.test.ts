import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { DownloadArchive } from '../archive.js';
import { createTempDir, removeTempDir } from './helpers.js';

describe('DownloadArchive', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should start empty when the file does not exist', async () => {
    const archive = await DownloadArchive.open(join(dir, 'archive.txt'));

    expect(archive.size).toBe(0);
    expect(archive.isEmpty).toBe(true);
    expect(archive.enabled).toBe(true);
    expect(archive.contains('abc')).toBe(false);
  });

  it('should load one id per line and ignore blank lines', async () => {
    const path = join(dir, 'archive.txt');
    await writeFile(path, 'abc\n\n  def  \r\nghi\n');

    const archive = await DownloadArchive.open(path);

    expect(archive.size).toBe(3);
    expect(archive.contains('def')).toBe(true);
    expect(archive.contains('ghi')).toBe(true);
  });

  it('should append each id once', async () => {
    const path = join(dir, 'archive.txt');
    const archive = await DownloadArchive.open(path);

    await archive.add('abc');
    await archive.add('abc');

    expect(archive.size).toBe(1);
    expect(await readFile(path, 'utf8')).toBe('abc\n');
  });

  it('should keep every concurrent append', async () => {
    const path = join(dir, 'archive.txt');
    const archive = await DownloadArchive.open(path);

    await Promise.all(['a', 'b', 'c', 'b', 'd'].map(id => archive.add(id)));

    const lines = (await readFile(path, 'utf8')).split('\n').filter(Boolean);
    expect(lines.sort()).toEqual(['a', 'b', 'c', 'd']);
  });

  it('should survive a reopen', async () => {
    const path = join(dir, 'nested', 'archive.txt');
    const first = await DownloadArchive.open(path);
    await first.add('abc');
    await first.add('def');

    const second = await DownloadArchive.open(path);

    expect(second.size).toBe(2);
    expect(second.contains('abc')).toBe(true);
    expect(second.contains('def')).toBe(true);
  });

  it('should work in memory without a path', async () => {
    const archive = new DownloadArchive();

    await archive.add('abc');

    expect(archive.enabled).toBe(false);
    expect(archive.path).toBeNull();
    expect(archive.contains('abc')).toBe(true);
  });

  it('should reject entries that would break the file format', async () => {
    const archive = new DownloadArchive();

    await expect(archive.add('a\nb')).rejects.toThrow(RangeError);
    await expect(archive.add('   ')).rejects.toThrow(RangeError);
  });
});
