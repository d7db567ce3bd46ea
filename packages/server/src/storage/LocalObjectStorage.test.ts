import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { DeadlineExceededError } from '@bucketfan/shared';
import { LocalObjectStorage } from './LocalObjectStorage';

describe('LocalObjectStorage', () => {
  let baseDirectory: string;
  let storage: LocalObjectStorage;

  beforeEach(async () => {
    baseDirectory = await fs.mkdtemp(join(tmpdir(), 'bucketfan-'));
    storage = new LocalObjectStorage({ baseDirectory });
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await fs.rm(baseDirectory, { recursive: true, force: true });
  });

  it('makes the object visible only after close', async () => {
    const writer = await storage.openWriter('test-bucket', '20250101T000000/abc', new AbortController().signal);
    const target = join(baseDirectory, 'test-bucket', '20250101T000000', 'abc');

    await writer.write('hello ');
    await writer.write('world');
    await expect(fs.access(target)).rejects.toThrow();

    await writer.close();
    expect(await fs.readFile(target, 'utf8')).toBe('hello world');
    expect(await fs.readdir(join(baseDirectory, 'test-bucket', '20250101T000000'))).toEqual(['abc']);
  });

  it('leaves nothing behind after abort', async () => {
    const writer = await storage.openWriter('test-bucket', 'folder/key', new AbortController().signal);

    await writer.write('partial');
    await writer.abort();

    expect(await fs.readdir(join(baseDirectory, 'test-bucket', 'folder'))).toEqual([]);
  });

  it('refuses to open a writer once the deadline has passed', async () => {
    const controller = new AbortController();
    controller.abort(new DeadlineExceededError(10));

    await expect(storage.openWriter('test-bucket', 'folder/key', controller.signal))
      .rejects.toThrow('deadline of 10ms exceeded');
  });

  it('fails pending finalization when the deadline passes', async () => {
    const controller = new AbortController();
    const writer = await storage.openWriter('test-bucket', 'folder/key', controller.signal);
    await writer.write('data');

    controller.abort(new DeadlineExceededError(10));

    await expect(writer.close()).rejects.toThrow('deadline of 10ms exceeded');
    expect(await fs.readdir(join(baseDirectory, 'test-bucket', 'folder'))).toEqual([]);
  });

  it('rejects keys that climb out of the bucket', () => {
    expect(() => storage.resolvePath('test-bucket', '../escape')).toThrow('Invalid object key: ../escape');
  });
});
