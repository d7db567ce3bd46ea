import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { ObjectStorage } from '../storage/types';
import { FakeObjectStorage } from '../../test/helpers/FakeObjectStorage';
import { writeObject } from './writeObject';

const KEY = '20250101T000000/00112233445566778899aabbccddeeff';

describe('writeObject', () => {
  let signal: AbortSignal;

  beforeEach(() => {
    signal = new AbortController().signal;
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  it('commits the content and reports success', async () => {
    const storage = new FakeObjectStorage();

    const outcome = await writeObject(storage, 'test-bucket', KEY, 'hello', signal);

    expect(outcome).toEqual({ ok: true, key: KEY });
    expect(storage.committed.get(KEY)).toBe('hello');
  });

  it('reports a write failure when the writer cannot be opened', async () => {
    const storage = new FakeObjectStorage(() => 'fail-open');

    const outcome = await writeObject(storage, 'test-bucket', KEY, 'hello', signal);

    expect(outcome).toEqual({
      ok: false,
      key: KEY,
      stage: 'write',
      error: `failed to write to object ${KEY}: bucket test-bucket unavailable`
    });
    expect(storage.aborted).toEqual([]);
  });

  it('aborts the writer after a failed write', async () => {
    const storage = new FakeObjectStorage(() => 'fail-write');

    const outcome = await writeObject(storage, 'test-bucket', KEY, 'hello', signal);

    expect(outcome).toEqual({
      ok: false,
      key: KEY,
      stage: 'write',
      error: `failed to write to object ${KEY}: connection reset`
    });
    expect(storage.aborted).toEqual([KEY]);
    expect(storage.committed.has(KEY)).toBe(false);
  });

  it('keeps the write error when the abort fails as well', async () => {
    const storage: ObjectStorage = {
      openWriter: async () => ({
        write: async () => { throw new Error('socket hang up'); },
        close: async () => undefined,
        abort: async () => { throw new Error('abort rejected'); }
      }),
      destroy: () => undefined
    };

    const outcome = await writeObject(storage, 'test-bucket', KEY, 'hello', signal);

    expect(outcome).toEqual({
      ok: false,
      key: KEY,
      stage: 'write',
      error: `failed to write to object ${KEY}: socket hang up`
    });
  });

  it('reports a finalize failure when close fails', async () => {
    const storage = new FakeObjectStorage(() => 'fail-close');

    const outcome = await writeObject(storage, 'test-bucket', KEY, 'hello', signal);

    expect(outcome).toEqual({
      ok: false,
      key: KEY,
      stage: 'finalize',
      error: `failed to close object writer for ${KEY}: precondition failed`
    });
  });
});
