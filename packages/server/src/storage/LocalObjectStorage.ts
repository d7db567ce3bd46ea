import { createWriteStream, promises as fs, WriteStream } from 'fs';
import { dirname, join } from 'path';
import { finished } from 'stream/promises';
import { randomUUID } from 'crypto';
import { LocalStorageConfig, formatError } from '@bucketfan/shared';
import type { ObjectStorage, ObjectWriter } from './types';

/**
 * Filesystem-backed storage: objects live at `<baseDirectory>/<bucket>/<key>`.
 * Each writer streams into a temporary sibling that is renamed into place on close.
 */
export class LocalObjectStorage implements ObjectStorage {
  private baseDirectory: string;

  constructor(config: Pick<LocalStorageConfig, 'baseDirectory'>) {
    this.baseDirectory = config.baseDirectory;
  }

  async openWriter(bucket: string, key: string, signal: AbortSignal): Promise<ObjectWriter> {
    signal.throwIfAborted();

    const targetPath = this.resolvePath(bucket, key);
    await fs.mkdir(dirname(targetPath), { recursive: true });

    const tempPath = `${targetPath}.${randomUUID()}.partial`;
    return new LocalObjectWriter(targetPath, tempPath, signal);
  }

  destroy(): void {
    // Nothing is pooled
  }

  resolvePath(bucket: string, key: string): string {
    const cleanKey = key.replace(/^\/+/, '');
    if (cleanKey.split('/').some(segment => segment === '..')) {
      throw new Error(`Invalid object key: ${key}`);
    }
    return join(this.baseDirectory, bucket, cleanKey);
  }
}

class LocalObjectWriter implements ObjectWriter {
  private stream: WriteStream;

  constructor(private targetPath: string, private tempPath: string, private signal: AbortSignal) {
    this.stream = createWriteStream(tempPath, { flags: 'wx' });
    // Failures reach callers through write callbacks and finished()
    this.stream.on('error', (error) => {
      console.error(`Local object stream error for ${targetPath}:`, formatError(error));
    });
    signal.addEventListener('abort', this.onAbort, { once: true });
  }

  async write(chunk: string): Promise<void> {
    this.signal.throwIfAborted();
    await new Promise<void>((resolve, reject) => {
      this.stream.write(chunk, error => error ? reject(error) : resolve());
    });
  }

  async close(): Promise<void> {
    try {
      this.signal.throwIfAborted();
      this.stream.end();
      await finished(this.stream);
      await fs.rename(this.tempPath, this.targetPath);
    } catch (error) {
      await this.discard();
      throw error;
    } finally {
      this.signal.removeEventListener('abort', this.onAbort);
    }
  }

  async abort(): Promise<void> {
    this.signal.removeEventListener('abort', this.onAbort);
    await this.discard();
  }

  // The file may still be opening; wait for the descriptor to close before removing it
  private async discard(): Promise<void> {
    if (!this.stream.closed) {
      const closed = new Promise<void>(resolve => this.stream.once('close', () => resolve()));
      this.stream.destroy();
      await closed;
    }
    await fs.rm(this.tempPath, { force: true });
  }

  private onAbort = (): void => {
    const reason: unknown = this.signal.reason;
    this.stream.destroy(reason instanceof Error ? reason : new Error(formatError(reason)));
  };
}
