/**
 * A streaming write handle for one object. `close` commits the object;
 * after a failed write the handle is discarded with `abort`.
 */
export interface ObjectWriter {
  write(chunk: string): Promise<void>;
  close(): Promise<void>;
  abort(): Promise<void>;
}

export interface ObjectStorage {
  /**
   * Opens a writer for `key` in `bucket`. Once `signal` aborts, pending and
   * later calls on the writer reject with the signal's reason.
   */
  openWriter(bucket: string, key: string, signal: AbortSignal): Promise<ObjectWriter>;
  destroy(): void;
}
