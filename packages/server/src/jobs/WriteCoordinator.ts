import {
  BucketfanError,
  DeadlineExceededError,
  WriteJobOptions,
  WriteOutcome,
  WriteSummary,
  elapsedSince,
  formatDuration
} from '@bucketfan/shared';
import { setMaxListeners } from 'events';
import { generateObjectKey, generateRandomString } from '../generator/ObjectGenerator';
import type { ObjectStorage } from '../storage/types';
import { writeObject } from './writeObject';

export const DEFAULT_WRITE_OPTIONS: WriteJobOptions = {
  timeoutMs: 60_000,
  objectSize: 1024
};

/**
 * Fans one request out into `count` concurrent object writes sharing a single
 * deadline, then folds every outcome into a summary.
 */
export class WriteCoordinator {
  private options: WriteJobOptions;

  constructor(
    private storage: ObjectStorage,
    private bucket: string,
    options: Partial<WriteJobOptions> = {}
  ) {
    this.options = { ...DEFAULT_WRITE_OPTIONS, ...options };
  }

  getBucketName(): string {
    return this.bucket;
  }

  async run(count: number): Promise<WriteSummary> {
    if (!Number.isInteger(count) || count <= 0) {
      throw new BucketfanError(`count must be a positive integer, got ${count}`, 'INVALID_COUNT', { count });
    }

    console.log(`Received request to create ${count} objects in bucket '${this.bucket}'`);

    const { timeoutMs } = this.options;
    const controller = new AbortController();
    // Every in-flight writer listens on the shared signal
    setMaxListeners(count, controller.signal);
    const deadline = setTimeout(() => controller.abort(new DeadlineExceededError(timeoutMs)), timeoutMs);

    // Tasks only append here once they settle, so the list ends up in completion order
    const outcomes: WriteOutcome[] = [];
    const startedAt = process.hrtime.bigint();

    try {
      await Promise.all(
        Array.from({ length: count }, () =>
          this.dispatch(controller.signal).then(outcome => {
            outcomes.push(outcome);
          })
        )
      );
    } catch (error) {
      // Only key/content generation can throw; stop whatever is still in flight
      controller.abort(error);
      throw error;
    } finally {
      clearTimeout(deadline);
    }

    const elapsedNs = elapsedSince(startedAt);
    const errors = outcomes.flatMap((outcome): string[] => outcome.ok ? [] : [outcome.error]);
    const summary: WriteSummary = {
      requested: count,
      objectsWritten: count - errors.length,
      elapsedNs,
      errors
    };

    console.log(
      `Wrote ${summary.objectsWritten}/${count} objects to '${this.bucket}' in ${formatDuration(elapsedNs)}` +
      (errors.length > 0 ? ` (${errors.length} failed)` : '')
    );
    return summary;
  }

  private async dispatch(signal: AbortSignal): Promise<WriteOutcome> {
    const key = generateObjectKey();
    const content = generateRandomString(this.options.objectSize);
    return writeObject(this.storage, this.bucket, key, content, signal);
  }
}
