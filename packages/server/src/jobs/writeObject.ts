import { WriteOutcome, WriteStage, formatError } from '@bucketfan/shared';
import type { ObjectStorage, ObjectWriter } from '../storage/types';

/**
 * Streams one object to storage. Resolves with a failure outcome instead of
 * rejecting, so sibling writes are never affected.
 */
export async function writeObject(
  storage: ObjectStorage,
  bucket: string,
  key: string,
  content: string,
  signal: AbortSignal
): Promise<WriteOutcome> {
  let writer: ObjectWriter;
  try {
    writer = await storage.openWriter(bucket, key, signal);
  } catch (error) {
    return failure(key, 'write', `failed to write to object ${key}: ${formatError(error)}`);
  }

  try {
    await writer.write(content);
  } catch (error) {
    await abortQuietly(writer, key);
    return failure(key, 'write', `failed to write to object ${key}: ${formatError(error)}`);
  }

  try {
    await writer.close();
  } catch (error) {
    return failure(key, 'finalize', `failed to close object writer for ${key}: ${formatError(error)}`);
  }

  console.log(`Successfully created object: ${key}`);
  return { ok: true, key };
}

function failure(key: string, stage: WriteStage, error: string): WriteOutcome {
  console.error(error);
  return { ok: false, key, stage, error };
}

// The write error is the one reported
async function abortQuietly(writer: ObjectWriter, key: string): Promise<void> {
  try {
    await writer.abort();
  } catch (error) {
    console.warn(`Ignoring abort failure for ${key}: ${formatError(error)}`);
  }
}
