import { PassThrough } from 'stream';
import { S3Client } from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';
import { S3StorageConfig, formatError } from '@bucketfan/shared';
import type { ObjectStorage, ObjectWriter } from './types';

export class S3ObjectStorage implements ObjectStorage {
  private client: S3Client;

  constructor(config: S3StorageConfig, client?: S3Client) {
    this.client = client ?? new S3Client({
      region: config.region,
      endpoint: config.endpoint,
      forcePathStyle: config.forcePathStyle,
      credentials: config.accessKeyId && config.secretAccessKey
        ? { accessKeyId: config.accessKeyId, secretAccessKey: config.secretAccessKey }
        : undefined
    });
  }

  async openWriter(bucket: string, key: string, signal: AbortSignal): Promise<ObjectWriter> {
    signal.throwIfAborted();
    return new S3ObjectWriter(this.client, bucket, key, signal);
  }

  destroy(): void {
    this.client.destroy();
  }
}

class S3ObjectWriter implements ObjectWriter {
  private body = new PassThrough();
  private upload: Upload;
  private completion: Promise<void>;

  constructor(client: S3Client, bucket: string, private key: string, private signal: AbortSignal) {
    this.upload = new Upload({
      client,
      params: {
        Bucket: bucket,
        Key: key,
        Body: this.body,
        ContentType: 'text/plain; charset=utf-8'
      }
    });

    this.completion = this.upload.done().then(() => undefined);
    // close() rethrows the failure; meanwhile unblock any pending write
    this.completion.catch((error: unknown) => {
      this.body.destroy(toError(error));
    });

    signal.addEventListener('abort', this.onAbort, { once: true });
  }

  async write(chunk: string): Promise<void> {
    this.signal.throwIfAborted();
    await new Promise<void>((resolve, reject) => {
      this.body.write(chunk, error => error ? reject(error) : resolve());
    });
  }

  async close(): Promise<void> {
    try {
      this.signal.throwIfAborted();
      this.body.end();
      await this.completion;
    } finally {
      this.signal.removeEventListener('abort', this.onAbort);
    }
  }

  async abort(): Promise<void> {
    this.signal.removeEventListener('abort', this.onAbort);
    this.body.destroy();
    await this.upload.abort();
  }

  private onAbort = (): void => {
    this.body.destroy(toError(this.signal.reason));
    this.upload.abort().catch((error: unknown) => {
      console.error(`Failed to abort upload for ${this.key}:`, formatError(error));
    });
  };
}

function toError(reason: unknown): Error {
  return reason instanceof Error ? reason : new Error(formatError(reason));
}
