import { StorageConfig } from '@bucketfan/shared';
import { LocalObjectStorage } from './LocalObjectStorage';
import { S3ObjectStorage } from './S3ObjectStorage';
import type { ObjectStorage } from './types';

export function createObjectStorage(config: StorageConfig): ObjectStorage {
  switch (config.provider) {
    case 's3':
      return new S3ObjectStorage(config);
    case 'local':
      return new LocalObjectStorage(config);
  }
}

export { LocalObjectStorage } from './LocalObjectStorage';
export { S3ObjectStorage } from './S3ObjectStorage';
export type { ObjectStorage, ObjectWriter } from './types';
