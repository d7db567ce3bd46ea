export interface S3StorageConfig {
  provider: 's3';
  bucket: string;
  region: string;
  endpoint?: string;
  forcePathStyle: boolean;
  accessKeyId?: string;
  secretAccessKey?: string;
}

export interface LocalStorageConfig {
  provider: 'local';
  bucket: string;
  baseDirectory: string;
}

export type StorageConfig = S3StorageConfig | LocalStorageConfig;

export interface ServerConfig {
  port: number;
}

export interface AppConfig {
  server: ServerConfig;
  storage: StorageConfig;
  writes: {
    timeoutMs: number;
    objectSize: number;
  };
}

export * from './api';
export * from './jobs';
