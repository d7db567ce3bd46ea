import { resolve } from 'path';
import {
  AppConfig,
  AppConfigSchema,
  ConfigurationError,
  ServerConfig,
  StorageConfig,
  validateConfig
} from '@bucketfan/shared';

export const DEFAULT_PORT = 8080;
export const DEFAULT_LOCAL_STORAGE_DIR = './data/storage';

type Env = Record<string, string | undefined>;

/**
 * Reads service settings from environment variables. `BUCKET_NAME` is the only
 * required one; construction throws a ConfigurationError when it is missing or
 * any other value fails validation.
 */
export class ConfigManager {
  private config: AppConfig;

  constructor(env: Env = process.env) {
    this.config = validateConfig(AppConfigSchema, ConfigManager.fromEnv(env));
  }

  getServerConfig(): ServerConfig {
    return this.config.server;
  }

  getStorageConfig(): StorageConfig {
    return this.config.storage;
  }

  getWriteConfig(): AppConfig['writes'] {
    return this.config.writes;
  }

  getBucketName(): string {
    return this.config.storage.bucket;
  }

  private static fromEnv(env: Env): unknown {
    const read = (name: string): string | undefined => {
      const value = env[name]?.trim();
      return value ? value : undefined;
    };

    const provider = read('STORAGE_PROVIDER') ?? 's3';
    const bucket = read('BUCKET_NAME');
    if (!bucket) {
      throw new ConfigurationError('BUCKET_NAME environment variable not set');
    }

    const storage = provider === 'local'
      ? {
          provider,
          bucket,
          baseDirectory: resolve(read('LOCAL_STORAGE_DIR') ?? DEFAULT_LOCAL_STORAGE_DIR)
        }
      : {
          provider,
          bucket,
          region: read('STORAGE_REGION'),
          endpoint: read('STORAGE_ENDPOINT'),
          forcePathStyle: read('STORAGE_FORCE_PATH_STYLE') === 'true',
          accessKeyId: read('STORAGE_ACCESS_KEY_ID'),
          secretAccessKey: read('STORAGE_SECRET_ACCESS_KEY')
        };

    return {
      server: {
        port: toInteger(read('PORT')) ?? DEFAULT_PORT
      },
      storage,
      writes: {
        timeoutMs: toInteger(read('WRITE_TIMEOUT_MS')) ?? 60_000,
        objectSize: toInteger(read('OBJECT_SIZE')) ?? 1024
      }
    };
  }
}

// Non-numeric text is passed through so validation reports it
function toInteger(value: string | undefined): number | string | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isNaN(parsed) ? value : parsed;
}
