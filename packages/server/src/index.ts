import 'dotenv/config';
import { serve } from '@hono/node-server';
import { formatError } from '@bucketfan/shared';
import { ConfigManager } from './config/ConfigManager';
import { createObjectStorage, ObjectStorage } from './storage';
import { WriteCoordinator } from './jobs/WriteCoordinator';
import { createAPIServer } from './api/server';

async function main() {
  console.log('🚀 Starting bucketfan');

  let config: ConfigManager;
  try {
    config = new ConfigManager();
  } catch (error) {
    console.error(`❌ ${formatError(error)}`);
    process.exit(1);
  }

  const storageConfig = config.getStorageConfig();
  const { port } = config.getServerConfig();
  console.log(`🪣 Writing to bucket '${storageConfig.bucket}' (${storageConfig.provider})`);

  let storage: ObjectStorage;
  try {
    storage = createObjectStorage(storageConfig);
  } catch (error) {
    console.error(`❌ Failed to create storage client: ${formatError(error)}`);
    process.exit(1);
  }

  const coordinator = new WriteCoordinator(storage, storageConfig.bucket, config.getWriteConfig());
  const app = createAPIServer({ coordinator });

  // Graceful shutdown handling
  let shutdownInProgress = false;

  const shutdown = (signal: string) => {
    if (shutdownInProgress) {
      console.log('\nForced shutdown!');
      process.exit(1);
    }

    shutdownInProgress = true;
    console.log(`\nReceived ${signal}, shutting down...`);

    const shutdownTimeout = setTimeout(() => {
      console.log('\nShutdown timeout exceeded, forcing exit');
      process.exit(1);
    }, 5000);

    server.close((error) => {
      clearTimeout(shutdownTimeout);
      storage.destroy();
      if (error) {
        console.error('Error during shutdown:', error);
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  console.log(`Starting HTTP server on port ${port}...`);
  const server = serve({
    fetch: app.fetch,
    port
  }, (info) => {
    console.log(`✅ Listening on http://localhost:${info.port}`);
    console.log(`Health check: http://localhost:${info.port}/health`);
  });
}

export { ConfigManager } from './config/ConfigManager';
export { WriteCoordinator, writeObject } from './jobs';
export { createAPIServer } from './api/server';
export * from './storage';
export * from './generator/ObjectGenerator';

if (require.main === module) {
  main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
