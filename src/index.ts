import { createApp, createServices } from './app';
import { getConfig } from './config';
import { PgDataStore } from './repositories/postgres';
import { DocumentStorage } from './services/storage/document-storage.service';
import { closeDbConnection, testConnection } from './utils/database';

const sweepStagedDocuments = (storage: DocumentStorage, maxAgeMs: number): void => {
  storage.sweepStaging(maxAgeMs).catch((error: unknown) => {
    console.error('Error sweeping staged documents:', error);
  });
};

const bootstrap = async (): Promise<void> => {
  const config = getConfig();
  await testConnection();

  const storage = new DocumentStorage(config.uploads.rootDir, config.uploads.publicPrefix);
  const app = createApp(createServices(new PgDataStore(), storage, config), config);

  await storage.sweepStaging(config.uploads.stagingMaxAgeMs);
  const sweepTimer = setInterval(
    () => sweepStagedDocuments(storage, config.uploads.stagingMaxAgeMs),
    config.uploads.sweepIntervalMs
  );
  sweepTimer.unref();

  const server = app.listen(config.port, () => {
    console.log(`🚀 Server running on port ${config.port} (${config.env})`);
    console.log(`📂 Serving documents from ${config.uploads.rootDir}`);
  });

  const shutdown = (signal: string): void => {
    console.log(`🛑 ${signal} received, shutting down...`);
    clearInterval(sweepTimer);
    server.close(() => {
      closeDbConnection()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error('❌ Error closing database connection:', error);
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
};

bootstrap().catch((error: unknown) => {
  console.error('❌ Failed to start server:', error);
  process.exit(1);
});
