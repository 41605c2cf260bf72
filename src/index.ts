import { Server } from 'http';
import { appConfig } from './config';
import { createApp } from './app';
import { cardRepositoryService } from './services/repository';
import { logger } from './utils/logger';

let server: Server | undefined;

const startServer = async () => {
  try {
    await cardRepositoryService.initialize();

    const app = createApp(cardRepositoryService);
    server = app.listen(appConfig.port, () => {
      logger.info(`Server running in ${appConfig.env} mode on port ${appConfig.port}`);
    });
  } catch (error) {
    logger.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
};

const shutdown = async (signal: string) => {
  logger.info(`${signal} received. Shutting down gracefully`);
  await cardRepositoryService.close();
  if (server) {
    server.close(() => process.exit(0));
  } else {
    process.exit(0);
  }
};

// Handle unhandled promise rejections
process.on('unhandledRejection', (err: unknown) => {
  logger.error(`Unhandled rejection: ${err instanceof Error ? err.message : String(err)}`);
  if (server) {
    server.close(() => process.exit(1));
  } else {
    process.exit(1);
  }
});

// Handle uncaught exceptions
process.on('uncaughtException', (err: unknown) => {
  logger.error(`Uncaught exception: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});
process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

// Start the server
void startServer();
