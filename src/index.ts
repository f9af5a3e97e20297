import { App } from './app.js';
import { ConfigManager } from './config/ConfigManager.js';
import { initializeLogger, logger } from './middleware/logging.js';

const config = ConfigManager.getInstance().getConfig();
initializeLogger(config.logging);

const app = new App(config);

function shutdown(exitCode: number): void {
  app
    .stop()
    .then(() => process.exit(exitCode))
    .catch(shutdownError => {
      logger.error('Failed to gracefully shutdown', { shutdownError });
      process.exit(1);
    });
}

// Graceful shutdown handling
process.on('SIGTERM', () => {
  logger.info('Received SIGTERM signal, shutting down gracefully');
  shutdown(0);
});

process.on('SIGINT', () => {
  logger.info('Received SIGINT signal, shutting down gracefully');
  shutdown(0);
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled promise rejection detected - this indicates a bug that must be fixed', {
    reason: reason instanceof Error ? {
      name: reason.name,
      message: reason.message,
      stack: reason.stack,
    } : reason,
  });
  shutdown(1);
});

process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught exception detected - this indicates a bug that must be fixed', {
    name: error.name,
    message: error.message,
    stack: error.stack,
  });
  shutdown(1);
});

// Start the application
app.start().catch(error => {
  logger.error('Failed to start application', { error });
  process.exit(1);
});
