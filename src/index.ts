import { App } from './app.js';
import { ConfigManager } from './config/ConfigManager.js';
import { logger } from './utils/logging.js';
import { getErrorMessage, getErrorStack } from './utils/errorHandling.js';

const configManager = ConfigManager.getInstance();
configManager.validate();

const app = new App(configManager.getConfig());

function shutdown(signal: string, exitCode: number): void {
  logger.info(`Received ${signal}, shutting down gracefully`);
  app
    .stop()
    .then(() => process.exit(exitCode))
    .catch((error: unknown) => {
      logger.error('Failed to shut down gracefully', { error: getErrorMessage(error) });
      process.exit(1);
    });
}

process.on('SIGTERM', () => shutdown('SIGTERM', 0));
process.on('SIGINT', () => shutdown('SIGINT', 0));

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled promise rejection detected', {
    error: getErrorMessage(reason),
    stack: getErrorStack(reason),
  });
  shutdown('unhandledRejection', 1);
});

process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught exception detected', {
    name: error.name,
    message: error.message,
    stack: error.stack,
  });
  shutdown('uncaughtException', 1);
});

app.start().catch((error: unknown) => {
  logger.error('Failed to start application', { error: getErrorMessage(error), stack: getErrorStack(error) });
  process.exit(1);
});
