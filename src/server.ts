import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';
import { createApp } from './infrastructure/http/createApp.js';

const container = new AppContainer();
const { logger } = container;

const server = createApp(container).listen(container.config.server.port, () => {
  logger.info(`Ledger ingest API listening on http://localhost:${container.config.server.port}`, {
    store: container.config.store.path,
  });
});

const shutdown = (signal: NodeJS.Signals) => {
  logger.info('Shutting down', { signal });
  server.close((error) => {
    if (error) {
      logger.error('Server did not close cleanly', { error });
    }
    container.close();
    process.exit(error ? 1 : 0);
  });
};

process.once('SIGINT', shutdown);
process.once('SIGTERM', shutdown);
