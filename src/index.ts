import { createApp, SERVICE_NAME } from './app.js';
import { ConfigError, loadConfig } from './config.js';
import { Logger } from './logger.js';
import { InMemoryStringStore } from './store.js';

function main(): void {
  const config = loadConfig();
  const logger = new Logger({ namespace: 'string-facets', minLevel: config.logLevel });

  const app = createApp({
    store: new InMemoryStringStore(),
    logger: logger.child('http'),
    cors: config.corsEnabled,
    bodyLimit: config.bodyLimit,
  });

  const server = app.listen(config.port, config.host, () => {
    logger.info(`${SERVICE_NAME} listening at http://${config.host}:${config.port}`);
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down`);
    server.close(err => {
      if (err) {
        logger.error('Error while closing server', err);
        process.exitCode = 1;
      }
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

try {
  main();
} catch (err) {
  if (err instanceof ConfigError) {
    console.error(err.message);
    process.exit(1);
  }
  throw err;
}
