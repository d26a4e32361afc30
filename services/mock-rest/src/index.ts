import { config } from './config';
import { buildApp } from './server';

/**
 * Main entrypoint for the mock REST server.
 * Builds the app with logging enabled and listens on the configured host/port.
 */
async function main() {
  const app = await buildApp({ logger: { level: config.logLevel }, config });

  const shutdown = (signal: NodeJS.Signals) => {
    app.log.info({ signal }, 'Shutting down mock REST server');
    app
      .close()
      .then(() => process.exit(0))
      .catch((err) => {
        app.log.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  // --- Start server ---
  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`Mock REST server listening on http://${config.host}:${config.port}`);
  } catch (err) {
    app.log.error({ err }, 'Server startup failed');
    process.exit(1);
  }
}

// run
main().catch((err) => {
  // last-resort catch for any uncaught promise
  console.error('Fatal error starting mock REST server:', err);
  process.exit(1);
});
