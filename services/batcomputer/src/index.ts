import { config } from './config';
import { buildApp } from './server';

/**
 * Main entrypoint for the Batcomputer API.
 * Builds the app with logging on and listens on the configured host/port.
 */
async function main() {
  const app = await buildApp({ logger: true });

  // --- Graceful shutdown: lets queued background jobs finish ---
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, 'Shutting down');
      app
        .close()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          app.log.error({ err }, 'Shutdown failed');
          process.exit(1);
        });
    });
  }

  // --- Start server ---
  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`${config.title} v${config.version} listening on http://${config.host}:${config.port}`);
  } catch (err) {
    app.log.error({ err }, 'Server startup failed');
    process.exit(1);
  }
}

// run
main().catch((err) => {
  // last-resort catch for any uncaught promise
  console.error('Fatal error starting Batcomputer API:', err);
  process.exit(1);
});
