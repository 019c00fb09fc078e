import { buildApp } from './app.js';
import { loadConfig } from './infrastructure/config.js';
import { createLogger } from './infrastructure/logger.js';

/**
 * Bootstrap the HTTP server.
 *
 * Config → logger → app → listen. SIGINT/SIGTERM close the server,
 * which runs the plugins' onClose hooks and releases the pool.
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const log = createLogger(config);

  const fastify = await buildApp(config, log);

  const shutdown = (signal: string): void => {
    log.info({ signal }, 'Shutting down server...');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await fastify.listen({
    host: config.http.host,
    port: config.http.port,
  });
}

main().catch((err: unknown) => {

  console.error(
    'Fatal: failed to start server',
    err,
  );

  process.exit(1);

});
