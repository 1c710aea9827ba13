import { createServer } from 'http';
import { applySchema, closePool, getPool } from '@relief-router/adapters';
import { buildApp } from './app.js';
import { loadConfig } from './config/env.js';

async function main() {
  const config = loadConfig();

  // Verify DB connection
  await getPool().query('SELECT 1');
  console.log('[server] database connected');

  if (config.DB_AUTO_MIGRATE) {
    await applySchema();
  }

  const app = buildApp(undefined, config);
  const httpServer = createServer(app);

  httpServer.listen(config.PORT, () => {
    console.log(`[server] listening on http://0.0.0.0:${config.PORT}`);
  });

  const shutdown = async () => {
    console.log('[server] shutting down...');
    httpServer.close();
    await closePool();
    process.exit(0);
  };

  process.on('SIGTERM', () => {
    shutdown().catch((err) => {
      console.error('[server] shutdown error', err);
      process.exit(1);
    });
  });
  process.on('SIGINT', () => {
    shutdown().catch((err) => {
      console.error('[server] shutdown error', err);
      process.exit(1);
    });
  });
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
