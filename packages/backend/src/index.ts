import { createApp } from './app.js';
import { config } from './config.js';
import { db } from './db/connection.js';

async function main(): Promise<void> {
  const app = await createApp();

  await app.listen({ port: config.port, host: '0.0.0.0' });
  console.log(`ClaimSentry backend listening on http://0.0.0.0:${config.port}`);

  function shutdown(signal: string) {
    console.log(`Received ${signal}, shutting down gracefully...`);
    Promise.all([app.close(), db.destroy()])
      .then(() => {
        console.log('Server closed.');
        process.exit(0);
      })
      .catch((err: unknown) => {
        console.error('Shutdown failed:', err);
        process.exit(1);
      });
  }

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err) => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
