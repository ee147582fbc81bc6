/**
 * HTTP entrypoint.
 *
 * Run: npx tsx src/server.ts
 */

import { buildApp } from './app.js';
import { env } from './config/env.js';

async function main() {
  const app = buildApp();

  const shutdown = (signal: string) => {
    app.log.info(`[BOOT] ${signal} received, closing`);
    app.close()
      .then(() => process.exit(0))
      .catch((err) => {
        console.error('[BOOT] Shutdown failed:', err);
        process.exit(1);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await app.listen({ port: env.PORT, host: env.HOST });
}

main().catch((err) => {
  console.error('[BOOT] Fatal:', err);
  process.exit(1);
});
