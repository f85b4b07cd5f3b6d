/**
 * Application Entry Point
 *
 * Starts the Express HTTP server in a single process.
 *
 * Startup:
 * 1. Load configuration from the environment (fails fast on missing values)
 * 2. Build the application context (Firestore, mailbox registry, services)
 * 3. Start Express server on configured port
 *
 * Shutdown (SIGTERM/SIGINT):
 * 1. Stop accepting new HTTP connections, let in-flight requests finish
 * 2. Terminate the Firestore client
 * 3. Exit process
 *
 * Usage:
 *   Production: node dist/index.js
 *   Development: npx tsx src/index.ts
 */

import { loadConfig } from './config.js';
import { createAppContext } from './context.js';
import { errorMessage } from './errors.js';
import { createApp } from './http/server.js';

async function main() {
  const config = loadConfig();
  console.log('[startup] Outbound mail service starting...');
  console.log('[startup] Environment:', config.isDev ? 'development' : 'production');
  console.log('[startup] Features:', {
    tracking: config.features.tracking,
    autoFollowup: config.features.autoFollowup,
    appendSignature: config.features.appendSignature,
    defaultSendMode: config.features.defaultSendMode,
  });

  const ctx = createAppContext(config);
  const app = createApp(ctx);
  const server = app.listen(config.server.port, () => {
    console.log(`[startup] Server listening on port ${config.server.port}`);
  });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`[shutdown] Received ${signal}, shutting down gracefully...`);

    await new Promise<void>(resolve => {
      server.close(() => resolve());
    });
    console.log('[shutdown] HTTP server closed');

    await ctx.firestore.terminate();
    console.log('[shutdown] Firestore client terminated');

    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      console.error('[shutdown] Failed:', errorMessage(err));
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}

main().catch((err: unknown) => {
  console.error('[startup] Fatal error:', errorMessage(err));
  process.exit(1);
});
