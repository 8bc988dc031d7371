/**
 * ESMP server entry point — HTTP API plus the TCP envelope listener over one database.
 */

import { createHttpServer, VERSION } from './app.js';
import { loadConfig } from './config.js';
import { initializeDatabase, closeDb } from './db.js';
import { EsmpListener } from './listener.js';

// Initialize database and start servers
if (
  process.argv[1] &&
  import.meta.url.endsWith(process.argv[1].replace(/.*\//, ''))
) {
  const config = loadConfig();
  const db = initializeDatabase(config.dbPath);
  console.log(`Database initialized at ${config.dbPath}`);

  const ctx = { db, config };
  const server = createHttpServer(ctx);
  const listener = new EsmpListener(ctx);

  server.listen(config.port, config.host, () => {
    console.log(`ESMP server v${VERSION} HTTP listening on ${config.host}:${config.port}`);
  });

  listener.listen(config.esmpPort, config.host).then(
    (port) => console.log(`ESMP envelope listener on ${config.host}:${port}`),
    (err: unknown) => {
      console.error('Failed to start envelope listener:', err);
      process.exit(1);
    },
  );

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down...`);
    server.close();
    listener.close().then(
      () => {
        closeDb();
        process.exit(0);
      },
      (err: unknown) => {
        console.error('Error closing envelope listener:', err);
        closeDb();
        process.exit(1);
      },
    );
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}
