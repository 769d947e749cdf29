import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { openDatabase } from './db.js';
import { LedgerStore } from './ledgerStore.js';

const config = loadConfig();
const db = openDatabase(config.databasePath);
const store = new LedgerStore(db);

// Make sure the settings record exists before the first request
store.getSettings();

const app = createApp(store, {
  allowedOrigins: config.allowedOrigins,
  importMaxBytes: config.importMaxBytes,
});

const server = app.listen(config.port, () => {
  console.log(`API server running on http://localhost:${config.port}`);
});

function shutdown(signal: string): void {
  console.log(`${signal} received, closing server`);
  server.close(() => {
    db.close();
    process.exit(0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
