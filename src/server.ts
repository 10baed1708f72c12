import dotenv from 'dotenv';
dotenv.config();

import { createApp } from './app';
import { loadConfig } from './config';
import { JobOfferStore } from './db';

const config = loadConfig();
const store = JobOfferStore.open(config.databasePath, config.tableName);
const app = createApp(store);

const server = app.listen(config.port, () => {
  console.log(`[JobRadar] Server running on http://localhost:${config.port}`);
});

function shutdown(): void {
  server.close(() => {
    store.close();
    process.exit(0);
  });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
