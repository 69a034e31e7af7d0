import { serve } from '@hono/node-server';
import { createSqliteRepository, seedDemoData } from '@cardwise/engine';
import { loadConfig } from './config.js';
import { openDb } from './db.js';
import { createApp, APP_VERSION } from './app.js';

const config = loadConfig();
const db = openDb(config.dbPath);

if (config.seedDemo) {
  seedDemoData(createSqliteRepository(db));
}

const app = createApp(db, { corsOrigins: config.corsOrigins, minimumDueRate: config.minimumDueRate });

serve({ fetch: app.fetch, port: config.port }, (info) => {
  console.log(`Cardwise API v${APP_VERSION} → http://localhost:${info.port} (db: ${config.dbPath})`);
});
