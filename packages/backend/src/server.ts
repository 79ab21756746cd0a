import { serve } from '@hono/node-server';
import { loadServerConfig } from './config.js';
import { createApp } from './index.js';

const config = loadServerConfig();
const app = createApp({ corsOrigins: config.corsOrigins });

serve({ fetch: app.fetch, port: config.port }, (info) => {
  console.log(`League formation API listening on http://localhost:${info.port}`);
});
