import { Hono } from 'hono';
import { cors } from 'hono/cors';
import teamFormationRouter from './routes/team-formation.js';

export interface AppOptions {
  corsOrigins?: string[];
}

export function createApp(options: AppOptions = {}): Hono {
  const app = new Hono();

  // CORS middleware
  app.use('/*', cors({
    origin: options.corsOrigins ?? ['http://localhost:5173', 'http://localhost:3000'],
    credentials: true,
  }));

  // Health check
  app.get('/health', (c) => {
    return c.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // API routes
  app.route('/api/team-formation', teamFormationRouter);

  // 404 handler
  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  // Error handler
  app.onError((err, c) => {
    console.error('Error:', err);
    return c.json({ error: 'Internal server error', message: err.message }, 500);
  });

  return app;
}
