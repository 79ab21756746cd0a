/**
 * Server settings read from the environment
 */
export interface ServerConfig {
  port: number;
  corsOrigins: string[];
}

const DEFAULT_PORT = 8787;
const DEFAULT_CORS_ORIGINS = ['http://localhost:5173', 'http://localhost:3000'];

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const port = env.PORT ? parseInt(env.PORT, 10) : DEFAULT_PORT;
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`PORT must be a valid port number, got "${env.PORT}"`);
  }

  const corsOrigins = env.CORS_ORIGINS
    ? env.CORS_ORIGINS.split(',').map((o) => o.trim()).filter((o) => o.length > 0)
    : DEFAULT_CORS_ORIGINS;

  return { port, corsOrigins };
}
