/**
 * ABC Drill API Server
 *
 * Serves the Hono app on Node via @hono/node-server.
 *
 * Usage:
 *   npm run server
 *
 * Environment Variables (see config.ts):
 *   PORT, HOST - Where to listen (default 0.0.0.0:3000)
 *   DATABASE_PATH - SQLite file (default abc-drill.db)
 *   ANTHROPIC_API_KEY - Needed for suggestion generation only
 *   ALLOWED_ORIGINS - Comma-separated CORS origins
 */

import { serve } from '@hono/node-server';
import { config, validateConfig } from '../config';
import { getDatabase } from '../storage/db';
import { createApp } from './app';
import { createDependencies } from './dependencies';

function startServer(): void {
  try {
    validateConfig();

    const deps = createDependencies(getDatabase());
    const app = createApp(deps, { corsOrigins: config.cors.allowedOrigins });

    const server = serve(
      {
        fetch: app.fetch,
        port: config.server.port,
        hostname: config.server.host,
      },
      (info) => {
        console.log('');
        console.log('ABC Drill API');
        console.log(`  Listening:   http://${info.address}:${info.port}`);
        console.log(`  Environment: ${config.server.nodeEnv}`);
        console.log(`  Database:    ${config.database.path}`);
        console.log(`  Health:      http://localhost:${info.port}/health`);
        console.log(`  API:         http://localhost:${info.port}/api`);
        console.log('');
      }
    );

    const shutdown = (signal: string) => {
      console.log(`\n[Server] Received ${signal}, shutting down...`);
      server.close(() => process.exit(0));
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
  } catch (error) {
    console.error('[Server] Failed to start:', error);
    process.exit(1);
  }
}

startServer();
