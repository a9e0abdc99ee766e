import { mkdirSync } from 'node:fs';
import http from 'node:http';
import path from 'node:path';
import { actorContext } from './api/middleware/actor';
import { router } from './api/router';
import { registerRoutes } from './api/routes';
import { config } from './config/env';
import { db, IN_MEMORY_DB, initializeSchema } from './db';
import { createServices } from './services/container';
import { logger } from './utils/logger';

// Register global middleware
router.use(actorContext());

// Register routes
registerRoutes(router, createServices(db), db);

// Create server
const server = http.createServer((req, res) => {
  router.handleRequest(req, res).catch((error) => {
    logger.error({ error }, 'Unhandled request error');
    if (!res.headersSent) {
      res.writeHead(500, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ success: false, error: { message: 'Internal server error' } }));
    }
  });
});

// Graceful shutdown
const shutdown = () => {
  logger.info('Shutting down server...');
  server.close(() => {
    db.close();
    logger.info('Server closed');
    process.exit(0);
  });
};

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);

// Startup function - initializes database and starts server
async function startup(): Promise<void> {
  try {
    if (config.database.path !== IN_MEMORY_DB) {
      mkdirSync(path.dirname(path.resolve(config.database.path)), { recursive: true });
    }

    logger.info({ dbPath: config.database.path }, 'Initializing database schema...');
    await initializeSchema(db);

    server.listen(config.server.port, () => {
      logger.info(
        {
          port: config.server.port,
          env: config.server.nodeEnv,
          pool: db.poolStats()
        },
        `Billing server started on http://0.0.0.0:${config.server.port}`
      );
    });
  } catch (error) {
    logger.error({ error }, 'Failed to start server');
    process.exit(1);
  }
}

// Start the application
void startup();
