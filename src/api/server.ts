/**
 * Express server setup
 */
import type { Server } from 'http';
import express from 'express';
import cors from 'cors';
import { createRouter } from './routes.js';
import { NetworkManager } from '../session/manager.js';
import type { AppConfig } from '../config.js';

export interface RunningServer {
  app: express.Express;
  server: Server;
  manager: NetworkManager;
}

/**
 * Build the application without listening, so it can be driven in-process
 */
export function createApp(config: AppConfig, manager?: NetworkManager): express.Express {
  const app = express();
  const networks =
    manager ?? new NetworkManager({ defaultCapacity: config.maxVertices, idleTimeoutMs: config.idleTimeoutMs });

  // Middleware
  app.use(cors());
  app.use(express.json());

  // API routes
  app.use('/api', createRouter({ manager: networks, config }));

  return app;
}

/**
 * Start the API server
 */
export function startServer(config: AppConfig): RunningServer {
  const manager = new NetworkManager({
    defaultCapacity: config.maxVertices,
    idleTimeoutMs: config.idleTimeoutMs,
  });
  const app = createApp(config, manager);

  const server = app.listen(config.port, () => {
    console.log(`🚀 Friendship graph server running at http://localhost:${config.port}`);
    console.log(`   API: http://localhost:${config.port}/api`);
    console.log(`   Capacity per network: ${config.maxVertices} people`);
  });

  return { app, server, manager };
}
