/**
 * Main entry point for the friendship graph server
 */
import { loadConfig } from './config.js';
import { startServer } from './api/server.js';

const config = loadConfig();
const { server } = startServer(config);

// Graceful shutdown handlers
const shutdownHandler = (signal: string) => {
  console.log(`\n${signal} received. Shutting down gracefully...`);
  server.close(err => {
    if (err) {
      console.error('Error during shutdown:', err);
      process.exit(1);
    }
    console.log('✅ Cleanup complete');
    process.exit(0);
  });
};

process.on('SIGINT', () => shutdownHandler('SIGINT'));
process.on('SIGTERM', () => shutdownHandler('SIGTERM'));
