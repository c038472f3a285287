// Load environment variables BEFORE any other imports
import dotenv from 'dotenv';
dotenv.config();

// Validate configuration before starting server
import { getConfig } from './config/validation.js';
const config = getConfig(); // This will validate and exit if config is invalid

import { createServer } from './server.js';

const PORT = config.PORT;
const HOST = config.HOST;

async function start() {
  try {
    const fastify = await createServer();

    // Graceful shutdown
    const gracefulShutdown = async (signal: string) => {
      fastify.log.info(`Received ${signal}, shutting down gracefully`);
      try {
        await fastify.close();
        process.exit(0);
      } catch (error) {
        fastify.log.error({ err: error }, 'Error during shutdown');
        process.exit(1);
      }
    };

    process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

    await fastify.listen({ port: PORT, host: HOST });
    fastify.log.info(`🚀 Hospital Ledger API started on http://${HOST}:${PORT}`);
    fastify.log.info('📋 Available endpoints:');
    fastify.log.info('  Ledger:');
    fastify.log.info('    GET  /ledger/blocks - Recent blocks');
    fastify.log.info('    POST /ledger/blocks - Append block');
    fastify.log.info('    POST /ledger/attest - Attest row mutation');
    fastify.log.info('    POST /ledger/verify - Verify record hash');
    fastify.log.info('    GET  /ledger/integrity - Chain integrity');
    fastify.log.info('    GET  /ledger/stats - Chain statistics');
    fastify.log.info('    GET  /ledger/stream - Event stream');
    fastify.log.info('  Reconciliation:');
    fastify.log.info('    POST /reconciliation/sync - Run reconciliation');
    fastify.log.info('    GET  /reconciliation/runs - Run history');
    fastify.log.info('  Other:');
    fastify.log.info('    GET  /health - Health check');
    fastify.log.info('    GET  /info - API information');
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
}

void start();
