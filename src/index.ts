#!/usr/bin/env node

/**
 * Batch evaluation server - entry point
 */

import { getConfig, printConfigInfo } from './config.js';
import { EvalServer } from './presentation/EvalServer.js';

async function main() {
  let evalServer: EvalServer | null = null;

  try {
    const config = getConfig();
    printConfigInfo(config);

    evalServer = new EvalServer(config);
    await evalServer.start();
    evalServer.printStats();

    if (config.mcp.transport !== 'stdio') {
      console.error('\n🚀 Server is running. Press Ctrl+C to stop.\n');
    }
  } catch (error) {
    console.error('💥 Fatal error in main():', error);
    if (evalServer) {
      await evalServer.shutdown();
    }
    process.exit(1);
  }

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.error(`\n\n📛 Received ${signal}, shutting down gracefully...`);

    try {
      await evalServer?.shutdown();
      console.error('👋 Goodbye!\n');
      process.exit(0);
    } catch (error) {
      console.error('💥 Error during shutdown:', error);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  process.on('uncaughtException', (error) => {
    console.error('💥 Uncaught Exception:', error);
    void shutdown('UNCAUGHT_EXCEPTION');
  });

  process.on('unhandledRejection', (reason) => {
    console.error('💥 Unhandled Rejection:', reason);
    void shutdown('UNHANDLED_REJECTION');
  });
}

void main();
