#!/usr/bin/env node

/**
 * Semantic Video Search API - Entry Point
 */

import * as dotenv from 'dotenv';
import { getConfig, printConfigInfo } from './config.js';
import { createServices, type Services } from './bootstrap.js';
import { ConfigValidationError } from './core/errors.js';
import { WebServer } from './infrastructure/web/WebServer.js';
import { createLogger } from './utils/logger.js';

async function main() {
  let services: Services | null = null;
  let webServer: WebServer | null = null;

  dotenv.config();

  try {
    const config = getConfig();
    printConfigInfo(config);

    services = createServices(config);
    const { client } = services;
    const index = services.ingestion.getActiveIndex();
    if (!index) {
      console.error('⚠️ No index in the catalog yet. Run the ingest command first.');
    }

    webServer = new WebServer(
      {
        ingestion: services.ingestion,
        search: services.search,
        costs: services.costs,
        videoDir: config.storage.videoDir,
        providerStats: () => client.getCircuitBreakerStats(),
        logger: createLogger('WebServer', config.server.debug),
      },
      config.server.port
    );
    await webServer.start();

    const shutdown = async (signal: string) => {
      console.log(`\n\n📛 Received ${signal}, shutting down gracefully...`);

      if (webServer) {
        await webServer.stop();
        await webServer.drain();
      }
      services?.db.close();

      console.log('👋 Goodbye!\n');
      process.exit(0);
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));

    process.on('unhandledRejection', (reason) => {
      console.error('💥 Unhandled Rejection:', reason);
      void shutdown('UNHANDLED_REJECTION');
    });
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      console.error('\n❌ Configuration Validation Failed!\n');
      error.issues.forEach((issue) => console.error(`  • ${issue}`));
      console.error('\n💡 Check your .env file and CLI arguments\n');
    } else {
      console.error('💥 Fatal error in main():', error);
    }

    if (webServer) {
      await webServer.stop();
    }
    services?.db.close();
    process.exit(1);
  }
}

void main();
