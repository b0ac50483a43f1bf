#!/usr/bin/env node

/**
 * Ingest every video in the video directory into the search index.
 * Usage: video-search-ingest [--video-dir data/videos] [--force]
 *        video-search-ingest --estimate [--avg-seconds 60] [--queries 100]
 */

import * as dotenv from 'dotenv';
import path from 'path';
import { getConfig, parseArgs, printConfigInfo, type Config } from './config.js';
import { createServices, type Services } from './bootstrap.js';
import { ConfigValidationError, errorMessage } from './core/errors.js';
import { listVideoFiles } from './utils/videoFiles.js';

function loadConfig(): Config | null {
  try {
    return getConfig();
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      console.error('\n❌ Configuration Validation Failed!\n');
      error.issues.forEach((issue) => console.error(`  • ${issue}`));
      return null;
    }
    throw error;
  }
}

function numberArg(value: string | boolean | undefined, fallback: number): number {
  const parsed = typeof value === 'string' ? Number(value) : NaN;
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

function printEstimate(services: Services, config: Config, args: Record<string, string | boolean>): void {
  const videoCount = listVideoFiles(config.storage.videoDir).length;
  const secondsPerVideo = numberArg(args['avg-seconds'], 60);
  const queryCount = numberArg(args['queries'], 100);
  const estimate = services.costs.estimate(videoCount, secondsPerVideo, queryCount);

  console.log(`Cost estimate for ${videoCount} videos of ~${secondsPerVideo}s and ${queryCount} searches:`);
  console.log(`  Video processing: $${estimate.videoCost.toFixed(4)}`);
  console.log(`  Search queries:   $${estimate.searchCost.toFixed(4)}`);
  console.log(`  Total:            $${estimate.total.toFixed(4)}`);
  console.log(`  Left in budget:   $${estimate.safetyMargin.toFixed(2)}`);
}

async function main(): Promise<number> {
  dotenv.config();

  const config = loadConfig();
  if (!config) {
    return 1;
  }

  printConfigInfo(config);
  const args = parseArgs(process.argv);
  const services = createServices(config);

  try {
    if (args['estimate'] === true) {
      printEstimate(services, config, args);
      return 0;
    }

    console.log('Twelve Labs Video Ingestion');
    console.log('='.repeat(40));

    const summary = await services.ingestion.ingestDirectory(config.storage.videoDir, {
      force: args['force'] === true,
    });

    console.log(`\n✅ Ingested ${summary.ingested.length} videos`);
    if (summary.skipped.length > 0) {
      console.log(`⏭️  Skipped ${summary.skipped.length} already ingested (use --force to redo)`);
    }
    for (const failure of summary.failed) {
      console.log(`❌ ${path.basename(failure.filePath)}: ${failure.error}`);
    }

    const costs = services.costs.getSummary();
    console.log(`💰 Total cost so far: $${costs.totalCost.toFixed(4)} of $${costs.budget.toFixed(2)}`);

    if (summary.ingested.length === 0 && summary.skipped.length === 0) {
      console.log('\n❌ Nothing was ingested. Check your API key and video files.');
      return 1;
    }
    console.log('\nNext step: start the API with `npm start`');
    return 0;
  } catch (error) {
    console.error(`💥 Ingestion failed: ${errorMessage(error)}`);
    return 1;
  } finally {
    services.db.close();
  }
}

main().then(
  (code) => process.exit(code),
  (error: unknown) => {
    console.error('💥 Fatal error:', error);
    process.exit(1);
  }
);
