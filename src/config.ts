import { z } from 'zod';
import type { ConfidenceTier } from './core/entities/SearchResult.js';
import { ConfigValidationError } from './core/errors.js';

export interface Config {
  server: {
    name: string;
    version: string;
    debug: boolean;
    port: number;
  };
  twelveLabs: {
    apiKey: string;
    apiUrl: string;
    indexName: string;
    requestTimeoutMs: number;
  };
  tracker: {
    pollIntervalMs: number;
    maxWaitMs: number;
    transientRetryLimit: number;
  };
  search: {
    maxResults: number;
    threshold: ConfidenceTier;
    adjustConfidenceLevel: number;
  };
  storage: {
    videoDir: string;
    databasePath: string;
  };
  costs: {
    videoCostPerMinute: number;
    searchCostPerQuery: number;
    budget: number;
  };
}

// Zod validation schema
const ConfigSchema = z.object({
  server: z.object({
    name: z.string().min(1, 'Server name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    debug: z.boolean(),
    port: z.number().int().min(1).max(65535),
  }),
  twelveLabs: z.object({
    apiKey: z.string().min(1, 'TWELVE_LABS_API_KEY is required'),
    apiUrl: z.string().url('Invalid Twelve Labs API URL format'),
    indexName: z.string().min(1, 'Index name must not be empty'),
    requestTimeoutMs: z.number().int().min(1000).max(600000),
  }),
  tracker: z.object({
    pollIntervalMs: z.number().int().min(100).max(300000),
    maxWaitMs: z.number().int().min(0),
    transientRetryLimit: z.number().int().min(1).max(10),
  }),
  search: z.object({
    maxResults: z.number().int().min(1).max(50),
    threshold: z.enum(['high', 'medium', 'low']),
    adjustConfidenceLevel: z.number().min(0).max(1),
  }),
  storage: z.object({
    videoDir: z.string().min(1),
    databasePath: z.string().min(1),
  }),
  costs: z.object({
    videoCostPerMinute: z.number().nonnegative(),
    searchCostPerQuery: z.number().nonnegative(),
    budget: z.number().positive(),
  }),
});

/**
 * Parse command line arguments
 * Usage: node dist/src/index.js --port 8000 --poll-interval 2000 --debug
 */
export function parseArgs(argv: string[]): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {};

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);

      // Check if next arg is a value or another flag
      if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        args[key] = argv[++i];
      } else {
        args[key] = true;
      }
    }
  }

  return args;
}

/**
 * Build configuration from CLI arguments over environment variables over defaults.
 * Throws ConfigValidationError listing every invalid field.
 */
export function getConfig(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): Config {
  const cliArgs = parseArgs(argv);

  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] || defaultValue;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    if (cliArgs[cliKey] !== undefined) return cliArgs[cliKey] === true || cliArgs[cliKey] === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return Number(cliValue);
    const envValue = env[envKey];
    return envValue ? Number(envValue) : defaultValue;
  };

  const rawConfig = {
    server: {
      name: getString('server-name', 'SERVER_NAME', 'semantic-video-search'),
      version: getString('server-version', 'SERVER_VERSION', '1.0.0'),
      debug: getBoolean('debug', 'DEBUG', false),
      port: getNumber('port', 'PORT', 8000),
    },
    twelveLabs: {
      apiKey: getString('api-key', 'TWELVE_LABS_API_KEY', ''),
      apiUrl: getString('api-url', 'TWELVE_LABS_API_URL', 'https://api.twelvelabs.io/v1.3'),
      indexName: getString('index-name', 'TWELVE_LABS_INDEX_NAME', 'semantic_video_search_poc'),
      requestTimeoutMs: getNumber('request-timeout', 'REQUEST_TIMEOUT_MS', 60000),
    },
    tracker: {
      pollIntervalMs: getNumber('poll-interval', 'POLL_INTERVAL_MS', 5000),
      maxWaitMs: getNumber('max-wait', 'MAX_WAIT_MS', 900000),
      transientRetryLimit: getNumber('transient-retry-limit', 'TRANSIENT_RETRY_LIMIT', 3),
    },
    search: {
      maxResults: getNumber('max-results', 'MAX_SEARCH_RESULTS', 5),
      threshold: getString('threshold', 'SEARCH_THRESHOLD', 'medium'),
      adjustConfidenceLevel: getNumber('adjust-confidence', 'ADJUST_CONFIDENCE_LEVEL', 0.5),
    },
    storage: {
      videoDir: getString('video-dir', 'VIDEO_DATA_DIR', 'data/videos'),
      databasePath: getString('db-path', 'DATABASE_PATH', 'data/video-search.db'),
    },
    costs: {
      videoCostPerMinute: getNumber('video-cost-per-minute', 'VIDEO_COST_PER_MINUTE', 0.0015),
      searchCostPerQuery: getNumber('search-cost-per-query', 'SEARCH_COST_PER_QUERY', 0.001),
      budget: getNumber('budget', 'COST_BUDGET', 100),
    },
  };

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigValidationError(
      parsed.error.errors.map((err) => `${err.path.join('.') || 'root'}: ${err.message}`)
    );
  }
  return parsed.data;
}

/**
 * Print configuration summary (credentials masked)
 */
export function printConfigInfo(config: Config): void {
  console.error('╔══════════════════════════════════════════════════════════════════╗');
  console.error('║            Semantic Video Search - Configuration                 ║');
  console.error('╚══════════════════════════════════════════════════════════════════╝');

  console.error(`\n📊 Server: ${config.server.name} v${config.server.version} ${config.server.debug ? '(Debug Mode)' : ''}`);
  console.error(`🔗 Twelve Labs: ${config.twelveLabs.apiUrl} (key ${maskKey(config.twelveLabs.apiKey)})`);
  console.error(`🗂️  Index: ${config.twelveLabs.indexName}`);
  console.error(
    `⏱️  Polling: every ${config.tracker.pollIntervalMs}ms, give up after ${config.tracker.maxWaitMs}ms | Transient retries: ${config.tracker.transientRetryLimit}x`
  );
  console.error(`🔍 Search: ${config.search.maxResults} results, threshold ${config.search.threshold}`);
  console.error(`📁 Videos: ${config.storage.videoDir} | DB: ${config.storage.databasePath}`);
  console.error(`💰 Budget: $${config.costs.budget.toFixed(2)}`);
  console.error('\n' + '─'.repeat(68));
}

function maskKey(key: string): string {
  return key.length <= 4 ? '****' : `****${key.slice(-4)}`;
}
