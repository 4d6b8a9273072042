import * as dotenv from 'dotenv';
import fs from 'fs';
import { z } from 'zod';
import type { ScorerDefinition } from './core/entities/Scorer.js';
import { ConfigurationError, errorMessage } from './core/errors.js';

// Load environment variables from .env file
dotenv.config();

export interface Config {
  server: {
    name: string;
    version: string;
    debug: boolean;
  };
  http: {
    enabled: boolean;
    port: number;
  };
  mcp: {
    transport: 'stdio' | 'streamable' | 'none';
    sessionTimeoutMinutes: number;
  };
  jobQueue: {
    maxConcurrentJobs: number;
  };
  runner: {
    command: string;
    args: string[];
    configPath?: string;
    reportsDir: string;
    timeoutMs: number;
    extraArgs: string[];
  };
  scorers: ScorerDefinition[];
  resultsExport: {
    enabled: boolean;
    databasePath: string;
    retryAttempts: number;
  };
}

export const DEFAULT_SCORERS: ScorerDefinition[] = [
  {
    name: 'numerical_accuracy',
    weight: 0.3,
    threshold: 1.0,
    required: true,
    description: 'Validates numerical precision and calculations',
  },
  {
    name: 'data_methodology',
    weight: 0.3,
    threshold: 1.0,
    required: true,
    description: 'Evaluates data source transparency and methodology',
  },
  {
    name: 'agent_routing',
    weight: 0.2,
    threshold: 1.0,
    required: true,
    description: 'Assesses correct agent selection and routing',
  },
  {
    name: 'completeness',
    weight: 0.1,
    threshold: 0.8,
    description: 'Checks response completeness',
  },
  {
    name: 'assumption_transparency',
    weight: 0.05,
    threshold: 0.8,
    description: 'Validates disclosure of assumptions and limitations',
  },
  {
    name: 'error_handling',
    weight: 0.05,
    threshold: 0.8,
    description: 'Evaluates error handling and recovery',
  },
];

// Tolerance for floating point sums such as 0.3 + 0.3 + 0.2 + 0.1 + 0.05 + 0.05
const WEIGHT_SUM_EPSILON = 1e-6;

export const ScorerSchema = z.object({
  name: z.string().min(1, 'Scorer name must not be empty'),
  weight: z.number().min(0).max(1),
  description: z.string().default(''),
  threshold: z.number().min(0).max(1).optional(),
  required: z.boolean().optional(),
});

// Zod validation schema
const ConfigSchema = z.object({
  server: z.object({
    name: z.string().min(1, 'Server name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    debug: z.boolean(),
  }),
  http: z.object({
    enabled: z.boolean(),
    port: z.number().int().min(1).max(65535),
  }),
  mcp: z.object({
    transport: z.enum(['stdio', 'streamable', 'none']),
    sessionTimeoutMinutes: z.number().int().min(5).max(1440),
  }),
  jobQueue: z.object({
    maxConcurrentJobs: z.number().int().min(1).max(64),
  }),
  runner: z.object({
    command: z.string().min(1, 'Runner command must not be empty'),
    args: z.array(z.string()),
    configPath: z.string().min(1).optional(),
    reportsDir: z.string().min(1),
    timeoutMs: z.number().int().min(1000),
    extraArgs: z.array(z.string()),
  }),
  scorers: z
    .array(ScorerSchema)
    .min(1, 'At least 1 scorer is required')
    .refine(
      (scorers) => new Set(scorers.map((s) => s.name)).size === scorers.length,
      'Scorer names must be unique'
    )
    .refine(
      (scorers) => Math.abs(scorers.reduce((sum, s) => sum + s.weight, 0) - 1) <= WEIGHT_SUM_EPSILON,
      'Scorer weights must sum to 1'
    ),
  resultsExport: z.object({
    enabled: z.boolean(),
    databasePath: z.string().min(1),
    retryAttempts: z.number().int().min(1).max(10),
  }),
});

export type ConfigSource = Record<string, string | undefined>;

/**
 * Parse command line arguments
 * Usage: node dist/src/index.js --http-port 8000 --max-concurrent-jobs 2 --debug
 */
export function parseArgs(argv: string[] = process.argv.slice(2)): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {};

  for (let i = 0; i < argv.length; i++) {
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
 * Load scorer definitions from a JSON file (an array of scorers).
 * Throws a ConfigurationError naming the file when it cannot be read or parsed.
 */
export function loadScorersFile(filePath: string): unknown {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read scorers file ${filePath}: ${errorMessage(error)}`, { cause: error });
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Scorers file ${filePath} is not valid JSON: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

/**
 * Build configuration from CLI arguments and environment, then validate it.
 * Throws a ZodError when the result does not match the schema, or a
 * ConfigurationError when the scorers file is unusable.
 */
export function buildConfig(
  cliArgs: Record<string, string | boolean> = parseArgs(),
  env: ConfigSource = process.env
): Config {
  // Helper to get value from CLI args or env, with type conversion
  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] || defaultValue;
  };

  const getOptionalString = (cliKey: string, envKey: string): string | undefined => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] || undefined;
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

  const getStringArray = (cliKey: string, envKey: string, defaultValue: string[]): string[] => {
    const cliValue = cliArgs[cliKey];
    const value = typeof cliValue === 'string' ? cliValue : env[envKey];
    if (value === undefined) return defaultValue;
    return value
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s.length > 0);
  };

  const scorersFile = getOptionalString('scorers-file', 'SCORERS_FILE');

  const rawConfig = {
    server: {
      name: getString('server-name', 'SERVER_NAME', 'batch-eval-server'),
      version: getString('server-version', 'SERVER_VERSION', '1.0.0'),
      debug: getBoolean('debug', 'DEBUG', false),
    },
    http: {
      enabled: getBoolean('http', 'HTTP_ENABLED', true),
      port: getNumber('http-port', 'HTTP_PORT', 8000),
    },
    mcp: {
      transport: getString('mcp-transport', 'MCP_TRANSPORT', 'none'),
      sessionTimeoutMinutes: getNumber('mcp-session-timeout', 'MCP_SESSION_TIMEOUT_MINUTES', 60),
    },
    jobQueue: {
      maxConcurrentJobs: getNumber('max-concurrent-jobs', 'MAX_CONCURRENT_JOBS', 4),
    },
    runner: {
      command: getString('runner-command', 'RUNNER_COMMAND', 'eval-runner'),
      args: getStringArray('runner-args', 'RUNNER_ARGS', ['run']),
      configPath: getOptionalString('runner-config', 'RUNNER_CONFIG_PATH'),
      reportsDir: getString('reports-dir', 'RUNNER_REPORTS_DIR', 'reports'),
      timeoutMs: getNumber('runner-timeout', 'RUNNER_TIMEOUT_MS', 60 * 60 * 1000),
      extraArgs: getStringArray('runner-extra-args', 'RUNNER_EXTRA_ARGS', []),
    },
    scorers: scorersFile ? loadScorersFile(scorersFile) : DEFAULT_SCORERS,
    resultsExport: {
      enabled: getBoolean('results-export', 'RESULTS_EXPORT_ENABLED', false),
      databasePath: getString('results-db', 'RESULTS_DB_PATH', 'data/eval-results.db'),
      retryAttempts: getNumber('export-retry-attempts', 'EXPORT_RETRY_ATTEMPTS', 3),
    },
  };

  return ConfigSchema.parse(rawConfig);
}

/**
 * Get configuration from environment variables or CLI arguments.
 * Prints every validation issue and exits when the configuration is invalid.
 */
export function getConfig(): Config {
  try {
    return buildConfig();
  } catch (error) {
    if (error instanceof z.ZodError || error instanceof ConfigurationError) {
      console.error('\n❌ Configuration Validation Failed!\n');
      console.error('Errors:');
      if (error instanceof z.ZodError) {
        error.errors.forEach((err) => {
          const path = err.path.join('.');
          console.error(`  • ${path || 'root'}: ${err.message}`);
        });
      } else {
        console.error(`  • scorers: ${error.message}`);
      }
      console.error('\n💡 Tips:');
      console.error('  - Check your .env file');
      console.error('  - Verify CLI arguments');
      console.error('  - SCORERS_FILE must contain a JSON array of {name, weight, description} with weights summing to 1');
      console.error();
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Print configuration summary
 */
export function printConfigInfo(config: Config): void {
  console.error('─'.repeat(68));
  console.error(`📊 Server: ${config.server.name} v${config.server.version} ${config.server.debug ? '(Debug Mode)' : ''}`);
  console.error(`🏃 Runner: ${[config.runner.command, ...config.runner.args].join(' ')} (timeout ${config.runner.timeoutMs}ms)`);
  console.error(`⚙️  Queue: ${config.jobQueue.maxConcurrentJobs} concurrent evaluations`);
  console.error(`🧮 Scorers: ${config.scorers.length} configured`);
  config.scorers.forEach((scorer, idx) => {
    console.error(`   ${idx + 1}. ${scorer.name} (weight ${scorer.weight})`);
  });

  if (config.http.enabled) {
    console.error(`\n🌐 HTTP API: http://localhost:${config.http.port}`);
  }
  if (config.mcp.transport !== 'none') {
    console.error(`📡 MCP: ${config.mcp.transport.toUpperCase()} mode`);
  }
  if (config.resultsExport.enabled) {
    console.error(`🗄️  Results export: ${config.resultsExport.databasePath}`);
  }

  console.error('─'.repeat(68));
}
