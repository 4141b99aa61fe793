#!/usr/bin/env tsx
/**
 * Barangay API CLI Entry Point
 *
 * Serve the HTTP API, or answer lookups and searches from a dataset bundle
 * directly.
 *
 * @module barangay-api-cli
 */

import { Command, InvalidArgumentError } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { loadConfig, type AppConfig } from '../src/core/config.js';
import {
  ConfigError,
  DatasetIntegrityError,
  InvalidRequestError,
  NotFoundError,
} from '../src/core/errors.js';
import type { MatchHook } from '../src/core/types.js';
import { logger, setLogLevel } from '../src/core/utils/logger.js';
import { serveCommand } from '../src/cli/commands/serve/index.js';
import {
  openQueryContext,
  parseMatchHooks,
  runQuery,
  validateCommand,
  type QueryCommand,
} from '../src/cli/commands/query/index.js';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  WARNINGS: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  DATA_INTEGRITY_ERROR: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================================================
// CLI Setup
// ============================================================================

function getVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  try {
    const packageJson: unknown = JSON.parse(readFileSync(join(here, '..', 'package.json'), 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ConfigError) return EXIT_CODES.CONFIG_ERROR;
  if (error instanceof DatasetIntegrityError) return EXIT_CODES.DATA_INTEGRITY_ERROR;
  return EXIT_CODES.ERRORS;
}

function reportError(error: unknown): void {
  if (error instanceof NotFoundError || error instanceof InvalidRequestError) {
    console.error(error.message);
  } else if (error instanceof DatasetIntegrityError) {
    console.error(error.getSummary());
  } else if (error instanceof ConfigError) {
    console.error(`Configuration error: ${error.message}`);
  } else {
    logger.error('Command failed', {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
  }
  process.exitCode = exitCodeFor(error);
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

interface GlobalOptions {
  readonly config?: string;
  readonly dataset?: string;
  readonly verbose?: boolean;
}

function resolveConfig(program: Command): AppConfig {
  const options = program.opts<GlobalOptions>();
  setLogLevel(options.verbose ? 'debug' : 'warn');
  return loadConfig({
    configPath: options.config,
    overrides: { datasetPath: options.dataset },
  });
}

async function printQuery(program: Command, command: QueryCommand): Promise<void> {
  try {
    const ctx = await openQueryContext(resolveConfig(program));
    console.log(JSON.stringify(runQuery(ctx, command), null, 2));
  } catch (error) {
    reportError(error);
  }
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('barangay-api')
    .description('Philippine administrative divisions (PSGC) lookup and barangay search')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('--config <path>', 'Path to config file (default: .barangay-apirc)')
    .option('--dataset <path>', 'Path to the PSGC dataset bundle (JSON)')
    .option('-v, --verbose', 'Enable verbose logging');

  program
    .command('serve')
    .description('Start the HTTP API server')
    .option('-p, --port <port>', 'Port to listen on', parseInteger)
    .option('--host <host>', 'Interface to bind')
    .option('--cors-origins <origins>', 'Comma-separated allowed origins')
    .option('--rate-limit <n>', 'Search requests per client per minute', parseInteger)
    .option('--strict-leaf-validation', 'Reject a municipality that does not repeat the HUC name')
    .option('--no-strict-integrity', 'Serve a dataset that violates integrity constraints')
    .action(
      async (options: {
        port?: number;
        host?: string;
        corsOrigins?: string;
        rateLimit?: number;
        strictLeafValidation?: boolean;
        strictIntegrity: boolean;
      }) => {
        const globals = program.opts<GlobalOptions>();
        if (globals.verbose) {
          setLogLevel('debug');
        }
        try {
          await serveCommand({
            config: globals.config,
            datasetPath: globals.dataset,
            port: options.port,
            host: options.host,
            corsOrigins: options.corsOrigins?.split(',').map((origin) => origin.trim()),
            rateLimitPerMinute: options.rateLimit,
            strictLeafValidation: options.strictLeafValidation,
            // Only an explicit --no-strict-integrity overrides config
            strictIntegrity: options.strictIntegrity ? undefined : false,
          });
        } catch (error) {
          reportError(error);
        }
      }
    );

  program
    .command('regions')
    .description('List all regions')
    .action(() => printQuery(program, { kind: 'regions' }));

  program
    .command('provinces <region>')
    .description('List provinces and highly urbanized cities of a region')
    .action((region: string) => printQuery(program, { kind: 'provinces', region }));

  program
    .command('municipalities <region> <provinceOrHuc>')
    .description('List municipalities and cities of a province (an HUC lists itself)')
    .action((region: string, provinceOrHuc: string) =>
      printQuery(program, { kind: 'municipalities', region, provinceOrHuc })
    );

  program
    .command('barangays <region> <provinceOrHuc> <municipalityOrCity>')
    .description('List barangays of a municipality or city')
    .action((region: string, provinceOrHuc: string, municipalityOrCity: string) =>
      printQuery(program, { kind: 'barangays', region, provinceOrHuc, municipalityOrCity })
    );

  program
    .command('id <psgcId>')
    .description('Show the administrative area with a PSGC id')
    .action((psgcId: string) => printQuery(program, { kind: 'id', psgcId }));

  program
    .command('name <name>')
    .description('List administrative areas with an exact name')
    .action((name: string) => printQuery(program, { kind: 'name', name }));

  program
    .command('search <query>')
    .description('Fuzzy-search barangays')
    .option('--hooks <hooks>', 'Comma-separated match hooks (barangay,municipality,province)')
    .option('--threshold <score>', 'Minimum score 0-100', parseNumber)
    .option('-n, --limit <n>', 'Maximum number of results', parseInteger)
    .action(
      async (query: string, options: { hooks?: string; threshold?: number; limit?: number }) => {
        let matchHooks: MatchHook[] | undefined;
        try {
          matchHooks = options.hooks !== undefined ? parseMatchHooks(options.hooks) : undefined;
        } catch (error) {
          reportError(error);
          return;
        }
        await printQuery(program, {
          kind: 'search',
          request: {
            searchString: query,
            matchHooks,
            threshold: options.threshold,
            lenResults: options.limit,
          },
        });
      }
    );

  program
    .command('validate')
    .description('Check the dataset bundle against its integrity constraints')
    .action(async () => {
      try {
        const config = resolveConfig(program);
        const report = await validateCommand(config.dataset.path);
        console.log(JSON.stringify(report, null, 2));
        if (!report.valid) {
          process.exitCode = EXIT_CODES.WARNINGS;
        }
      } catch (error) {
        reportError(error);
      }
    });

  return program;
}

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    reportError(error);
  });
