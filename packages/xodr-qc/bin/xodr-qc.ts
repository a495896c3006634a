#!/usr/bin/env tsx
/**
 * xodr-qc CLI Entry Point
 *
 * Semantic and geometric quality checks for OpenDRIVE document trees.
 *
 * @module xodr-qc-cli
 */

import { Command, InvalidArgumentError } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { loadConfig, validateConfig, type CLIConfig } from '../src/cli/lib/config.js';
import { createCLILogger, type CLILogger } from '../src/cli/lib/logger.js';
import { EXIT_CODES, REPORT_FORMATS, type ReportFormat } from '../src/cli/lib/report.js';
import { checkCommand } from '../src/cli/commands/check.js';
import { rulesCommand } from '../src/cli/commands/rules.js';
import { validateRegistry } from '../src/checks/registry.js';

// ============================================================================
// Global State
// ============================================================================

export interface GlobalContext {
  config: CLIConfig;
  logger: CLILogger;
  startTime: number;
}

let globalContext: GlobalContext | null = null;

export function getGlobalContext(): GlobalContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

// ============================================================================
// CLI Setup
// ============================================================================

const PackageJsonSchema = z.object({ version: z.string() });

function getVersion(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  const packageJsonPath = join(__dirname, '..', 'package.json');
  try {
    const result = PackageJsonSchema.safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
    return result.success ? result.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

const GlobalOptionsSchema = z.object({
  verbose: z.boolean().optional(),
  json: z.boolean().optional(),
  config: z.string().optional(),
});

const CheckOptionsSchema = z.object({
  format: z.enum(REPORT_FORMATS).optional(),
  gapTolerance: z.number().optional(),
  disable: z.array(z.string()).optional(),
  output: z.string().optional(),
});

function parseFormat(value: string): ReportFormat {
  const result = z.enum(REPORT_FORMATS).safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(`Must be one of: ${REPORT_FORMATS.join(', ')}`);
  }
  return result.data;
}

function parseTolerance(value: string): number {
  const num = Number(value);
  if (!Number.isFinite(num) || num <= 0) {
    throw new InvalidArgumentError('Must be a positive number');
  }
  return num;
}

async function initializeContext(
  options: z.infer<typeof GlobalOptionsSchema>,
  commandOptions: z.infer<typeof CheckOptionsSchema>
): Promise<GlobalContext> {
  const startTime = Date.now();

  const config = await loadConfig({
    configPath: options.config,
    overrides: {
      verbose: options.verbose,
      json: options.json,
      format: commandOptions.format,
      gapTolerance: commandOptions.gapTolerance,
      disabled: commandOptions.disable,
    },
  });
  validateConfig(config);

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
  });

  globalContext = { config, logger, startTime };
  return globalContext;
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('xodr-qc')
    .description('Semantic and geometric quality checks for OpenDRIVE road networks')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Log as JSON lines (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .xodr-qcrc)')
    .hook('preAction', async (thisCommand, actionCommand) => {
      try {
        // Registry defects abort before any file is read
        validateRegistry();
        const globalOptions = GlobalOptionsSchema.parse(thisCommand.opts());
        const commandOptions = CheckOptionsSchema.parse(actionCommand.opts());
        await initializeContext(globalOptions, commandOptions);
      } catch (error) {
        console.error(`Configuration error: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  program
    .command('check <file>')
    .description('Check an OpenDRIVE document tree (JSON)')
    .option('--format <fmt>', 'Output format: table|json|summary|csv', parseFormat)
    .option('--gap-tolerance <m>', 'Horizontal gap tolerance in metres', parseTolerance)
    .option('--disable <ids...>', 'Checker ids to skip')
    .option('--output <file>', 'Write the report to a file')
    .action(async (file: string, rawOptions: unknown) => {
      const context = getGlobalContext();
      const options = CheckOptionsSchema.parse(rawOptions);
      const exitCode = await checkCommand(file, { output: options.output }, context);
      if (exitCode !== 0) process.exit(exitCode);
    });

  program
    .command('rules')
    .description('List the registered checkers')
    .action(() => {
      const { logger } = getGlobalContext();
      rulesCommand(logger);
    });

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (globalContext) {
      globalContext.logger.error('Command failed', {
        error: error instanceof Error ? error.message : String(error),
        duration_ms: Date.now() - globalContext.startTime,
      });
    } else {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    }
    process.exit(EXIT_CODES.VALIDATION_ERROR);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.VALIDATION_ERROR);
});
