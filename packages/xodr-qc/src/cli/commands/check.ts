/**
 * Check Command
 *
 * Runs every applicable checker over a document tree file and writes the
 * report.
 *
 * Usage:
 *   xodr-qc check <file> [options]
 *
 * Options:
 *   --format <fmt>          Output format: table|json|summary|csv
 *   --gap-tolerance <m>     Horizontal gap tolerance in metres
 *   --disable <ids...>      Checker ids to skip
 *   --output <file>         Write the report to a file instead of stdout
 *
 * @module cli/commands/check
 */

import { readFile, writeFile } from 'node:fs/promises';
import { DocumentBuildError } from '../../core/errors.js';
import { documentErrorResult, runChecks, type RunResult } from '../../orchestrator/run-checks.js';
import type { CLIConfig } from '../lib/config.js';
import type { CLILogger } from '../lib/logger.js';
import { buildReport, formatReport, getExitCode } from '../lib/report.js';

export interface CheckOptions {
  readonly output?: string;
  /** Where the report goes when no output file is given */
  readonly print?: (text: string) => void;
}

export interface CheckDependencies {
  readonly config: CLIConfig;
  readonly logger: CLILogger;
}

async function readTree(file: string): Promise<unknown> {
  const content = await readFile(file, 'utf-8');
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new DocumentBuildError([
      { path: '', message: `Not a JSON document: ${error instanceof Error ? error.message : String(error)}` },
    ]);
  }
}

/**
 * Check one file
 *
 * @returns process exit code
 */
export async function checkCommand(
  file: string,
  options: CheckOptions,
  { config, logger }: CheckDependencies
): Promise<number> {
  logger.commandStart('check', { file, format: config.format });

  let run: RunResult;
  try {
    const tree = await readTree(file);
    run = runChecks(tree, {
      tolerances: config.tolerances,
      disabled: config.disabled,
      logger: logger.child({ module: 'orchestrator' }),
    });
  } catch (error) {
    if (!(error instanceof DocumentBuildError)) throw error;
    logger.error('Document could not be read', { file, error: error.message });
    run = documentErrorResult(error);
  }

  const report = buildReport(file, run);
  const text = formatReport(report, config.format, {
    color: options.output === undefined ? undefined : false,
  });

  if (options.output !== undefined) {
    await writeFile(options.output, `${text}\n`, 'utf-8');
    logger.info('Report written', { output: options.output });
  } else {
    (options.print ?? console.log)(text);
  }

  const exitCode = getExitCode(report);
  logger.commandEnd(exitCode === 0, {
    issues: report.issues.length,
    status: report.overallStatus,
  });
  return exitCode;
}
