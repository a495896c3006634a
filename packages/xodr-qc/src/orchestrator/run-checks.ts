/**
 * Checker orchestration
 *
 * Builds the Document Model and the lane topology once, then runs every
 * registered checker in declaration order over that shared, read-only model.
 *
 * @module orchestrator/run-checks
 */

import { DEFAULT_TOLERANCES, DOCUMENT_CHECKER_ID, DOCUMENT_RULE_UID, type Tolerances } from '../core/constants.js';
import { DocumentBuildError } from '../core/errors.js';
import { createLogger, type StructuredLogger } from '../core/utils/logger.js';
import { buildDocument } from '../model/builder.js';
import type { OpenDriveDocument } from '../model/types.js';
import { buildTopology } from '../topology/lane-topology.js';
import { fileVersion, formatVersion, type Version } from '../version/version.js';
import { isApplicable } from '../version/version-spec.js';
import { validateRegistry, type RegisteredChecker } from '../checks/registry.js';
import type { CheckContext, Issue } from '../checks/types.js';

// ============================================================================
// Types
// ============================================================================

export type CheckerStatus = 'completed' | 'skipped' | 'error';

export type SkipReason = 'disabled' | 'precondition' | 'version_not_applicable' | 'version_unavailable';

export interface CheckerResult {
  readonly id: string;
  readonly ruleUid: string;
  readonly description: string;
  readonly status: CheckerStatus;
  readonly skipReason?: SkipReason;
  readonly summary: string;
  readonly issueCount: number;
  readonly durationMs: number;
}

export interface RunResult {
  /** Issues in checker declaration order */
  readonly issues: readonly Issue[];
  readonly checkers: readonly CheckerResult[];
  readonly fileVersion?: string;
  /** True when the Document Model could not be built */
  readonly fatal: boolean;
}

export interface RunOptions {
  readonly tolerances?: Partial<Tolerances>;
  readonly disabled?: readonly string[];
  readonly checkers?: readonly RegisteredChecker[];
  readonly logger?: StructuredLogger;
}

// ============================================================================
// Helpers
// ============================================================================

function skipSummary(reason: SkipReason, version: Version | undefined): string {
  switch (reason) {
    case 'disabled':
      return 'Disabled by configuration.';
    case 'precondition':
      return 'Preconditions are not satisfied.';
    case 'version_not_applicable':
      return `Not applicable to file version ${version === undefined ? 'unknown' : formatVersion(version)}.`;
    case 'version_unavailable':
      return 'File version is not available.';
  }
}

function skipReason(
  entry: RegisteredChecker,
  version: Version | undefined,
  disabled: ReadonlySet<string>,
  cleanlyCompleted: ReadonlySet<string>
): SkipReason | undefined {
  const { descriptor } = entry;
  if (disabled.has(descriptor.id)) return 'disabled';
  for (const precondition of descriptor.preconditions) {
    if (!cleanlyCompleted.has(precondition)) return 'precondition';
  }
  if (!descriptor.versionGated) return undefined;
  if (version === undefined) return 'version_unavailable';
  if (!isApplicable(entry.spec, entry.definitionVersion, version)) return 'version_not_applicable';
  return undefined;
}

/**
 * Result of a run aborted because the document could not be modelled
 */
export function documentErrorResult(error: DocumentBuildError): RunResult {
  return {
    fatal: true,
    checkers: [],
    issues: [
      {
        checkerId: DOCUMENT_CHECKER_ID,
        ruleUid: DOCUMENT_RULE_UID,
        severity: 'error',
        message: error.getSummary(),
        location: { description: error.problems[0]?.path ?? 'document' },
      },
    ],
  };
}

// ============================================================================
// Runs
// ============================================================================

/**
 * Run every checker over an already built document
 */
export function runCheckers(document: OpenDriveDocument, options: RunOptions = {}): RunResult {
  const log = options.logger ?? createLogger({ module: 'orchestrator' });
  const registry = options.checkers ?? validateRegistry();
  const tolerances: Tolerances = { ...DEFAULT_TOLERANCES, ...options.tolerances };
  const disabled = new Set(options.disabled ?? []);
  const version = fileVersion(document.header);

  const ctx: CheckContext = {
    document,
    topology: buildTopology(document),
    tolerances,
    logger: log,
  };

  const issues: Issue[] = [];
  const results: CheckerResult[] = [];
  const cleanlyCompleted = new Set<string>();

  for (const entry of registry) {
    const { descriptor } = entry;
    const base = { id: descriptor.id, ruleUid: descriptor.ruleUid, description: descriptor.description };

    const reason = skipReason(entry, version, disabled, cleanlyCompleted);
    if (reason !== undefined) {
      log.debug('Checker skipped', { checker: descriptor.id, reason });
      results.push({ ...base, status: 'skipped', skipReason: reason, summary: skipSummary(reason, version), issueCount: 0, durationMs: 0 });
      continue;
    }

    const startTime = Date.now();
    try {
      const findings = descriptor.check(ctx);
      const durationMs = Date.now() - startTime;
      for (const finding of findings) {
        issues.push({ ...finding, checkerId: descriptor.id, ruleUid: descriptor.ruleUid });
      }
      if (findings.length === 0) cleanlyCompleted.add(descriptor.id);

      log.debug('Checker completed', { checker: descriptor.id, issues: findings.length, durationMs });
      results.push({
        ...base,
        status: 'completed',
        summary: findings.length === 0 ? 'No issues found.' : `${findings.length} issue(s) found.`,
        issueCount: findings.length,
        durationMs,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.error('Checker failed', { checker: descriptor.id, error: message });
      results.push({ ...base, status: 'error', summary: message, issueCount: 0, durationMs: Date.now() - startTime });
    }
  }

  log.info('Checks finished', {
    checkers: results.length,
    issues: issues.length,
    version: version === undefined ? undefined : formatVersion(version),
  });

  return {
    fatal: false,
    issues,
    checkers: results,
    fileVersion: version === undefined ? undefined : formatVersion(version),
  };
}

/**
 * Build the Document Model from a document tree and run every checker
 *
 * A tree that cannot be turned into a Document Model yields exactly one
 * fatal issue and no checker results.
 */
export function runChecks(tree: unknown, options: RunOptions = {}): RunResult {
  const log = options.logger ?? createLogger({ module: 'orchestrator' });

  let document: OpenDriveDocument;
  try {
    document = buildDocument(tree);
  } catch (error) {
    if (error instanceof DocumentBuildError) {
      log.error('Document model could not be built', { problems: error.problems.length });
      return documentErrorResult(error);
    }
    throw error;
  }

  return runCheckers(document, { ...options, logger: log });
}
