/**
 * Check Report Formatter
 *
 * Turns a run result into per-checker entries with a summary and renders it
 * as table, JSON, one-line summary or CSV.
 *
 * @module cli/lib/report
 */

import { DOCUMENT_CHECKER_ID, DOCUMENT_RULE_UID } from '../../core/constants.js';
import type { Issue, IssueLocation } from '../../checks/types.js';
import type { CheckerResult, RunResult } from '../../orchestrator/run-checks.js';

// =============================================================================
// Types
// =============================================================================

export type ValidationStatus = 'pass' | 'fail' | 'warn' | 'skip';

export const REPORT_FORMATS = ['table', 'json', 'summary', 'csv'] as const;

export type ReportFormat = (typeof REPORT_FORMATS)[number];

/**
 * One checker in the report
 */
export interface ReportEntry {
  readonly id: string;
  readonly ruleUid: string;
  readonly status: ValidationStatus;
  readonly message: string;
  readonly issueCount: number;
  readonly durationMs: number;
}

export interface ReportSummary {
  readonly total: number;
  readonly passed: number;
  readonly failed: number;
  readonly warnings: number;
  readonly skipped: number;
  readonly errors: number;
  readonly totalDurationMs: number;
}

export interface CheckReport {
  readonly timestamp: string;
  readonly file: string;
  readonly fileVersion?: string;
  readonly summary: ReportSummary;
  readonly entries: readonly ReportEntry[];
  readonly issues: readonly Issue[];
  readonly overallStatus: ValidationStatus;
  /** The document could not be turned into a model */
  readonly fatal: boolean;
}

// =============================================================================
// Status Icons (ASCII-safe for CI compatibility)
// =============================================================================

const STATUS_ICONS: Record<ValidationStatus, string> = {
  pass: '[PASS]',
  fail: '[FAIL]',
  warn: '[WARN]',
  skip: '[SKIP]',
};

const STATUS_COLORS: Record<ValidationStatus, string> = {
  pass: '\x1b[32m',
  fail: '\x1b[31m',
  warn: '\x1b[33m',
  skip: '\x1b[90m',
};

const RESET = '\x1b[0m';

// =============================================================================
// Report Builder
// =============================================================================

function entryStatus(result: CheckerResult, issues: readonly Issue[]): ValidationStatus {
  switch (result.status) {
    case 'skipped':
      return 'skip';
    case 'error':
      return 'fail';
    case 'completed': {
      const own = issues.filter((issue) => issue.checkerId === result.id);
      if (own.some((issue) => issue.severity === 'error')) return 'fail';
      return own.length > 0 ? 'warn' : 'pass';
    }
  }
}

/**
 * Build a report from a run result
 */
export function buildReport(file: string, run: RunResult, timestamp = new Date().toISOString()): CheckReport {
  const entries: ReportEntry[] = run.fatal
    ? [
        {
          id: DOCUMENT_CHECKER_ID,
          ruleUid: DOCUMENT_RULE_UID,
          status: 'fail',
          message: run.issues[0]?.message ?? 'Document model could not be built.',
          issueCount: run.issues.length,
          durationMs: 0,
        },
      ]
    : run.checkers.map((result) => ({
        id: result.id,
        ruleUid: result.ruleUid,
        status: entryStatus(result, run.issues),
        message: result.summary,
        issueCount: result.issueCount,
        durationMs: result.durationMs,
      }));

  const count = (status: ValidationStatus): number => entries.filter((e) => e.status === status).length;
  const summary: ReportSummary = {
    total: entries.length,
    passed: count('pass'),
    failed: count('fail'),
    warnings: count('warn'),
    skipped: count('skip'),
    errors: run.checkers.filter((c) => c.status === 'error').length,
    totalDurationMs: entries.reduce((sum, e) => sum + e.durationMs, 0),
  };

  let overallStatus: ValidationStatus;
  if (summary.failed > 0) {
    overallStatus = 'fail';
  } else if (summary.warnings > 0) {
    overallStatus = 'warn';
  } else if (summary.skipped === summary.total) {
    overallStatus = 'skip';
  } else {
    overallStatus = 'pass';
  }

  return {
    timestamp,
    file,
    fileVersion: run.fileVersion,
    summary,
    entries,
    issues: run.issues,
    overallStatus,
    fatal: run.fatal,
  };
}

// =============================================================================
// Formatters
// =============================================================================

export function describeLocation(location: IssueLocation): string {
  const parts: string[] = [];
  if (location.roadId !== undefined) parts.push(`road=${location.roadId}`);
  if (location.junctionId !== undefined) parts.push(`junction=${location.junctionId}`);
  if (location.connectionId !== undefined) parts.push(`connection=${location.connectionId}`);
  if (location.s !== undefined) parts.push(`s=${location.s}`);
  if (location.laneId !== undefined) parts.push(`lane=${location.laneId}`);
  return parts.join(' ');
}

export function formatJson(report: CheckReport): string {
  return JSON.stringify(report, null, 2);
}

export function formatTable(report: CheckReport, useColor = true): string {
  const icon = (status: ValidationStatus): string =>
    useColor ? `${STATUS_COLORS[status]}${STATUS_ICONS[status]}${RESET}` : STATUS_ICONS[status];
  const lines: string[] = [];
  const { summary } = report;

  lines.push('');
  lines.push('='.repeat(80));
  lines.push(`CHECK REPORT: ${report.file}`);
  lines.push('='.repeat(80));
  lines.push(`Timestamp: ${report.timestamp}`);
  lines.push(`File version: ${report.fileVersion ?? 'unknown'}`);
  lines.push('');
  lines.push(`Overall Status: ${icon(report.overallStatus)}`);
  lines.push(
    `Total: ${summary.total} | Passed: ${summary.passed} | Failed: ${summary.failed} | Warnings: ${summary.warnings} | Skipped: ${summary.skipped}`
  );
  lines.push('');

  if (report.entries.length > 0) {
    lines.push('-'.repeat(80));
    lines.push(padEnd('Status', 8) + padEnd('Issues', 8) + 'Checker');
    lines.push('-'.repeat(80));
    for (const entry of report.entries) {
      // Colour codes do not count towards the column width
      const width = useColor ? 8 + STATUS_COLORS[entry.status].length + RESET.length : 8;
      lines.push(padEnd(icon(entry.status), width) + padEnd(String(entry.issueCount), 8) + entry.id);
    }
    lines.push('-'.repeat(80));
  }

  if (report.issues.length > 0) {
    lines.push('');
    lines.push('ISSUES:');
    lines.push('-'.repeat(80));
    for (const issue of report.issues) {
      const where = describeLocation(issue.location);
      lines.push(`  ${issue.severity.toUpperCase()} ${issue.checkerId}${where === '' ? '' : ` (${where})`}`);
      lines.push(`    ${issue.message}`);
    }
    lines.push('');
  }

  lines.push('='.repeat(80));
  return lines.join('\n');
}

/**
 * One-line summary
 */
export function formatSummary(report: CheckReport, useColor = true): string {
  const statusIcon = useColor
    ? `${STATUS_COLORS[report.overallStatus]}${STATUS_ICONS[report.overallStatus]}${RESET}`
    : STATUS_ICONS[report.overallStatus];
  const { summary } = report;
  return `${statusIcon} ${report.file}: ${summary.passed}/${summary.total} passed, ${report.issues.length} issue(s)`;
}

/**
 * One CSV row per issue
 */
export function formatCsv(report: CheckReport): string {
  const lines = ['checker_id,rule_uid,severity,road_id,junction_id,s,lane_id,message'];

  for (const issue of report.issues) {
    const { location } = issue;
    lines.push(
      [
        csvEscape(issue.checkerId),
        csvEscape(issue.ruleUid),
        issue.severity,
        csvEscape(location.roadId ?? ''),
        csvEscape(location.junctionId ?? ''),
        location.s?.toString() ?? '',
        location.laneId?.toString() ?? '',
        csvEscape(issue.message),
      ].join(',')
    );
  }

  return lines.join('\n');
}

export function formatReport(
  report: CheckReport,
  format: ReportFormat,
  options: { color?: boolean } = {}
): string {
  const useColor = options.color ?? process.stdout.isTTY ?? false;

  switch (format) {
    case 'json':
      return formatJson(report);
    case 'table':
      return formatTable(report, useColor);
    case 'summary':
      return formatSummary(report, useColor);
    case 'csv':
      return formatCsv(report);
  }
}

// =============================================================================
// Utility Functions
// =============================================================================

function padEnd(str: string, length: number): string {
  return str.padEnd(length);
}

export function csvEscape(str: string): string {
  if (str.includes(',') || str.includes('"') || str.includes('\n')) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

// =============================================================================
// Exit Codes
// =============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  VALIDATION_WARNING: 1,
  VALIDATION_ERROR: 2,
  CONFIG_ERROR: 3,
  DOCUMENT_ERROR: 5,
} as const;

export function getExitCode(report: CheckReport): number {
  if (report.fatal) return EXIT_CODES.DOCUMENT_ERROR;

  switch (report.overallStatus) {
    case 'pass':
    case 'skip':
      return EXIT_CODES.SUCCESS;
    case 'warn':
      return EXIT_CODES.VALIDATION_WARNING;
    case 'fail':
      return EXIT_CODES.VALIDATION_ERROR;
  }
}
