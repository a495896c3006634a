/**
 * Tests for report building and formatting
 */

import { describe, it, expect } from 'vitest';
import {
  EXIT_CODES,
  buildReport,
  csvEscape,
  describeLocation,
  formatCsv,
  formatSummary,
  formatTable,
  getExitCode,
} from '../../../cli/lib/report.js';
import type { CheckerResult, RunResult } from '../../../orchestrator/run-checks.js';
import type { Issue } from '../../../checks/types.js';

const TIMESTAMP = '2026-01-01T00:00:00.000Z';

function createResult(id: string, overrides: Partial<CheckerResult> = {}): CheckerResult {
  return {
    id,
    ruleUid: `asam.net:xodr:1.7.0:${id}`,
    description: id,
    status: 'completed',
    summary: 'No issues found.',
    issueCount: 0,
    durationMs: 2,
    ...overrides,
  };
}

function createIssue(checkerId: string, overrides: Partial<Issue> = {}): Issue {
  return {
    checkerId,
    ruleUid: `asam.net:xodr:1.7.0:${checkerId}`,
    severity: 'error',
    message: 'Something is wrong.',
    location: { roadId: '1', s: 10, laneId: -1 },
    ...overrides,
  };
}

function createRun(checkers: readonly CheckerResult[], issues: readonly Issue[] = []): RunResult {
  return { fatal: false, checkers, issues, fileVersion: '1.7.0' };
}

describe('Report - Status', () => {
  it('should pass when every checker completes cleanly', () => {
    const report = buildReport('net.json', createRun([createResult('a'), createResult('b')]), TIMESTAMP);

    expect(report.overallStatus).toBe('pass');
    expect(report.summary).toEqual({
      total: 2,
      passed: 2,
      failed: 0,
      warnings: 0,
      skipped: 0,
      errors: 0,
      totalDurationMs: 4,
    });
    expect(getExitCode(report)).toBe(EXIT_CODES.SUCCESS);
  });

  it('should warn when only warnings are reported', () => {
    const report = buildReport(
      'net.json',
      createRun([createResult('a', { issueCount: 1 })], [createIssue('a', { severity: 'warning' })]),
      TIMESTAMP
    );

    expect(report.entries[0]?.status).toBe('warn');
    expect(getExitCode(report)).toBe(EXIT_CODES.VALIDATION_WARNING);
  });

  it('should fail on an error issue or a failed checker', () => {
    const withIssue = buildReport('net.json', createRun([createResult('a', { issueCount: 1 })], [createIssue('a')]), TIMESTAMP);
    const withError = buildReport('net.json', createRun([createResult('a', { status: 'error', summary: 'boom' })]), TIMESTAMP);

    expect(getExitCode(withIssue)).toBe(EXIT_CODES.VALIDATION_ERROR);
    expect(withError.overallStatus).toBe('fail');
    expect(withError.summary.errors).toBe(1);
  });

  it('should be skipped when nothing ran', () => {
    const report = buildReport(
      'net.json',
      createRun([createResult('a', { status: 'skipped', skipReason: 'precondition' })]),
      TIMESTAMP
    );

    expect(report.overallStatus).toBe('skip');
    expect(getExitCode(report)).toBe(EXIT_CODES.SUCCESS);
  });

  it('should report a fatal run as a single document entry', () => {
    const report = buildReport(
      'broken.json',
      { fatal: true, checkers: [], issues: [createIssue('document_model', { message: 'unusable', location: {} })] },
      TIMESTAMP
    );

    expect(report.entries).toEqual([
      {
        id: 'document_model',
        ruleUid: 'asam.net:xodr:1.0.0:xml.valid_schema',
        status: 'fail',
        message: 'unusable',
        issueCount: 1,
        durationMs: 0,
      },
    ]);
    expect(getExitCode(report)).toBe(EXIT_CODES.DOCUMENT_ERROR);
  });
});

describe('Report - Formatting', () => {
  const report = buildReport(
    'net.json',
    createRun([createResult('a', { issueCount: 1 }), createResult('b')], [createIssue('a', { message: 'Gap, "wide".' })]),
    TIMESTAMP
  );

  it('should describe issue locations', () => {
    expect(describeLocation({ roadId: '4', junctionId: '9', connectionId: '2', s: 1.5, laneId: 2 })).toBe(
      'road=4 junction=9 connection=2 s=1.5 lane=2'
    );
    expect(describeLocation({})).toBe('');
  });

  it('should write one CSV row per issue', () => {
    expect(formatCsv(report).split('\n')).toEqual([
      'checker_id,rule_uid,severity,road_id,junction_id,s,lane_id,message',
      'a,asam.net:xodr:1.7.0:a,error,1,,10,-1,"Gap, ""wide""."',
    ]);
  });

  it('should escape only values that need it', () => {
    expect(csvEscape('plain')).toBe('plain');
    expect(csvEscape('a\nb')).toBe('"a\nb"');
  });

  it('should summarise in one line', () => {
    expect(formatSummary(report, false)).toBe('[FAIL] net.json: 1/2 passed, 1 issue(s)');
  });

  it('should list entries and issues in the table', () => {
    const lines = formatTable(report, false).split('\n');

    expect(lines).toContain('CHECK REPORT: net.json');
    expect(lines).toContain('File version: 1.7.0');
    expect(lines).toContain('[FAIL]  1       a');
    expect(lines).toContain('  ERROR a (road=1 s=10 lane=-1)');
  });
});
