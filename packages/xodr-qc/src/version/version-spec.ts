/**
 * Applicable-version specifications
 *
 * Grammar (whitespace is ignored, empty clauses are dropped):
 *
 *   spec    := clause ("," clause)*
 *   clause  := op version
 *   op      := "<" | "<=" | ">" | ">="
 *   version := int "." int "." int
 *
 * A specification is the conjunction of its clauses. The empty
 * specification matches every version.
 *
 * @module version/version-spec
 */

import { VersionSpecError } from '../core/errors.js';
import { compareVersions, formatVersion, type Version } from './version.js';

export type BoundOperator = '<' | '<=' | '>' | '>=';

export interface VersionBound {
  readonly op: BoundOperator;
  readonly version: Version;
}

export interface VersionSpec {
  readonly source: string;
  readonly bounds: readonly VersionBound[];
}

// ============================================================================
// Parser
// ============================================================================

class SpecParser {
  private pos = 0;

  constructor(
    private readonly text: string,
    private readonly source: string
  ) {}

  parse(): VersionBound[] {
    const bounds: VersionBound[] = [];
    while (this.pos < this.text.length) {
      if (this.peek() === ',') {
        this.pos++;
        continue;
      }
      bounds.push(this.clause());
      if (this.pos < this.text.length && this.peek() !== ',') {
        this.fail(`Unexpected "${this.peek()}"`);
      }
    }
    return bounds;
  }

  private clause(): VersionBound {
    const op = this.operator();
    return { op, version: this.version() };
  }

  private operator(): BoundOperator {
    const c = this.peek();
    if (c !== '<' && c !== '>') this.fail('Expected one of <, <=, >, >=');
    this.pos++;
    if (this.peek() === '=') {
      this.pos++;
      return c === '<' ? '<=' : '>=';
    }
    return c === '<' ? '<' : '>';
  }

  private version(): Version {
    const major = this.integer();
    this.expect('.');
    const minor = this.integer();
    this.expect('.');
    const patch = this.integer();
    return { major, minor, patch };
  }

  private integer(): number {
    const start = this.pos;
    while (/[0-9]/.test(this.peek())) this.pos++;
    if (start === this.pos) this.fail('Expected a full major.minor.patch version');
    return Number(this.text.slice(start, this.pos));
  }

  private expect(c: string): void {
    if (this.peek() !== c) this.fail('Expected a full major.minor.patch version');
    this.pos++;
  }

  private peek(): string {
    return this.text.charAt(this.pos);
  }

  private fail(message: string): never {
    throw new VersionSpecError(message, this.source);
  }
}

/**
 * Parse an applicable-version specification
 *
 * @throws VersionSpecError for unknown operators or partial versions
 */
export function parseVersionSpec(input: string): VersionSpec {
  const text = input.replace(/\s+/g, '');
  return { source: input, bounds: new SpecParser(text, input).parse() };
}

// ============================================================================
// Evaluation
// ============================================================================

function satisfies(version: Version, bound: VersionBound): boolean {
  const cmp = compareVersions(version, bound.version);
  switch (bound.op) {
    case '<':
      return cmp < 0;
    case '<=':
      return cmp <= 0;
    case '>':
      return cmp > 0;
    case '>=':
      return cmp >= 0;
  }
}

export function matchesSpec(spec: VersionSpec, version: Version): boolean {
  return spec.bounds.every((bound) => satisfies(version, bound));
}

export function hasLowerBound(spec: VersionSpec): boolean {
  return spec.bounds.some((bound) => bound.op === '>' || bound.op === '>=');
}

/**
 * Canonical text of the bounds, independent of clause order
 */
export function canonicalSpec(spec: VersionSpec): string {
  return spec.bounds
    .map((bound) => `${bound.op}${formatVersion(bound.version)}`)
    .sort()
    .join(',');
}

/**
 * Whether a rule applies to a file version
 *
 * Without a lower bound in the specification the rule's definition version
 * acts as the lower bound.
 */
export function isApplicable(
  spec: VersionSpec | undefined,
  definition: Version,
  version: Version
): boolean {
  if (spec !== undefined && !matchesSpec(spec, version)) return false;
  if (spec !== undefined && hasLowerBound(spec)) return true;
  return compareVersions(version, definition) >= 0;
}
