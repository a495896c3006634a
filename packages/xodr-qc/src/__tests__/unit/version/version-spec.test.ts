/**
 * Tests for the applicable-version specification parser
 */

import { describe, it, expect } from 'vitest';
import {
  canonicalSpec,
  hasLowerBound,
  matchesSpec,
  parseVersionSpec,
} from '../../../version/version-spec.js';
import { parseVersion } from '../../../version/version.js';
import { VersionSpecError } from '../../../core/errors.js';

describe('VersionSpec - Parsing', () => {
  it('should parse every operator', () => {
    const spec = parseVersionSpec('<1.0.0,<=2.0.0,>3.0.0,>=4.0.0');
    expect(spec.bounds.map((b) => b.op)).toEqual(['<', '<=', '>', '>=']);
    expect(spec.bounds[3]?.version).toEqual({ major: 4, minor: 0, patch: 0 });
  });

  it('should ignore whitespace and empty clauses', () => {
    const spec = parseVersionSpec(' >= 1.6.0 ,, < 1.8.0 ,');
    expect(canonicalSpec(spec)).toBe('<1.8.0,>=1.6.0');
  });

  it('should parse the empty specification as matching every version', () => {
    const spec = parseVersionSpec('');
    expect(spec.bounds).toHaveLength(0);
    expect(matchesSpec(spec, parseVersion('0.0.1'))).toBe(true);
  });

  it('should reject unknown operators', () => {
    expect(() => parseVersionSpec('==1.6.0')).toThrow(VersionSpecError);
    expect(() => parseVersionSpec('~1.6.0')).toThrow(VersionSpecError);
    expect(() => parseVersionSpec('1.6.0')).toThrow(VersionSpecError);
  });

  it('should reject partial versions', () => {
    expect(() => parseVersionSpec('>=1.6')).toThrow(VersionSpecError);
    expect(() => parseVersionSpec('<1')).toThrow(VersionSpecError);
  });

  it('should reject clauses that are not comma separated', () => {
    expect(() => parseVersionSpec('>=1.6.0<1.8.0')).toThrow(VersionSpecError);
  });

  it('should name the offending input in the error', () => {
    expect(() => parseVersionSpec('>=1.x.0')).toThrow('">=1.x.0"');
  });
});

describe('VersionSpec - Matching', () => {
  it('should treat a specification as the conjunction of its clauses', () => {
    const spec = parseVersionSpec('>1.4.0,<=1.7.0');
    expect(matchesSpec(spec, parseVersion('1.4.0'))).toBe(false);
    expect(matchesSpec(spec, parseVersion('1.4.1'))).toBe(true);
    expect(matchesSpec(spec, parseVersion('1.7.0'))).toBe(true);
    expect(matchesSpec(spec, parseVersion('1.7.1'))).toBe(false);
  });

  it('should detect lower bounds', () => {
    expect(hasLowerBound(parseVersionSpec('>1.4.0'))).toBe(true);
    expect(hasLowerBound(parseVersionSpec('>=1.4.0'))).toBe(true);
    expect(hasLowerBound(parseVersionSpec('<1.8.0,<=1.9.0'))).toBe(false);
  });
});
