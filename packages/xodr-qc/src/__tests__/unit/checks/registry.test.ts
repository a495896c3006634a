/**
 * Tests for the checker registry
 */

import { describe, it, expect } from 'vitest';
import { CHECKERS, validateRegistry } from '../../../checks/registry.js';
import { defineChecker } from '../../../checks/issues.js';
import { fileheaderIsPresent } from '../../../checks/basic/fileheader-is-present.js';
import { RegistryError } from '../../../core/errors.js';

describe('Checker Registry - Catalogue', () => {
  it('should register every checker once', () => {
    const registered = validateRegistry();
    const ids = registered.map((entry) => entry.descriptor.id);

    expect(registered).toHaveLength(23);
    expect(new Set(ids).size).toBe(ids.length);
  });

  it('should start with the basic checkers', () => {
    expect(CHECKERS.slice(0, 2).map((c) => c.id)).toEqual([
      'check_asam_xodr_xml_fileheader_is_present',
      'check_asam_xodr_xml_version_is_defined',
    ]);
  });

  it('should derive ids from rule names', () => {
    for (const checker of CHECKERS) {
      const rule = checker.ruleUid.split(':')[3] ?? '';
      expect(checker.id).toBe(`check_asam_xodr_${rule.replace(/\./g, '_')}`);
    }
  });

  it('should resolve definition versions and applicable-version specs', () => {
    const entry = validateRegistry().find(
      (e) => e.descriptor.id === 'check_asam_xodr_junctions_connection_one_connection_element'
    );
    expect(entry?.definitionVersion).toEqual({ major: 1, minor: 7, patch: 0 });
    expect(entry?.spec?.bounds).toEqual([{ op: '<=', version: { major: 1, minor: 7, patch: 0 } }]);
  });
});

describe('Checker Registry - Validation', () => {
  const dependent = defineChecker({
    ruleUid: 'asam.net:xodr:1.0.0:test.dependent',
    description: 'Depends on the header checker',
    preconditions: new Set([fileheaderIsPresent.id]),
    check: () => [],
  });

  it('should reject duplicate ids', () => {
    expect(() => validateRegistry([fileheaderIsPresent, fileheaderIsPresent])).toThrow(RegistryError);
  });

  it('should reject a precondition declared after the checker', () => {
    expect(() => validateRegistry([dependent, fileheaderIsPresent])).toThrow(
      "check_asam_xodr_test_dependent: Precondition 'check_asam_xodr_xml_fileheader_is_present' is not declared before the checker"
    );
  });

  it('should accept preconditions declared earlier', () => {
    expect(validateRegistry([fileheaderIsPresent, dependent])).toHaveLength(2);
  });
});
