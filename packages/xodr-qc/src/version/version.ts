/**
 * OpenDRIVE version values
 *
 * @module version/version
 */

import { MAX_UNSIGNED_SHORT } from '../core/constants.js';
import { VersionSpecError } from '../core/errors.js';
import type { FileHeader } from '../model/types.js';

export interface Version {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
}

const FULL_VERSION = /^(\d+)\.(\d+)\.(\d+)$/;

/**
 * Parse a full `major.minor.patch` version
 *
 * @throws VersionSpecError for partial or malformed versions
 */
export function parseVersion(input: string): Version {
  const match = FULL_VERSION.exec(input.trim());
  if (match === null) {
    throw new VersionSpecError('Expected a full major.minor.patch version', input);
  }
  return {
    major: Number(match[1]),
    minor: Number(match[2]),
    patch: Number(match[3]),
  };
}

export function compareVersions(a: Version, b: Version): number {
  return a.major - b.major || a.minor - b.minor || a.patch - b.patch;
}

export function formatVersion(v: Version): string {
  return `${v.major}.${v.minor}.${v.patch}`;
}

/**
 * Interpret a raw header revision value as an unsigned short
 */
export function toUnsignedShort(value: number | string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const text = typeof value === 'number' ? String(value) : value.trim();
  if (!/^\d+$/.test(text)) return undefined;
  const n = Number(text);
  return n <= MAX_UNSIGNED_SHORT ? n : undefined;
}

/**
 * File version `revMajor.revMinor.0`, or undefined when the header does not
 * declare a usable one
 */
export function fileVersion(header: FileHeader | null): Version | undefined {
  if (header === null) return undefined;
  const major = toUnsignedShort(header.revMajor);
  const minor = toUnsignedShort(header.revMinor);
  if (major === undefined || minor === undefined) return undefined;
  return { major, minor, patch: 0 };
}

/**
 * Version in which a rule was defined: third segment of its UID
 * (`asam.net:xodr:X.Y.Z:rule.name`)
 */
export function ruleDefinitionVersion(ruleUid: string): Version {
  const parts = ruleUid.split(':');
  const segment = parts[2];
  if (parts.length !== 4 || segment === undefined) {
    throw new VersionSpecError('Malformed rule UID', ruleUid);
  }
  return parseVersion(segment);
}

/** Full rule name, the last UID segment */
export function ruleFullName(ruleUid: string): string {
  const parts = ruleUid.split(':');
  return parts[parts.length - 1] ?? ruleUid;
}
