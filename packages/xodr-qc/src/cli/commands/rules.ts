/**
 * Rules Command
 *
 * Lists the registered checkers in execution order.
 *
 * @module cli/commands/rules
 */

import { validateRegistry } from '../../checks/registry.js';
import { formatVersion } from '../../version/version.js';
import { canonicalSpec } from '../../version/version-spec.js';
import type { CLILogger } from '../lib/logger.js';

export interface RuleRow {
  readonly [key: string]: string;
  readonly id: string;
  readonly rule: string;
  readonly since: string;
  readonly applies: string;
}

export function listRules(): RuleRow[] {
  return validateRegistry().map(({ descriptor, definitionVersion, spec }) => ({
    id: descriptor.id,
    rule: descriptor.ruleUid,
    since: formatVersion(definitionVersion),
    applies: spec === undefined ? '' : canonicalSpec(spec),
  }));
}

/**
 * @returns process exit code
 */
export function rulesCommand(logger: CLILogger, print: (text: string) => void = console.log): number {
  print(logger.table(listRules(), ['id', 'since', 'applies']));
  return 0;
}
