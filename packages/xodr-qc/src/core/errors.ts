/**
 * Error types for the OpenDRIVE quality checker
 *
 * Rule violations are never thrown: they are reported as issues. The classes
 * below cover the failures that abort a run (an unusable document, a broken
 * checker registry or configuration) and evaluator domain errors.
 */

/**
 * One reason why a document tree could not be turned into a model
 */
export interface DocumentProblem {
  /** Path inside the document tree, e.g. `roads[2].lanes.laneSections[0]` */
  readonly path: string;
  readonly message: string;
}

/**
 * Error thrown when the Document Model cannot be built
 *
 * Carries every problem found so that a single run reports all of them.
 *
 * RECOVERY:
 * - Fix the listed structural problems in the input tree
 * - Re-run the schema front end if the tree was produced by one
 */
export class DocumentBuildError extends Error {
  constructor(
    public readonly problems: readonly DocumentProblem[]
  ) {
    super(`Document model could not be built (${problems.length} problem${problems.length === 1 ? '' : 's'})`);
    this.name = 'DocumentBuildError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DocumentBuildError);
    }
  }

  /**
   * Get formatted summary of the build problems
   */
  getSummary(): string {
    const lines: string[] = [`${this.message}:`];

    for (const problem of this.problems.slice(0, 10)) {
      lines.push(`  - ${problem.path || '<root>'}: ${problem.message}`);
    }

    if (this.problems.length > 10) {
      lines.push(`  ... and ${this.problems.length - 10} more problems`);
    }

    return lines.join('\n');
  }
}

/**
 * Error thrown when a geometry segment is evaluated outside its range
 */
export class OutOfRangeError extends Error {
  constructor(
    public readonly s: number,
    public readonly start: number,
    public readonly end: number
  ) {
    super(`s=${s} is outside the segment range [${start}, ${end}]`);
    this.name = 'OutOfRangeError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, OutOfRangeError);
    }
  }
}

/**
 * Error thrown for a malformed applicable-version specification or version
 */
export class VersionSpecError extends Error {
  constructor(
    message: string,
    public readonly input: string
  ) {
    super(`${message}: "${input}"`);
    this.name = 'VersionSpecError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, VersionSpecError);
    }
  }
}

/**
 * Error thrown when the checker registry is inconsistent
 *
 * This is a programming defect and is raised at start-up, before any file
 * is processed.
 */
export class RegistryError extends Error {
  constructor(
    message: string,
    public readonly checkerId: string
  ) {
    super(`${checkerId}: ${message}`);
    this.name = 'RegistryError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RegistryError);
    }
  }
}

/**
 * Error thrown when the configuration is invalid
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(issues.length > 0 ? `${message}:\n${issues.map((i) => `  - ${i}`).join('\n')}` : message);
    this.name = 'ConfigError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigError);
    }
  }
}
