/**
 * CLI Configuration Management
 *
 * Loads configuration from an rc file (YAML or JSON) with environment
 * variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (XODR_QC_*)
 * 3. Config file (.xodr-qcrc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { DEFAULT_TOLERANCES, type Tolerances } from '../../core/constants.js';
import { ConfigError } from '../../core/errors.js';
import { REPORT_FORMATS, type ReportFormat } from './report.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface CLIConfig {
  /** Configuration file version */
  readonly version: number;
  readonly tolerances: Tolerances;
  /** Checker ids that are not run */
  readonly disabled: readonly string[];
  readonly format: ReportFormat;

  // Runtime overrides (from CLI flags)
  readonly verbose: boolean;
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

const positive = z.number().finite().positive();

/**
 * Config file structure
 */
const ConfigFileSchema = z.object({
  version: z.number().int().optional(),
  tolerances: z
    .object({
      float_epsilon: positive.optional(),
      length_match: positive.optional(),
      contact_gap: positive.optional(),
      contact_point: positive.optional(),
      sample_step: positive.optional(),
    })
    .optional(),
  disabled: z.array(z.string()).optional(),
  format: z.enum(REPORT_FORMATS).optional(),
});

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Pick<CLIConfig, 'version' | 'tolerances' | 'disabled' | 'format'> = {
  version: 1,
  tolerances: DEFAULT_TOLERANCES,
  disabled: [],
  format: 'table',
};

// ============================================================================
// Configuration Loading
// ============================================================================

export const CONFIG_FILE_NAMES = ['.xodr-qcrc', '.xodr-qcrc.yaml', '.xodr-qcrc.yml', '.xodr-qcrc.json'];

const ENV_PREFIX = 'XODR_QC_';

const TOLERANCE_NAMES: readonly (keyof Tolerances)[] = [
  'floatEpsilon',
  'lengthMatch',
  'contactGap',
  'contactPoint',
  'sampleStep',
];

/**
 * Find config file in the start directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Parse and validate config file content (YAML also reads plain JSON)
 */
export function parseConfigFile(filePath: string): ConfigFile {
  const content = readFileSync(filePath, 'utf-8');

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigError(`Config file ${filePath} is not valid YAML or JSON`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  const result = ConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(
      `Invalid config file ${filePath}`,
      result.error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`)
    );
  }
  return result.data;
}

type Env = Readonly<Record<string, string | undefined>>;

function getEnvVar(env: Env, name: string): string | undefined {
  const value = env[`${ENV_PREFIX}${name}`];
  return value === '' ? undefined : value;
}

function getEnvBool(env: Env, name: string): boolean | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

function getEnvNumber(env: Env, name: string): number | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  const num = Number(value);
  if (!Number.isFinite(num)) {
    throw new ConfigError(`${ENV_PREFIX}${name} is not a number: ${value}`);
  }
  return num;
}

function getEnvList(env: Env, name: string): string[] | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

function getEnvFormat(env: Env): ReportFormat | undefined {
  const value = getEnvVar(env, 'FORMAT');
  if (value === undefined) return undefined;
  const result = z.enum(REPORT_FORMATS).safeParse(value);
  if (!result.success) {
    throw new ConfigError(`Invalid ${ENV_PREFIX}FORMAT: ${value}. Must be one of: ${REPORT_FORMATS.join(', ')}`);
  }
  return result.data;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Directory the rc file search starts from */
  cwd?: string;
  env?: Env;
  /** CLI flag overrides */
  overrides?: {
    verbose?: boolean;
    json?: boolean;
    format?: ReportFormat;
    gapTolerance?: number;
    disabled?: readonly string[];
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigError when a source is missing, unreadable or invalid
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CLIConfig> {
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};

  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  const explicitPath = options.configPath ?? getEnvVar(env, 'CONFIG');
  if (explicitPath !== undefined) {
    configPath = resolve(options.cwd ?? process.cwd(), explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(options.cwd ?? process.cwd());
    if (configPath !== null) {
      fileConfig = parseConfigFile(configPath);
    }
  }

  const fileTolerances = fileConfig.tolerances ?? {};
  const defaults = DEFAULT_CONFIG.tolerances;

  return {
    version: fileConfig.version ?? DEFAULT_CONFIG.version,

    tolerances: {
      floatEpsilon: getEnvNumber(env, 'FLOAT_EPSILON') ?? fileTolerances.float_epsilon ?? defaults.floatEpsilon,
      lengthMatch: getEnvNumber(env, 'LENGTH_TOLERANCE') ?? fileTolerances.length_match ?? defaults.lengthMatch,
      contactGap:
        overrides.gapTolerance ?? getEnvNumber(env, 'GAP_TOLERANCE') ?? fileTolerances.contact_gap ?? defaults.contactGap,
      contactPoint: getEnvNumber(env, 'CONTACT_TOLERANCE') ?? fileTolerances.contact_point ?? defaults.contactPoint,
      sampleStep: getEnvNumber(env, 'SAMPLE_STEP') ?? fileTolerances.sample_step ?? defaults.sampleStep,
    },

    disabled: overrides.disabled ?? getEnvList(env, 'DISABLE') ?? fileConfig.disabled ?? DEFAULT_CONFIG.disabled,
    format: overrides.format ?? getEnvFormat(env) ?? fileConfig.format ?? DEFAULT_CONFIG.format,

    verbose: overrides.verbose ?? getEnvBool(env, 'VERBOSE') ?? false,
    json: overrides.json ?? getEnvBool(env, 'JSON') ?? false,
    configPath,
  };
}

/**
 * Validate configuration
 *
 * @throws ConfigError listing every invalid setting
 */
export function validateConfig(config: CLIConfig): void {
  const issues: string[] = [];

  if (config.version !== 1) {
    issues.push(`Unsupported config version: ${config.version}. Expected 1.`);
  }

  for (const name of TOLERANCE_NAMES) {
    const value = config.tolerances[name];
    if (!Number.isFinite(value) || value <= 0) {
      issues.push(`Tolerance ${name} must be a positive number, got ${value}`);
    }
  }

  if (!REPORT_FORMATS.some((format) => format === config.format)) {
    issues.push(`Invalid format: ${config.format}. Must be one of: ${REPORT_FORMATS.join(', ')}`);
  }

  if (issues.length > 0) {
    throw new ConfigError('Invalid configuration', issues);
  }
}
