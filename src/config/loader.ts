import { readFile } from 'node:fs/promises';
import { resolve, isAbsolute } from 'node:path';
import { ReconcileConfigSchema, type ReconcileConfig } from './schema.js';
import { exists } from '../util/fs.js';

export const DEFAULT_CONFIG_FILE = 'reconcile.config.json';

/**
 * Config as consumed by the runtime: every path is absolute.
 */
export type RuntimeConfig = Readonly<ReconcileConfig>;

export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'ConfigLoadError';
  }
}

export interface ConfigOverrides {
  fixture?: string;
  filter?: string;
  command?: string;
  cwd?: string;
  maxIterations?: number;
  timeout?: number;
  /** Validated against the strategy names by the schema. */
  strategies?: string[];
  logLevel?: string;
  report?: boolean;
}

function toAbsolute(path: string, base: string): string {
  return isAbsolute(path) ? path : resolve(base, path);
}

function formatIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues.map((i) => `  - ${i.path.join('.') || '(root)'}: ${i.message}`).join('\n');
}

/**
 * Load and validate a config file, layering CLI overrides on top before
 * validation so flags can supply required fields the file omits.
 *
 * A missing file is an error only when `configPath` was given explicitly;
 * otherwise the defaults plus overrides are used. Relative paths resolve
 * against the config file's directory (or the working directory).
 */
export async function loadConfig(
  configPath: string | undefined,
  overrides: ConfigOverrides = {},
): Promise<RuntimeConfig> {
  const absPath = toAbsolute(configPath ?? DEFAULT_CONFIG_FILE, process.cwd());
  const baseDir = resolve(absPath, '..');

  let raw: Record<string, unknown> = {};
  if (await exists(absPath)) {
    try {
      const parsed: unknown = JSON.parse(await readFile(absPath, 'utf-8'));
      if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new ConfigLoadError(`Config file must contain a JSON object: ${absPath}`);
      }
      raw = { ...parsed };
    } catch (err) {
      if (err instanceof ConfigLoadError) throw err;
      throw new ConfigLoadError(`Failed to parse config file: ${absPath}`, err);
    }
  } else if (configPath !== undefined) {
    throw new ConfigLoadError(`Config file not found: ${absPath}`);
  }

  const result = ReconcileConfigSchema.safeParse(applyOverrides(raw, overrides));
  if (!result.success) {
    throw new ConfigLoadError(`Invalid config:\n${formatIssues(result.error.issues)}`, result.error);
  }

  const config = result.data;
  return Object.freeze({
    ...config,
    fixture: toAbsolute(config.fixture, baseDir),
    cwd: toAbsolute(config.cwd, baseDir),
    stateDir: toAbsolute(config.stateDir, baseDir),
  });
}

/**
 * Merge CLI overrides into raw (unvalidated) config input. Undefined
 * overrides leave the file's value in place.
 */
export function applyOverrides(
  raw: Record<string, unknown>,
  overrides: ConfigOverrides,
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...raw };
  const cwd = process.cwd();

  // Paths given on the command line are relative to where the command runs.
  if (overrides.fixture != null) merged.fixture = toAbsolute(overrides.fixture, cwd);
  if (overrides.cwd != null) merged.cwd = toAbsolute(overrides.cwd, cwd);
  if (overrides.filter != null) merged.filter = overrides.filter;
  if (overrides.command != null) merged.command = overrides.command;
  if (overrides.maxIterations != null) merged.maxIterations = overrides.maxIterations;
  if (overrides.timeout != null) merged.timeout = overrides.timeout;
  if (overrides.logLevel != null) merged.logLevel = overrides.logLevel;
  if (overrides.report != null) merged.report = overrides.report;

  if (overrides.strategies && overrides.strategies.length > 0) {
    const current = merged.matching;
    const matching = typeof current === 'object' && current !== null ? current : {};
    merged.matching = { ...matching, strategies: overrides.strategies };
  }

  return merged;
}
