import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadConfig, applyOverrides, ConfigLoadError } from '../src/config/loader.js';

describe('loadConfig', () => {
  let tmpDir: string;
  let configPath: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), 'reconcile-config-test-'));
    configPath = join(tmpDir, 'reconcile.config.json');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(tmpDir, { recursive: true, force: true });
  });

  it('fills defaults and resolves paths against the config directory', async () => {
    await writeFile(configPath, JSON.stringify({ fixture: 'enginetest/queries/query_plans.go' }), 'utf-8');

    const config = await loadConfig(configPath);

    expect(config.fixture).toBe(join(tmpDir, 'enginetest/queries/query_plans.go'));
    expect(config.cwd).toBe(tmpDir);
    expect(config.stateDir).toBe(join(tmpDir, '.reconcile'));
    expect(config.command).toBe('go test -run {filter} ./...');
    expect(config.filter).toBe('');
    expect(config.maxIterations).toBe(5);
    expect(config.parser).toEqual({ marker: 'Not equal:', failureWord: 'FAIL' });
    expect(config.matching.strategies).toEqual([
      'exact-literal',
      'numeric-field',
      'context-block',
      'concatenated-literal',
    ]);
    expect(config.matching.contextRadius).toBe(2);
    expect(config.report).toBe(true);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('keeps absolute paths as given', async () => {
    await writeFile(configPath, JSON.stringify({ fixture: '/src/plans.go', cwd: '/src' }), 'utf-8');

    const config = await loadConfig(configPath);

    expect(config.fixture).toBe('/src/plans.go');
    expect(config.cwd).toBe('/src');
  });

  it('applies overrides on top of the file', async () => {
    await writeFile(configPath, JSON.stringify({ fixture: 'plans.go', maxIterations: 3, filter: 'TestA' }), 'utf-8');

    const config = await loadConfig(configPath, {
      maxIterations: 7,
      filter: 'TestQueryPlans',
      strategies: ['exact-literal'],
    });

    expect(config.maxIterations).toBe(7);
    expect(config.filter).toBe('TestQueryPlans');
    expect(config.matching.strategies).toEqual(['exact-literal']);
    expect(config.matching.contextRadius).toBe(2);
  });

  it('throws ConfigLoadError when an explicit config file is missing', async () => {
    await expect(loadConfig(join(tmpDir, 'nope.json'))).rejects.toThrow(/Config file not found/);
  });

  it('throws ConfigLoadError on malformed JSON', async () => {
    await writeFile(configPath, '{ fixture: ', 'utf-8');

    await expect(loadConfig(configPath)).rejects.toBeInstanceOf(ConfigLoadError);
  });

  it('throws ConfigLoadError when the file is not an object', async () => {
    await writeFile(configPath, '[]', 'utf-8');

    await expect(loadConfig(configPath)).rejects.toThrow(/must contain a JSON object/);
  });

  it('lists each schema violation', async () => {
    await writeFile(configPath, JSON.stringify({ fixture: 'plans.go', maxIterations: 0 }), 'utf-8');

    await expect(loadConfig(configPath)).rejects.toThrow(/maxIterations/);
  });

  it('rejects unknown strategy names', async () => {
    await writeFile(configPath, JSON.stringify({ fixture: 'plans.go' }), 'utf-8');

    await expect(loadConfig(configPath, { strategies: ['fuzzy'] })).rejects.toThrow(/matching\.strategies\.0/);
  });

  it('works without a config file when the fixture is given as an override', async () => {
    vi.spyOn(process, 'cwd').mockReturnValue(tmpDir);

    const config = await loadConfig(undefined, { fixture: 'plans.go' });

    expect(config.fixture).toBe(join(tmpDir, 'plans.go'));
    expect(config.stateDir).toBe(join(tmpDir, '.reconcile'));
  });

  it('requires a fixture', async () => {
    vi.spyOn(process, 'cwd').mockReturnValue(tmpDir);

    await expect(loadConfig(undefined)).rejects.toThrow(/fixture/);
  });
});

describe('applyOverrides', () => {
  it('leaves the input untouched when no overrides are set', () => {
    const raw = { fixture: 'a.go', maxIterations: 2 };
    expect(applyOverrides(raw, {})).toEqual(raw);
  });

  it('merges strategies into an existing matching block', () => {
    const merged = applyOverrides({ matching: { contextRadius: 1 } }, { strategies: ['context-block'] });
    expect(merged.matching).toEqual({ contextRadius: 1, strategies: ['context-block'] });
  });

  it('sets report to false when asked', () => {
    expect(applyOverrides({}, { report: false })).toEqual({ report: false });
  });
});
