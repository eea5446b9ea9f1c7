import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  applyEnvOverrides,
  DEFAULT_CONFIG,
  getConfigPath,
  mergeWithDefaults,
  readConfig,
  resolveConfig,
} from '../../src/config/orchestrator-config.js';

describe('orchestrator config', () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'orchestrator-config-'));
    configPath = path.join(tempDir, 'orchestrator.json');
    vi.stubEnv('ORCHESTRATOR_CONFIG_PATH', configPath);
    vi.stubEnv('ORCHESTRATOR_STEP_TIMEOUT_MS', '');
    vi.stubEnv('ORCHESTRATOR_WORKFLOW_TIMEOUT_MS', '');
    vi.stubEnv('ORCHESTRATOR_MAX_CONCURRENT_STEPS', '');
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('resolves the path from the override, then the environment', () => {
    expect(getConfigPath()).toBe(path.resolve(configPath));
    expect(getConfigPath('custom.json')).toBe(path.resolve('custom.json'));
  });

  it('loads defaults when the file is missing', async () => {
    await expect(readConfig()).resolves.toEqual(DEFAULT_CONFIG);
  });

  it('merges the file over defaults', async () => {
    await fs.writeFile(
      configPath,
      JSON.stringify({ execution: { stepTimeoutMs: 1500 }, events: { publishStepEvents: false } }),
      'utf8',
    );

    const config = await readConfig();

    expect(config.execution).toEqual({ stepTimeoutMs: 1500, workflowTimeoutMs: 0, maxConcurrentSteps: 0 });
    expect(config.events).toEqual({ publishStepEvents: false, publishStatusEvents: true });
    expect(config.history.maxCompletedRuns).toBe(50);
  });

  it('throws on malformed JSON', async () => {
    await fs.writeFile(configPath, '{ execution: ', 'utf8');

    await expect(readConfig()).rejects.toThrow(/^Failed to parse config file at /);
  });

  it('lets environment variables override the file', async () => {
    await fs.writeFile(configPath, JSON.stringify({ execution: { maxConcurrentSteps: 2 } }), 'utf8');
    vi.stubEnv('ORCHESTRATOR_MAX_CONCURRENT_STEPS', '8');
    vi.stubEnv('ORCHESTRATOR_WORKFLOW_TIMEOUT_MS', '60000');

    const config = await readConfig();

    expect(config.execution).toEqual({ stepTimeoutMs: 0, workflowTimeoutMs: 60_000, maxConcurrentSteps: 8 });
  });
});

describe('mergeWithDefaults', () => {
  it('falls back field by field on invalid values', () => {
    expect(
      mergeWithDefaults({
        execution: { stepTimeoutMs: -5, workflowTimeoutMs: '250', maxConcurrentSteps: 2.9 },
        events: { publishStatusEvents: 'no' },
        history: 'lots',
      }),
    ).toEqual({
      execution: { stepTimeoutMs: 0, workflowTimeoutMs: 250, maxConcurrentSteps: 2 },
      events: { publishStepEvents: true, publishStatusEvents: true },
      history: { maxCompletedRuns: 50 },
    });
  });

  it('treats non-object input as empty', () => {
    expect(mergeWithDefaults(null)).toEqual(DEFAULT_CONFIG);
    expect(mergeWithDefaults([1, 2])).toEqual(DEFAULT_CONFIG);
  });
});

describe('applyEnvOverrides', () => {
  it('ignores blank and invalid values', () => {
    const config = applyEnvOverrides(DEFAULT_CONFIG, {
      ORCHESTRATOR_STEP_TIMEOUT_MS: ' ',
      ORCHESTRATOR_WORKFLOW_TIMEOUT_MS: 'soon',
      ORCHESTRATOR_MAX_CONCURRENT_STEPS: '3',
    });

    expect(config.execution).toEqual({ stepTimeoutMs: 0, workflowTimeoutMs: 0, maxConcurrentSteps: 3 });
  });
});

describe('resolveConfig', () => {
  it('keeps defaults for sections that are not overridden', () => {
    expect(resolveConfig({ history: { maxCompletedRuns: 5 } })).toEqual({
      ...DEFAULT_CONFIG,
      history: { maxCompletedRuns: 5 },
    });
  });

  it('layers overrides over a supplied base config', () => {
    const base = applyEnvOverrides(DEFAULT_CONFIG, { ORCHESTRATOR_WORKFLOW_TIMEOUT_MS: '900' });

    expect(resolveConfig({ execution: { stepTimeoutMs: 10 } }, base).execution).toEqual({
      stepTimeoutMs: 10,
      workflowTimeoutMs: 900,
      maxConcurrentSteps: 0,
    });
  });
});
