/**
 * Tests for configuration loading and resolution
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  readConfigFile,
  resolveConfig,
  validateConfigFile,
  profilerEnv,
  DEFAULT_CONFIG,
} from './config-manager.js';
import { ProfilerError } from '../../utils/errors.js';

describe('readConfigFile', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `repo-profiler-config-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should return an empty config when the file is missing', async () => {
    expect(await readConfigFile(join(testDir, 'missing.json'))).toEqual({});
  });

  it('should read known sections', async () => {
    const path = join(testDir, 'config.json');
    await writeFile(
      path,
      JSON.stringify({
        reasoning: { provider: 'local', model: 'mistral', timeoutMs: 5000 },
        output: { fileName: 'profile.yaml' },
        walker: { maxFiles: 100 },
        extra: true,
      })
    );

    const config = await readConfigFile(path);

    expect(config.reasoning).toEqual({ provider: 'local', model: 'mistral', localBaseUrl: undefined, timeoutMs: 5000 });
    expect(config.output?.fileName).toBe('profile.yaml');
    expect(config.walker).toEqual({ maxFileSize: undefined, maxFiles: 100 });
  });

  it('should reject malformed JSON', async () => {
    const path = join(testDir, 'config.json');
    await writeFile(path, '{ not json');

    const error = await readConfigFile(path).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProfilerError);
    expect(error).toMatchObject({ code: 'INVALID_CONFIG' });
  });

  it('should reject wrongly-typed fields', async () => {
    const path = join(testDir, 'config.json');
    await writeFile(path, JSON.stringify({ walker: { maxFiles: 'many' } }));

    await expect(readConfigFile(path)).rejects.toThrow('"walker.maxFiles" must be a positive number');
  });
});

describe('validateConfigFile', () => {
  it('should accept an empty object', () => {
    expect(validateConfigFile({})).toEqual([]);
  });

  it('should reject non-objects and non-object sections', () => {
    expect(validateConfigFile([])).toEqual(['configuration must be a JSON object']);
    expect(validateConfigFile({ github: 'x' })).toEqual(['"github" must be an object']);
  });

  it('should allow a null model', () => {
    expect(validateConfigFile({ reasoning: { model: null } })).toEqual([]);
    expect(validateConfigFile({ reasoning: { model: 3 } })).toEqual(['"reasoning.model" must be a string or null']);
  });
});

describe('resolveConfig', () => {
  it('should return defaults for empty inputs', () => {
    expect(resolveConfig()).toEqual(DEFAULT_CONFIG);
  });

  it('should prefer CLI over environment over file', () => {
    const config = resolveConfig(
      { reasoning: { provider: 'rules', model: 'file-model', localBaseUrl: 'http://file.test/v1' } },
      { OPENAI_API_KEY: 'env-key', GITHUB_TOKEN: 'env-token', LOCAL_LLM_BASE_URL: 'http://env.test/v1' },
      { aiProvider: 'openai', openaiKey: 'cli-key' }
    );

    expect(config.reasoning.provider).toBe('openai');
    expect(config.reasoning.model).toBe('file-model');
    expect(config.reasoning.credentials).toEqual({ openaiApiKey: 'cli-key' });
    expect(config.reasoning.localBaseUrl).toBe('http://env.test/v1');
    expect(config.github.token).toBe('env-token');
  });

  it('should carry API base overrides from the environment', () => {
    const config = resolveConfig({}, { OPENAI_API_BASE: 'http://proxy.test/v1', ANTHROPIC_API_KEY: 'test-key' });

    expect(config.reasoning.openaiBaseUrl).toBe('http://proxy.test/v1');
    expect(config.reasoning.anthropicBaseUrl).toBeNull();
    expect(config.reasoning.credentials).toEqual({ anthropicApiKey: 'test-key' });
  });

  it('should treat empty strings as unset', () => {
    const config = resolveConfig({}, { GITHUB_TOKEN: '' }, { githubToken: '' });
    expect(config.github.token).toBeNull();
  });
});

describe('profilerEnv', () => {
  it('should pick only the known variables', () => {
    expect(profilerEnv({ GITHUB_TOKEN: 'test-token', HOME: '/home/x' })).toEqual({
      GITHUB_TOKEN: 'test-token',
      OPENAI_API_KEY: undefined,
      ANTHROPIC_API_KEY: undefined,
      OPENAI_API_BASE: undefined,
      ANTHROPIC_API_BASE: undefined,
      LOCAL_LLM_BASE_URL: undefined,
    });
  });
});
