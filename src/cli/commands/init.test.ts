/**
 * Tests for repo-profiler init command
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Command } from 'commander';
import { addGenerateOptions, initCommand, runInit } from './init.js';
import { resolveConfig } from '../../core/services/config-manager.js';
import type { GenerateOptions } from '../../types/index.js';
import { loadProfile } from '../../core/generator/profile-io.js';
import { FALLBACK_INSIGHTS } from '../../core/reasoning/reasoning-engine.js';
import { configureLogger } from '../../utils/logger.js';

describe('init command', () => {
  describe('command configuration', () => {
    it('should have correct name and description', () => {
      expect(initCommand.name()).toBe('init');
      expect(initCommand.description()).toContain('project profile');
    });

    it('should leave --ai-provider unset so the config file can choose', () => {
      const option = initCommand.options.find((o) => o.long === '--ai-provider');
      expect(option?.defaultValue).toBeUndefined();
    });

    it('should let a config file provider win when the flag is absent', () => {
      const command = addGenerateOptions(new Command('profile').argument('<repo>'));
      command.parse(['node', 'profile', '.']);
      const options = command.opts<GenerateOptions>();

      expect(options.aiProvider).toBeUndefined();
      expect(resolveConfig({ reasoning: { provider: 'rules' } }, {}, options).reasoning.provider).toBe('rules');
      expect(resolveConfig({}, {}, options).reasoning.provider).toBe('auto');
    });

    it('should default --force to false', () => {
      const option = initCommand.options.find((o) => o.long === '--force');
      expect(option?.defaultValue).toBe(false);
    });

    it('should accept a GitHub token with a short flag', () => {
      const option = initCommand.options.find((o) => o.long === '--github-token');
      expect(option?.short).toBe('-t');
    });

    it('should offer --no-interactive', () => {
      expect(initCommand.options.some((o) => o.long === '--no-interactive')).toBe(true);
    });
  });

  describe('runInit', () => {
    let repoDir: string;

    beforeEach(async () => {
      configureLogger({ quiet: true });
      repoDir = join(tmpdir(), `repo-profiler-init-${Date.now()}-${Math.random().toString(36).slice(2)}`);
      await mkdir(repoDir, { recursive: true });
      await writeFile(join(repoDir, 'README.md'), '# Demo Service\n\nA small demo.');
      await writeFile(join(repoDir, 'main.py'), 'print("hello")\n');
    });

    afterEach(async () => {
      configureLogger({ quiet: false });
      await rm(repoDir, { recursive: true, force: true });
    });

    const globals = (): { config: string } => ({ config: join(repoDir, 'missing-config.json') });

    it('should write the profile into the repository', async () => {
      const result = await runInit(repoDir, { aiProvider: 'mock', interactive: false }, globals());

      expect(result?.outputPath).toBe(join(repoDir, 'project-profile.yaml'));
      expect(result?.engineName).toBe('mock');

      const saved = await loadProfile(join(repoDir, 'project-profile.yaml'));
      expect(saved.projectName).toBe('Demo Service');
      expect(saved.keyFeatures).toEqual(FALLBACK_INSIGHTS.keyFeatures);
      expect(saved).toEqual(result?.profile);
    });

    it('should honour --output', async () => {
      const output = join(repoDir, 'out', 'custom.yaml');
      const result = await runInit(repoDir, { aiProvider: 'rules', output, interactive: false }, globals());

      expect(result?.outputPath).toBe(output);
      expect(result?.engineName).toBe('rules');
    });

    it('should use the provider from the config file', async () => {
      const configPath = join(repoDir, 'profiler.json');
      await writeFile(configPath, JSON.stringify({ reasoning: { provider: 'mock' } }));

      const result = await runInit(repoDir, { interactive: false }, { config: configPath });

      expect(result?.engineName).toBe('mock');
    });

    it('should refuse to overwrite without --force', async () => {
      await writeFile(join(repoDir, 'project-profile.yaml'), 'existing');

      await expect(runInit(repoDir, { aiProvider: 'mock', interactive: false }, globals())).rejects.toMatchObject({
        code: 'OUTPUT_EXISTS',
      });
    });

    it('should overwrite with --force', async () => {
      await writeFile(join(repoDir, 'project-profile.yaml'), 'existing');

      const result = await runInit(repoDir, { aiProvider: 'mock', force: true, interactive: false }, globals());
      expect(result?.profile.projectName).toBe('Demo Service');
    });

    it('should fail for a missing repository', async () => {
      await expect(
        runInit(join(repoDir, 'nope'), { aiProvider: 'mock', interactive: false, output: join(repoDir, 'x.yaml') }, globals())
      ).rejects.toMatchObject({ code: 'INVALID_REPOSITORY_PATH' });
    });
  });
});
