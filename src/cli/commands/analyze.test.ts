/**
 * Tests for repo-profiler analyze command
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile, rm, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { analyzeCommand, runAnalysis } from './analyze.js';
import { bundleForType } from '../../core/reasoning/rule-based-engine.js';
import { configureLogger } from '../../utils/logger.js';

describe('analyze command', () => {
  describe('command configuration', () => {
    it('should have correct name and description', () => {
      expect(analyzeCommand.name()).toBe('analyze');
      expect(analyzeCommand.description()).toContain('technical signals');
    });

    it('should have --github-token option without default', () => {
      const option = analyzeCommand.options.find((o) => o.long === '--github-token');
      expect(option).toBeDefined();
      expect(option?.defaultValue).toBeUndefined();
    });
  });

  describe('runAnalysis', () => {
    let repoDir: string;

    beforeEach(async () => {
      configureLogger({ quiet: true });
      repoDir = join(tmpdir(), `repo-profiler-analyze-${Date.now()}-${Math.random().toString(36).slice(2)}`);
      await mkdir(repoDir, { recursive: true });
      await writeFile(join(repoDir, 'README.md'), '# Demo\n');
      await writeFile(join(repoDir, 'main.py'), 'print("hello")\n');
    });

    afterEach(async () => {
      configureLogger({ quiet: false });
      await rm(repoDir, { recursive: true, force: true });
    });

    it('should report signals and a rule-based preview without writing files', async () => {
      const report = await runAnalysis(repoDir, {}, { config: join(repoDir, 'missing.json') });

      expect(report.signals.languages).toContain('Python');
      expect(report.metrics).toBeNull();
      expect(report.insights.problem).toBe(bundleForType(report.signals.projectType).problem);
      expect((await readdir(repoDir)).sort()).toEqual(['README.md', 'main.py']);
    });
  });
});
