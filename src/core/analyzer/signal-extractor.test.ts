/**
 * Tests for the signal extractor
 */

import { describe, it, expect } from 'vitest';
import {
  pathTokens,
  extractLanguages,
  extractFrameworks,
  inferProjectType,
  detectMaturityIndicators,
  maturityFromIndicators,
  inferMaturity,
  inferActivityLevel,
  extractTechStack,
  extractSignals,
} from './signal-extractor.js';
import type { CommitRecord, FileEntry, MaturityIndicators, ProjectStatus } from '../../types/index.js';

function file(path: string, content = ''): FileEntry {
  return { path, absolutePath: `/repo/${path}`, content, priority: 1 };
}

function commit(date: string): CommitRecord {
  return { hash: 'abc', message: 'change', author: 'dev', date };
}

const NOW = new Date('2024-06-30T12:00:00Z');
const DAY_MS = 24 * 60 * 60 * 1000;

describe('pathTokens', () => {
  it('should split on separators, dots, underscores and dashes', () => {
    expect(pathTokens('src/My_Module/foo-bar.test.ts')).toEqual(['src', 'my', 'module', 'foo', 'bar', 'test', 'ts']);
    expect(pathTokens('.github/workflows/ci.yml')).toEqual(['github', 'workflows', 'ci', 'yml']);
  });
});

describe('extractLanguages', () => {
  it('should map extensions to sorted unique languages', () => {
    const files = [file('b.go'), file('a.py'), file('c.PY'), file('lib/util.h'), file('notes.txt')];

    expect(extractLanguages(files)).toEqual(['C', 'Go', 'Python']);
  });

  it('should be order independent and idempotent', () => {
    const files = [file('x.ts'), file('y.rs'), file('z.kt'), file('w.tsx')];
    const reversed = [...files].reverse();

    expect(extractLanguages(files)).toEqual(['Kotlin', 'Rust', 'TypeScript']);
    expect(extractLanguages(reversed)).toEqual(extractLanguages(files));
    expect(extractLanguages(files)).toEqual(extractLanguages(files));
  });
});

describe('extractFrameworks', () => {
  it('should match keywords anywhere in a manifest', () => {
    const files = [
      file('requirements.txt', 'Flask==3.0\nnumpy>=1.26\n'),
      file('web/package.json', '{"dependencies": {"react": "^18"}}'),
    ];

    expect(extractFrameworks(files)).toEqual(['Flask', 'NumPy', 'React']);
  });

  it('should require import statements in source files', () => {
    const files = [
      file('app.py', 'from fastapi import FastAPI\nimport pandas as pd\n# uses django later'),
      file('index.ts', "import express from 'express';"),
    ];

    expect(extractFrameworks(files)).toEqual(['Express', 'FastAPI', 'Pandas']);
  });

  it('should ignore keywords in other files', () => {
    expect(extractFrameworks([file('README.md', 'Built with react and flask')])).toEqual([]);
  });

  it('should be idempotent across runs and orderings', () => {
    const files = [file('package.json', 'vue angular'), file('main.py', 'import click')];

    expect(extractFrameworks(files)).toEqual(['Angular', 'Click', 'Vue']);
    expect(extractFrameworks([...files].reverse())).toEqual(['Angular', 'Click', 'Vue']);
  });
});

describe('inferProjectType', () => {
  it('should detect CLI projects', () => {
    expect(inferProjectType([file('src/cli/commands.ts')])).toBe('cli');
    expect(inferProjectType([file('main.py')])).toBe('cli');
  });

  it('should detect API projects', () => {
    expect(inferProjectType([file('src/api/routes.py')])).toBe('api');
    expect(inferProjectType([file('server.js')])).toBe('api');
  });

  it('should detect web apps, ML, automation and libraries', () => {
    expect(inferProjectType([file('public/index.html')])).toBe('web_app');
    expect(inferProjectType([file('models/train.py')])).toBe('ml');
    expect(inferProjectType([file('scripts/deploy.sh')])).toBe('automation');
    expect(inferProjectType([file('lib/util.rb')])).toBe('library');
  });

  it('should let earlier rules win', () => {
    expect(inferProjectType([file('lib/helpers.py'), file('src/api/v1.py'), file('cli.py')])).toBe('cli');
  });

  it('should not match substrings of longer words', () => {
    expect(inferProjectType([file('pyproject.toml'), file('src/client.go'), file('capital.txt')])).toBe('other');
  });

  it('should default to other', () => {
    expect(inferProjectType([])).toBe('other');
  });
});

describe('maturity', () => {
  it('should detect each indicator', () => {
    expect(
      detectMaturityIndicators([
        file('tests/test_app.py'),
        file('.github/workflows/build.yml'),
        file('docs/index.md'),
        file('VERSION'),
      ])
    ).toEqual({ hasTests: true, hasCi: true, hasDocs: true, hasVersion: true });
  });

  it('should recognise other CI and version markers', () => {
    expect(detectMaturityIndicators([file('.gitlab-ci.yml'), file('CHANGELOG.md')])).toEqual({
      hasTests: false,
      hasCi: true,
      hasDocs: false,
      hasVersion: true,
    });
  });

  it('should classify tiers', () => {
    expect(inferMaturity([file('README.md'), file('src/app.test.ts')])).toBe('mvp');
    expect(inferMaturity([file('README.md')])).toBe('prototype');
    expect(
      inferMaturity([file('README.md'), file('spec/app_spec.rb'), file('.travis.yml'), file('version.py')])
    ).toBe('production');
  });

  it('should be monotonic in its four indicators', () => {
    const rank: Record<ProjectStatus, number> = { prototype: 0, mvp: 1, production: 2 };
    const keys: (keyof MaturityIndicators)[] = ['hasTests', 'hasCi', 'hasDocs', 'hasVersion'];

    for (let mask = 0; mask < 16; mask++) {
      const base: MaturityIndicators = {
        hasTests: (mask & 1) !== 0,
        hasCi: (mask & 2) !== 0,
        hasDocs: (mask & 4) !== 0,
        hasVersion: (mask & 8) !== 0,
      };
      for (const key of keys) {
        const raised = { ...base, [key]: true };
        expect(rank[maturityFromIndicators(raised)]).toBeGreaterThanOrEqual(rank[maturityFromIndicators(base)]);
      }
    }
  });
});

describe('inferActivityLevel', () => {
  it('should report high for a commit made today', () => {
    expect(inferActivityLevel([commit(NOW.toISOString())], NOW)).toBe('high');
  });

  it('should report medium between 30 and 90 days', () => {
    expect(inferActivityLevel([commit(new Date(NOW.getTime() - 45 * DAY_MS).toISOString())], NOW)).toBe('medium');
  });

  it('should report low for a commit 100 days old', () => {
    expect(inferActivityLevel([commit(new Date(NOW.getTime() - 100 * DAY_MS).toISOString())], NOW)).toBe('low');
  });

  it('should report low without commits', () => {
    expect(inferActivityLevel([], NOW)).toBe('low');
  });

  it('should report unknown for an unparseable date', () => {
    expect(inferActivityLevel([commit('last tuesday')], NOW)).toBe('unknown');
  });

  it('should only look at the newest commit', () => {
    const commits = [commit('2024-06-29T00:00:00Z'), commit('2020-01-01T00:00:00Z')];
    expect(inferActivityLevel(commits, NOW)).toBe('high');
  });
});

describe('extractTechStack', () => {
  it('should merge languages and frameworks without duplicates', () => {
    expect(extractTechStack(['Python', 'TypeScript'], ['React', 'Python'])).toEqual(['Python', 'React', 'TypeScript']);
  });
});

describe('extractSignals', () => {
  it('should combine every signal for a snapshot', () => {
    const snapshot = {
      rootPath: '/repo',
      files: [
        file('README.md', '# Tool'),
        file('requirements.txt', 'typer\n'),
        file('cli/main.py', 'import typer'),
        file('tests/test_main.py', ''),
      ],
      recentCommits: [commit('2024-06-01T00:00:00Z')],
      isGitRepo: true,
      githubUrl: null,
      isGithubClone: false,
    };

    expect(extractSignals(snapshot, NOW)).toEqual({
      languages: ['Python'],
      frameworks: ['Typer'],
      projectType: 'cli',
      maturity: 'mvp',
      activityLevel: 'high',
      techStack: ['Python', 'Typer'],
    });
  });
});
