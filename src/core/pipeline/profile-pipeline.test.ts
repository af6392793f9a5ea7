/**
 * Tests for the profile pipeline
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { runProfilePipeline, collectRepositoryData } from './profile-pipeline.js';
import { resolveConfig } from '../services/config-manager.js';
import { createLLMService } from '../services/llm-service.js';
import { MockReasoningEngine } from '../reasoning/mock-engine.js';
import { RuleBasedReasoningEngine } from '../reasoning/rule-based-engine.js';
import { LLMReasoningEngine } from '../reasoning/llm-engine.js';
import { FALLBACK_INSIGHTS } from '../reasoning/reasoning-engine.js';
import { ShutdownManager } from '../../utils/shutdown.js';
import type { RepositoryCloner } from '../github/repository-cloner.js';

const NOW = new Date('2024-06-30T12:00:00.000Z');

const REPO_FILES: Record<string, string> = {
  'README.md': '# Demo Service\n\nA small demo.',
  'main.py': 'print("hello")\n',
};

function uniqueDir(label: string): string {
  return join(tmpdir(), `repo-profiler-${label}-${Date.now()}-${Math.random().toString(36).slice(2)}`);
}

async function writeRepo(dir: string): Promise<void> {
  await mkdir(dir, { recursive: true });
  for (const [name, content] of Object.entries(REPO_FILES)) {
    await writeFile(join(dir, name), content);
  }
}

class FakeCloner implements RepositoryCloner {
  cleaned: string[] = [];

  async clone(): Promise<string> {
    const dir = uniqueDir('pipeline-clone');
    await writeRepo(dir);
    return dir;
  }

  async cleanup(clonePath: string): Promise<void> {
    this.cleaned.push(clonePath);
    await rm(clonePath, { recursive: true, force: true });
  }
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function stubGithub(repoStatus = 200) {
  const fetchMock = vi.fn(async (input: string | URL | Request, _init?: RequestInit) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    if (url.endsWith('/repos/owner/demo')) {
      return jsonResponse(
        repoStatus === 200
          ? {
              name: 'demo',
              full_name: 'owner/demo',
              stargazers_count: 42,
              forks_count: 3,
              created_at: '2023-01-01T00:00:00Z',
              updated_at: '2024-06-29T00:00:00Z',
              pushed_at: '2024-06-29T00:00:00Z',
              license: { name: 'MIT License' },
            }
          : { message: 'Server Error' },
        repoStatus
      );
    }
    if (url.includes('/contributors')) return jsonResponse([{ login: 'dev', contributions: 5, type: 'User' }]);
    if (url.endsWith('/languages')) return jsonResponse({ Go: 900, Python: 100 });
    return jsonResponse({ message: 'Not Found' }, 404);
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

describe('runProfilePipeline', () => {
  let testDir: string;
  let shutdown: ShutdownManager;

  beforeEach(async () => {
    testDir = uniqueDir('pipeline');
    await writeRepo(testDir);
    shutdown = new ShutdownManager({ skipHandlers: true });
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
    await rm(testDir, { recursive: true, force: true });
  });

  it('should profile a local repository without touching the network', async () => {
    const fetchMock = stubGithub();

    const result = await runProfilePipeline({
      source: testDir,
      config: resolveConfig({}, { GITHUB_TOKEN: 'test-token' }),
      engine: new MockReasoningEngine(),
      now: NOW,
    });

    expect(fetchMock).not.toHaveBeenCalled();
    expect(result.metrics).toBeNull();
    expect(result.signals.languages).toEqual(['Python']);
    expect(result.content).toBe('# Demo Service\n\nA small demo.\n\nprint("hello")\n');
    expect(result.insights).toEqual(FALLBACK_INSIGHTS);
    expect(result.engineName).toBe('mock');
    expect(result.profile.projectName).toBe('Demo Service');
    expect(result.profile.metadata.generatedAt).toBe('2024-06-30T12:00:00.000Z');
  });

  it('should enrich GitHub sources and remove the clone', async () => {
    stubGithub();
    const cloner = new FakeCloner();

    const result = await runProfilePipeline({
      source: 'https://github.com/owner/demo',
      config: resolveConfig({}, { GITHUB_TOKEN: 'test-token' }),
      engine: new RuleBasedReasoningEngine(),
      cloner,
      shutdown,
      now: NOW,
    });

    expect(result.snapshot.isGithubClone).toBe(true);
    expect(result.metrics?.repository.stars).toBe(42);
    expect(result.signals.languages).toEqual(['Go', 'Python']);
    expect(result.signals.techStack).toEqual(['Go', 'Python']);
    expect(result.profile.techStack).toEqual(['Go', 'Python']);
    expect(cloner.cleaned).toHaveLength(1);
    expect(shutdown.pendingCount()).toBe(0);
  });

  it('should continue without metadata when the GitHub lookup fails', async () => {
    stubGithub(500);

    const { signals, metrics } = await collectRepositoryData({
      source: 'https://github.com/owner/demo',
      config: resolveConfig({}, { GITHUB_TOKEN: 'test-token' }),
      cloner: new FakeCloner(),
      shutdown,
      now: NOW,
    });

    expect(metrics).toBeNull();
    expect(signals.languages).toEqual(['Python']);
  });

  it('should skip GitHub metadata without a token', async () => {
    const fetchMock = stubGithub();

    const { metrics } = await collectRepositoryData({
      source: 'https://github.com/owner/demo',
      config: resolveConfig(),
      cloner: new FakeCloner(),
      shutdown,
      now: NOW,
    });

    expect(metrics).toBeNull();
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should fall back to fixed insights when the reasoning backend is unreachable', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      })
    );
    const engine = new LLMReasoningEngine(createLLMService({ provider: 'anthropic', apiKey: 'test-key' }));

    const result = await runProfilePipeline({ source: testDir, config: resolveConfig(), engine, now: NOW });

    expect(result.insights).toEqual(FALLBACK_INSIGHTS);
    expect(result.profile.valueProposition).toBe(FALLBACK_INSIGHTS.valueProposition);
  });

  it('should reject a missing local path', async () => {
    await expect(
      runProfilePipeline({
        source: join(testDir, 'nope'),
        config: resolveConfig(),
        engine: new MockReasoningEngine(),
      })
    ).rejects.toMatchObject({ code: 'INVALID_REPOSITORY_PATH' });
  });
});
