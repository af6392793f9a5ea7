/**
 * Tests for repo-profiler rate-limit command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { formatReset, rateLimitCommand, runRateLimit } from './rate-limit.js';
import { configureLogger } from '../../utils/logger.js';

describe('rate-limit command', () => {
  it('should have correct name and description', () => {
    expect(rateLimitCommand.name()).toBe('rate-limit');
    expect(rateLimitCommand.description()).toContain('rate limit');
  });

  it('should format the reset time as ISO 8601', () => {
    expect(formatReset(0)).toBe('1970-01-01T00:00:00.000Z');
    expect(formatReset(1719748800)).toBe('2024-06-30T12:00:00.000Z');
  });

  describe('runRateLimit', () => {
    beforeEach(() => {
      configureLogger({ quiet: true });
      vi.stubEnv('GITHUB_TOKEN', '');
    });

    afterEach(() => {
      configureLogger({ quiet: false });
      vi.unstubAllEnvs();
      vi.unstubAllGlobals();
      process.exitCode = undefined;
    });

    it('should require a token', async () => {
      await expect(runRateLimit({}, { config: 'missing-config.json' })).rejects.toMatchObject({
        code: 'GITHUB_TOKEN_REQUIRED',
      });
    });

    it('should return the core rate limit', async () => {
      const fetchMock = vi.fn<typeof fetch>(
        async () =>
          new Response(JSON.stringify({ resources: { core: { limit: 5000, remaining: 4990, reset: 1719748800, used: 10 } } }), {
            status: 200,
            headers: { 'Content-Type': 'application/json' },
          })
      );
      vi.stubGlobal('fetch', fetchMock);

      const status = await runRateLimit({ githubToken: 'test-token' }, { config: 'missing-config.json' });

      expect(status).toEqual({ limit: 5000, remaining: 4990, reset: 1719748800, used: 10 });
      expect(String(fetchMock.mock.calls[0]?.[0])).toBe('https://api.github.com/rate_limit');
    });

    it('should fail the process when the limit cannot be read', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn(async () => new Response(JSON.stringify({ message: 'Bad credentials' }), { status: 401 }))
      );

      const status = await runRateLimit({ githubToken: 'test-token' }, { config: 'missing-config.json' });

      expect(status).toBeNull();
      expect(process.exitCode).toBe(1);
    });
  });
});
