/**
 * Tests for repo-profiler providers command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { formatProviderRow, providersCommand, runProviders } from './providers.js';
import { configureLogger } from '../../utils/logger.js';

describe('providers command', () => {
  it('should have correct name and description', () => {
    expect(providersCommand.name()).toBe('providers');
    expect(providersCommand.description()).toContain('reasoning backends');
  });

  it('should align provider rows', () => {
    expect(formatProviderRow({ name: 'rules', available: true, hasKey: true, detail: 'built-in' })).toBe(
      'rules      available    built-in'
    );
  });

  describe('runProviders', () => {
    beforeEach(() => {
      configureLogger({ quiet: true });
      vi.stubGlobal('fetch', vi.fn(async () => Promise.reject(new Error('connect ECONNREFUSED'))));
    });

    afterEach(() => {
      configureLogger({ quiet: false });
      vi.unstubAllGlobals();
    });

    it('should list every backend and mark an unreachable local server', async () => {
      const statuses = await runProviders({ config: 'missing-config.json' });

      expect(statuses.map((s) => s.name)).toEqual(['openai', 'anthropic', 'local', 'rules', 'mock']);
      expect(statuses.find((s) => s.name === 'local')?.available).toBe(false);
      expect(statuses.find((s) => s.name === 'rules')?.available).toBe(true);
    });
  });
});
