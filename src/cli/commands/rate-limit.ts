/**
 * repo-profiler rate-limit command
 */

import { Command } from 'commander';
import { logger } from '../../utils/logger.js';
import { errors } from '../../utils/errors.js';
import { loadConfig } from '../../core/services/config-manager.js';
import { GitHubClient } from '../../core/github/github-client.js';
import { reportCommandError } from '../shared.js';
import type { GlobalOptions, RateLimitStatus } from '../../types/index.js';

export interface RateLimitOptions {
  githubToken?: string;
}

/**
 * Reset time as an ISO timestamp
 */
export function formatReset(resetEpochSeconds: number): string {
  return new Date(resetEpochSeconds * 1000).toISOString();
}

export async function runRateLimit(
  options: RateLimitOptions,
  globals: Pick<GlobalOptions, 'config'>
): Promise<RateLimitStatus | null> {
  const config = await loadConfig(globals.config, { githubToken: options.githubToken });
  if (!config.github.token) {
    throw errors.githubTokenRequired();
  }

  const client = new GitHubClient(config.github.token, { apiBaseUrl: config.github.apiBaseUrl });
  const status = await client.checkRateLimit();
  if (!status) {
    process.exitCode = 1;
    return null;
  }

  logger.section('GitHub API rate limit');
  logger.info('Remaining', `${status.remaining}/${status.limit}`);
  logger.info('Used', status.used);
  logger.info('Resets at', formatReset(status.reset));
  if (status.remaining === 0) {
    logger.warning('Rate limit exhausted; GitHub requests will fail until the reset');
  }
  return status;
}

export const rateLimitCommand = new Command('rate-limit')
  .description('Show the GitHub API rate limit for the configured token')
  .option('-t, --github-token <token>', 'GitHub token (overrides GITHUB_TOKEN)')
  .action(async (options: RateLimitOptions, command: Command) => {
    try {
      await runRateLimit(options, command.optsWithGlobals<GlobalOptions>());
    } catch (error) {
      reportCommandError(error);
    }
  });
