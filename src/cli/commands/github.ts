/**
 * repo-profiler github command
 *
 * Like init, but only for GitHub URLs, and prints the repository metrics.
 */

import { Command } from 'commander';
import { logger } from '../../utils/logger.js';
import { errors } from '../../utils/errors.js';
import { isGithubUrl } from '../../core/ingestion/repository-ingester.js';
import { loadConfig } from '../../core/services/config-manager.js';
import { addGenerateOptions, runInit, type InitResult } from './init.js';
import { printGithubMetrics, reportCommandError } from '../shared.js';
import type { GenerateOptions, GlobalOptions } from '../../types/index.js';

export async function runGithub(
  url: string,
  options: GenerateOptions,
  globals: Pick<GlobalOptions, 'config'>
): Promise<InitResult | null> {
  if (!isGithubUrl(url)) {
    throw errors.invalidGithubUrl(url);
  }

  const config = await loadConfig(globals.config, options);
  if (!config.github.token) {
    logger.warning('No GitHub token set; repository metrics will be skipped');
  }

  const result = await runInit(url, options, globals);
  if (result?.metrics) {
    logger.blank();
    printGithubMetrics(result.metrics);
  }
  return result;
}

export const githubCommand = addGenerateOptions(
  new Command('github')
    .description('Clone a GitHub repository, profile it and report its metrics')
    .argument('<url>', 'https://github.com/<owner>/<repo> or git@github.com:<owner>/<repo>.git')
)
  .addHelpText(
    'after',
    `
Examples:
  $ repo-profiler github https://github.com/owner/repo
  $ GITHUB_TOKEN=... repo-profiler github git@github.com:owner/repo.git --ai-provider anthropic

The profile is written to the current directory unless --output is given.
`
  )
  .action(async (url: string, options: GenerateOptions, command: Command) => {
    try {
      await runGithub(url, options, command.optsWithGlobals<GlobalOptions>());
    } catch (error) {
      reportCommandError(error);
    }
  });
