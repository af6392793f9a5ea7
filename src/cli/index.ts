#!/usr/bin/env node

/**
 * repo-profiler CLI entry point
 *
 * Scans a repository and writes a structured project profile.
 */

import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import { githubCommand } from './commands/github.js';
import { analyzeCommand } from './commands/analyze.js';
import { providersCommand } from './commands/providers.js';
import { rateLimitCommand } from './commands/rate-limit.js';
import { validateCommand } from './commands/validate.js';
import { DEFAULT_CONFIG_PATH } from '../core/services/config-manager.js';
import { configureLogger } from '../utils/logger.js';
import type { GlobalOptions } from '../types/index.js';

const program = new Command();

// Hook to configure logger before any command runs
program.hook('preAction', (thisCommand) => {
  const opts = thisCommand.opts<Partial<GlobalOptions>>();
  configureLogger({
    quiet: opts.quiet ?? false,
    verbose: opts.verbose ?? false,
    noColor: opts.color === false,
    timestamps: process.env.CI === 'true' || opts.color === false,
  });
});

program
  .name('repo-profiler')
  .description('Scan a software repository and generate a structured project profile.')
  .version('0.3.0')
  .option('-q, --quiet', 'Minimal output (errors only)', false)
  .option('-v, --verbose', 'Show debug information', false)
  .option('--no-color', 'Disable colored output (also enables timestamps)')
  .option('--config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
  .addHelpText(
    'after',
    `
Quick start:
  $ repo-profiler init .                       Write ./project-profile.yaml
  $ repo-profiler github https://github.com/owner/repo
  $ repo-profiler analyze .                    Inspect signals only

Environment:
  OPENAI_API_KEY, ANTHROPIC_API_KEY   Hosted reasoning backends
  LOCAL_LLM_BASE_URL                  OpenAI-compatible local server
  GITHUB_TOKEN                        GitHub metadata and rate limits
`
  );

program.addCommand(initCommand);
program.addCommand(githubCommand);
program.addCommand(analyzeCommand);
program.addCommand(providersCommand);
program.addCommand(rateLimitCommand);
program.addCommand(validateCommand);

await program.parseAsync();
