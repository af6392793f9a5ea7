/**
 * repo-profiler providers command
 */

import { Command } from 'commander';
import { logger } from '../../utils/logger.js';
import { loadConfig } from '../../core/services/config-manager.js';
import { listProviders, type ProviderStatus } from '../../core/reasoning/engine-factory.js';
import { reportCommandError } from '../shared.js';
import type { GlobalOptions } from '../../types/index.js';

export function formatProviderRow(status: ProviderStatus): string {
  const state = status.available ? 'available' : 'unavailable';
  return `${status.name.padEnd(10)} ${state.padEnd(12)} ${status.detail}`;
}

export async function runProviders(globals: Pick<GlobalOptions, 'config'>): Promise<ProviderStatus[]> {
  const config = await loadConfig(globals.config);

  const spinner = logger.spinner('Checking reasoning backends');
  const statuses = await listProviders(config);
  spinner.succeed('Checked reasoning backends');

  logger.section('Reasoning providers');
  for (const status of statuses) {
    logger.listItem(formatProviderRow(status));
  }

  logger.blank();
  logger.info('Configured', config.reasoning.provider);
  logger.info('Select one', 'repo-profiler init <repo> --ai-provider <name>');
  if (!config.reasoning.credentials.openaiApiKey && !config.reasoning.credentials.anthropicApiKey) {
    logger.info('Hosted models', 'export OPENAI_API_KEY=... or ANTHROPIC_API_KEY=...');
  }

  return statuses;
}

export const providersCommand = new Command('providers')
  .description('List the reasoning backends and whether each can be used')
  .action(async (_options: unknown, command: Command) => {
    try {
      await runProviders(command.optsWithGlobals<GlobalOptions>());
    } catch (error) {
      reportCommandError(error);
    }
  });
