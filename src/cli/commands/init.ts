/**
 * repo-profiler init command
 *
 * Profiles a local repository or GitHub URL and writes project-profile.yaml.
 */

import { Command } from 'commander';
import { logger } from '../../utils/logger.js';
import { getShutdownManager } from '../../utils/shutdown.js';
import { setInteractiveMode } from '../../utils/prompts.js';
import { loadConfig } from '../../core/services/config-manager.js';
import { createReasoningEngine } from '../../core/reasoning/engine-factory.js';
import { runProfilePipeline, type ProfilePipelineResult } from '../../core/pipeline/profile-pipeline.js';
import { saveProfile } from '../../core/generator/profile-io.js';
import { chooseEngine, ensureWritable, formatDuration, formatList, reportCommandError, resolveOutputPath } from '../shared.js';
import type { GenerateOptions, GlobalOptions } from '../../types/index.js';

export interface InitResult extends ProfilePipelineResult {
  outputPath: string;
}

/**
 * Generate and save a profile. Returns null when the user declines to overwrite.
 */
export async function runInit(
  source: string,
  options: GenerateOptions,
  globals: Pick<GlobalOptions, 'config'>
): Promise<InitResult | null> {
  if (options.interactive === false) {
    setInteractiveMode(false);
  }

  const config = await loadConfig(globals.config, options);
  const outputPath = resolveOutputPath(source, options.output, config.output.fileName);

  if (!(await ensureWritable(outputPath, options.force ?? false))) {
    logger.info('Aborted', 'Use --force to overwrite without prompting');
    return null;
  }

  const choice = await chooseEngine(config);
  const engine = createReasoningEngine(choice, config);

  const result = await runProfilePipeline({
    source,
    config,
    engine,
    shutdown: getShutdownManager(),
  });

  const written = await saveProfile(result.profile, outputPath);

  logger.blank();
  logger.section('Project profile');
  logger.info('Project', result.profile.projectName);
  logger.info('Type', result.profile.projectType);
  logger.info('Status', result.profile.status);
  logger.info('Tech stack', formatList(result.profile.techStack));
  logger.info('Engine', result.engineName);
  logger.info('Duration', formatDuration(result.duration));
  logger.blank();
  logger.success(`Profile written to ${written}`);

  return { ...result, outputPath: written };
}

/**
 * Options shared by init and github
 */
export function addGenerateOptions(command: Command): Command {
  return command
    .option('-o, --output <path>', 'Where to write the profile')
    .option('--force', 'Overwrite an existing profile', false)
    .option('--ai-provider <name>', 'Reasoning backend: auto, openai, anthropic, local, rules, mock (default: config file, else auto)')
    .option('--ai-model <name>', 'Model name for the selected provider')
    .option('--openai-key <key>', 'OpenAI API key (overrides OPENAI_API_KEY)')
    .option('--anthropic-key <key>', 'Anthropic API key (overrides ANTHROPIC_API_KEY)')
    .option('-t, --github-token <token>', 'GitHub token (overrides GITHUB_TOKEN)')
    .option('--no-interactive', 'Never prompt; fail or fall back instead');
}

export const initCommand = addGenerateOptions(
  new Command('init')
    .description('Generate a project profile for a local repository or GitHub URL')
    .argument('<repo>', 'Local path or GitHub URL')
)
  .addHelpText(
    'after',
    `
Examples:
  $ repo-profiler init .                          Profile the current directory
  $ repo-profiler init ../service --ai-provider rules
                                                  Offline, rule-based reasoning
  $ repo-profiler init https://github.com/owner/repo -o profiles/repo.yaml

Without --ai-provider or reasoning.provider in the config file, an OpenAI
key is preferred, then an Anthropic key, then the rule-based engine.
`
  )
  .action(async (repo: string, options: GenerateOptions, command: Command) => {
    try {
      await runInit(repo, options, command.optsWithGlobals<GlobalOptions>());
    } catch (error) {
      reportCommandError(error);
    }
  });
