/**
 * Helpers shared by the repo-profiler commands
 */

import { access } from 'node:fs/promises';
import { resolve } from 'node:path';
import { logger } from '../utils/logger.js';
import { errors, formatError, isProfilerError } from '../utils/errors.js';
import { confirmOverwrite, isInteractive, promptApiKey, selectProvider } from '../utils/prompts.js';
import { isGithubUrl } from '../core/ingestion/repository-ingester.js';
import { resolveEngineChoice, type EngineChoice } from '../core/reasoning/engine-factory.js';
import { githubActivityLevel, maturityIndicators, popularityScore } from '../core/github/repository-metrics.js';
import type { GitHubMetrics, ReasoningCredentials, ResolvedConfig } from '../types/index.js';

/**
 * Where the profile goes: --output, else the current directory for
 * GitHub sources, else the repository root
 */
export function resolveOutputPath(
  source: string,
  output: string | undefined,
  fileName: string,
  cwd: string = process.cwd()
): string {
  if (output) {
    return resolve(cwd, output);
  }
  if (isGithubUrl(source)) {
    return resolve(cwd, fileName);
  }
  return resolve(cwd, source, fileName);
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check that the output may be written. Throws OUTPUT_EXISTS when the file
 * exists, --force is off and nobody can be asked; false when the user declines.
 */
export async function ensureWritable(outputPath: string, force: boolean): Promise<boolean> {
  if (force || !(await fileExists(outputPath))) {
    return true;
  }
  if (!isInteractive()) {
    throw errors.outputExists(outputPath);
  }
  return confirmOverwrite(outputPath);
}

/**
 * Resolve the reasoning engine, asking for a provider or key when the
 * session is interactive and nothing is configured
 */
export async function chooseEngine(config: ResolvedConfig, interactive: boolean = isInteractive()): Promise<EngineChoice> {
  let provider = config.reasoning.provider;
  const credentials: ReasoningCredentials = { ...config.reasoning.credentials };

  if (interactive && provider === 'auto' && !credentials.openaiApiKey && !credentials.anthropicApiKey) {
    provider = await selectProvider();
  }

  if (interactive && (provider === 'openai' || provider === 'anthropic')) {
    const field = provider === 'openai' ? 'openaiApiKey' : 'anthropicApiKey';
    if (!credentials[field]) {
      const key = await promptApiKey(provider);
      if (key) {
        credentials[field] = key;
      }
    }
  }

  const choice = resolveEngineChoice({ provider, credentials, model: config.reasoning.model });
  logger.debug(`Reasoning engine: ${choice.name} (${choice.reason})`);
  return choice;
}

export function excerpt(text: string, length = 100): string {
  return text.length > length ? `${text.slice(0, length)}...` : text;
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.floor((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}

export function formatList(values: string[]): string {
  return values.length > 0 ? values.join(', ') : 'none';
}

/**
 * Print the GitHub metrics block
 */
export function printGithubMetrics(metrics: GitHubMetrics, now: Date = new Date()): void {
  const { repository } = metrics;
  const indicators = maturityIndicators(metrics, now);

  logger.section('GitHub metrics');
  logger.info('Repository', repository.fullName);
  if (repository.description) {
    logger.info('Description', repository.description);
  }
  logger.info('Stars', repository.stars);
  logger.info('Forks', repository.forks);
  logger.info('Open issues', repository.openIssues);
  logger.info('Contributors', metrics.contributors.length);
  logger.info('Primary language', repository.language ?? 'unknown');
  logger.info('License', repository.license ?? 'none');
  logger.info('Topics', formatList(repository.topics));
  logger.info('Activity', githubActivityLevel(repository.pushedAt, now));
  logger.info('Popularity score', popularityScore(metrics).toFixed(1));

  const present = Object.entries(indicators)
    .filter(([, value]) => value)
    .map(([key]) => key);
  logger.info('Maturity indicators', formatList(present));
  if (repository.archived) {
    logger.warning('Repository is archived');
  }
}

/**
 * Log a command failure and flag the process as failed
 */
export function reportCommandError(error: unknown): void {
  logger.error(formatError(error, !logger.getOptions().noColor));
  if (isProfilerError(error) && error.suggestion) {
    logger.info('Suggestion', error.suggestion);
  }
  if (error instanceof Error && error.stack) {
    logger.debug(error.stack);
  }
  process.exitCode = 1;
}
