/**
 * repo-profiler analyze command
 *
 * Prints the technical signals, GitHub metrics and a rule-based preview
 * of the insights. Writes nothing.
 */

import { Command } from 'commander';
import { logger } from '../../utils/logger.js';
import { getShutdownManager } from '../../utils/shutdown.js';
import { loadConfig } from '../../core/services/config-manager.js';
import { collectRepositoryData, type CollectedData } from '../../core/pipeline/profile-pipeline.js';
import { selectContent } from '../../core/reasoning/content-selector.js';
import { RuleBasedReasoningEngine } from '../../core/reasoning/rule-based-engine.js';
import { excerpt, formatList, printGithubMetrics, reportCommandError } from '../shared.js';
import type { GlobalOptions, Insights } from '../../types/index.js';

export interface AnalyzeOptions {
  githubToken?: string;
}

export interface AnalysisReport extends CollectedData {
  insights: Insights;
}

export async function runAnalysis(
  source: string,
  options: AnalyzeOptions,
  globals: Pick<GlobalOptions, 'config'>
): Promise<AnalysisReport> {
  const config = await loadConfig(globals.config, { githubToken: options.githubToken });
  const collected = await collectRepositoryData({ source, config, shutdown: getShutdownManager() });
  const { snapshot, signals, metrics } = collected;

  logger.blank();
  logger.section('Technical signals');
  logger.info('Files analyzed', snapshot.files.length);
  logger.info('Recent commits', snapshot.recentCommits.length);
  logger.info('Languages', formatList(signals.languages));
  logger.info('Frameworks', formatList(signals.frameworks));
  logger.info('Project type', signals.projectType);
  logger.info('Maturity', signals.maturity);
  logger.info('Activity', signals.activityLevel);
  logger.info('Tech stack', formatList(signals.techStack));

  if (metrics) {
    logger.blank();
    printGithubMetrics(metrics);
  }

  const insights = await new RuleBasedReasoningEngine().reason(signals, selectContent(snapshot));

  logger.blank();
  logger.section('Rule-based preview');
  logger.info('Problem', excerpt(insights.problem));
  logger.info('Solution', excerpt(insights.solution));
  logger.info('Key features', formatList(insights.keyFeatures));

  return { ...collected, insights };
}

export const analyzeCommand = new Command('analyze')
  .description('Show the technical signals of a repository without writing a profile')
  .argument('<repo>', 'Local path or GitHub URL')
  .option('-t, --github-token <token>', 'GitHub token (overrides GITHUB_TOKEN)')
  .addHelpText(
    'after',
    `
Examples:
  $ repo-profiler analyze .
  $ repo-profiler analyze https://github.com/owner/repo --github-token $GITHUB_TOKEN
`
  )
  .action(async (repo: string, options: AnalyzeOptions, command: Command) => {
    try {
      await runAnalysis(repo, options, command.optsWithGlobals<GlobalOptions>());
    } catch (error) {
      reportCommandError(error);
    }
  });
