/**
 * Profile Generator
 *
 * Assembles the project profile from the snapshot, the technical signals
 * and the reasoning engine's insights.
 */

import { basename } from 'node:path';
import logger from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import { detectMaturityIndicators } from '../analyzer/signal-extractor.js';
import { parseGithubUrl } from '../github/github-client.js';
import { README_FILES } from '../ingestion/file-walker.js';
import type {
  GitHubMetrics,
  Insights,
  ProjectProfile,
  RepositorySnapshot,
  TechnicalSignals,
} from '../../types/index.js';

export const PROFILE_VERSION = '1.0';
export const ONE_LINER_LENGTH = 200;
const HEADING_SCAN_LINES = 10;

export interface GenerateProfileOptions {
  version?: string;
  metrics?: GitHubMetrics | null;
  now?: Date;
}

function headingOf(content: string): string | null {
  for (const line of content.split('\n').slice(0, HEADING_SCAN_LINES)) {
    const trimmed = line.trim();
    if (trimmed.startsWith('# ')) {
      const title = trimmed.slice(2).trim();
      if (title) return title;
    }
  }
  return null;
}

/**
 * First level-1 heading of a README, else the GitHub repository name
 * for clones, else the root directory name
 */
export function inferProjectName(snapshot: RepositorySnapshot): string {
  for (const file of snapshot.files) {
    if (!README_FILES.has(basename(file.path).toLowerCase())) continue;
    const heading = headingOf(file.content);
    if (heading) return heading;
  }

  if (snapshot.githubUrl) {
    try {
      return parseGithubUrl(snapshot.githubUrl).repo;
    } catch (error) {
      logger.debug(`Could not name project from ${snapshot.githubUrl}: ${errorMessage(error)}`);
    }
  }

  return basename(snapshot.rootPath);
}

export function generateOneLiner(insights: Insights): string {
  const value = insights.valueProposition;
  return value.length > ONE_LINER_LENGTH ? `${value.slice(0, ONE_LINER_LENGTH)}...` : value;
}

/**
 * Known gaps as one sentence each, or null when nothing stands out
 */
export function assessRisks(
  snapshot: RepositorySnapshot,
  signals: TechnicalSignals,
  metrics?: GitHubMetrics | null
): string | null {
  const indicators = detectMaturityIndicators(snapshot.files);
  const risks: string[] = [];

  if (!indicators.hasTests) {
    risks.push('No automated tests were found.');
  }
  if (!indicators.hasCi) {
    risks.push('No continuous integration configuration was found.');
  }
  if (signals.activityLevel === 'low') {
    risks.push('Development activity is low.');
  }
  if (metrics?.repository.archived) {
    risks.push('The GitHub repository is archived.');
  }
  if (metrics && !metrics.repository.license) {
    risks.push('The GitHub repository declares no license.');
  }

  return risks.length > 0 ? risks.join(' ') : null;
}

/**
 * Build the profile document
 */
export function generateProfile(
  snapshot: RepositorySnapshot,
  signals: TechnicalSignals,
  insights: Insights,
  options: GenerateProfileOptions = {}
): ProjectProfile {
  const now = options.now ?? new Date();

  return {
    projectName: inferProjectName(snapshot),
    oneLiner: generateOneLiner(insights),
    problem: insights.problem,
    solution: insights.solution,
    valueProposition: insights.valueProposition,
    techStack: [...new Set(signals.techStack)],
    projectType: signals.projectType,
    status: signals.maturity,
    keyFeatures: [...insights.keyFeatures],
    targetUsers: insights.targetUsers,
    currentFocus: insights.currentFocus,
    futurePlans: insights.futurePlans,
    risksOrGaps: assessRisks(snapshot, signals, options.metrics),
    metadata: {
      version: options.version ?? PROFILE_VERSION,
      generatedAt: now.toISOString(),
    },
  };
}
