/**
 * Profile Pipeline
 *
 * ingest → signals → GitHub enrichment → content selection → reasoning → profile
 */

import logger from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import type { ShutdownManager } from '../../utils/shutdown.js';
import { ingestRepository } from '../ingestion/repository-ingester.js';
import { extractSignals, extractTechStack } from '../analyzer/signal-extractor.js';
import { GitHubClient } from '../github/github-client.js';
import { GitHubEnricher } from '../github/enricher.js';
import type { RepositoryCloner } from '../github/repository-cloner.js';
import { selectContent } from '../reasoning/content-selector.js';
import type { ReasoningEngine } from '../reasoning/reasoning-engine.js';
import { generateProfile } from '../generator/profile-generator.js';
import type {
  GitHubMetrics,
  Insights,
  ProjectProfile,
  RepositorySnapshot,
  ResolvedConfig,
  TechnicalSignals,
} from '../../types/index.js';

// ============================================================================
// TYPES
// ============================================================================

export interface CollectOptions {
  /** Local path or GitHub URL */
  source: string;
  config: ResolvedConfig;
  cloner?: RepositoryCloner;
  /** Defaults to a client built from config.github */
  githubClient?: GitHubClient;
  shutdown?: ShutdownManager;
  now?: Date;
}

export interface ProfilePipelineOptions extends CollectOptions {
  engine: ReasoningEngine;
}

export interface CollectedData {
  snapshot: RepositorySnapshot;
  signals: TechnicalSignals;
  /** null when the source is local, no token is set, or the lookup failed */
  metrics: GitHubMetrics | null;
}

export interface ProfilePipelineResult extends CollectedData {
  content: string;
  insights: Insights;
  profile: ProjectProfile;
  engineName: string;
  duration: number;
}

// ============================================================================
// STAGES
// ============================================================================

async function enrichWithGithub(
  snapshot: RepositorySnapshot,
  signals: TechnicalSignals,
  options: CollectOptions,
  now: Date
): Promise<{ signals: TechnicalSignals; metrics: GitHubMetrics | null }> {
  const { token, apiBaseUrl } = options.config.github;
  if (!snapshot.githubUrl || !token) {
    if (snapshot.githubUrl) {
      logger.debug('No GitHub token configured, skipping GitHub metadata');
    }
    return { signals, metrics: null };
  }

  const client = options.githubClient ?? new GitHubClient(token, { apiBaseUrl });
  const enricher = new GitHubEnricher(client, () => now);

  try {
    const metrics = await enricher.enrich(snapshot);
    if (!enricher.shouldUseGithubData(metrics)) {
      return { signals, metrics };
    }
    const languages = enricher.mergeLanguageData(signals.languages, metrics);
    return {
      signals: { ...signals, languages, techStack: extractTechStack(languages, signals.frameworks) },
      metrics,
    };
  } catch (error) {
    logger.warning(`Could not fetch GitHub metadata: ${errorMessage(error)}`);
    return { signals, metrics: null };
  }
}

/**
 * Ingest the source and derive signals, enriched with GitHub data where available
 */
export async function collectRepositoryData(options: CollectOptions): Promise<CollectedData> {
  const now = options.now ?? new Date();

  const snapshot = await ingestRepository(options.source, {
    walker: options.config.walker,
    cloner: options.cloner,
    shutdown: options.shutdown,
  });

  logger.analysis('Extracting technical signals');
  const localSignals = extractSignals(snapshot, now);
  const { signals, metrics } = await enrichWithGithub(snapshot, localSignals, options, now);

  return { snapshot, signals, metrics };
}

/**
 * Run every stage and return each intermediate result
 */
export async function runProfilePipeline(options: ProfilePipelineOptions): Promise<ProfilePipelineResult> {
  const startTime = Date.now();
  const now = options.now ?? new Date();

  const { snapshot, signals, metrics } = await collectRepositoryData({ ...options, now });

  const content = selectContent(snapshot);
  logger.inference(`Reasoning with the ${options.engine.name} engine over ${content.length} characters`);
  const insights = await options.engine.reason(signals, content);

  const profile = generateProfile(snapshot, signals, insights, { metrics, now });
  const duration = Date.now() - startTime;
  logger.debug(`Pipeline completed in ${(duration / 1000).toFixed(1)}s`);

  return { snapshot, signals, metrics, content, insights, profile, engineName: options.engine.name, duration };
}
