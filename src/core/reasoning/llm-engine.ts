/**
 * LLM-backed reasoning engine
 *
 * Wraps an LLMService (Anthropic, OpenAI or a local OpenAI-compatible
 * server). Any failure, including an unparseable reply, yields the
 * fallback insights.
 */

import logger from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import { isRecord, isStringArray, type JsonRecord } from '../../utils/json-fields.js';
import type { LLMService } from '../services/llm-service.js';
import type { Insights, TechnicalSignals } from '../../types/index.js';
import { fallbackInsights, type ReasoningEngine } from './reasoning-engine.js';

export const PROMPT_CONTENT_LIMIT = 8000;
const MAX_FEATURES = 5;

export const SYSTEM_PROMPT =
  'You are an expert software analyst. Analyze the provided repository information and generate structured insights in JSON format.';

const FIELD_DEFAULTS: Insights = {
  problem: 'Project addresses domain-specific challenges.',
  solution: 'Implements comprehensive solution using modern practices.',
  valueProposition: 'Provides efficiency and reliability benefits.',
  targetUsers: 'Developers and technical professionals.',
  keyFeatures: ['Modern architecture', 'Easy to use', 'Well documented'],
  currentFocus: 'Improving core functionality and user experience.',
  futurePlans: 'Expanding features and community adoption.',
};

/**
 * Build the analysis prompt from signals and the first 8000 characters of content
 */
export function buildPrompt(signals: TechnicalSignals, content: string): string {
  return `Analyze this software repository and provide structured insights.

TECHNICAL SIGNALS:
- Languages: ${signals.languages.join(', ')}
- Frameworks: ${signals.frameworks.join(', ')}
- Project Type: ${signals.projectType}
- Maturity: ${signals.maturity}
- Activity Level: ${signals.activityLevel}

REPOSITORY CONTENT (first ${PROMPT_CONTENT_LIMIT} chars):
${content.slice(0, PROMPT_CONTENT_LIMIT)}

Please analyze this repository and respond with a JSON object containing:
{
    "problem": "What specific problem does this project solve? (1-2 sentences)",
    "solution": "How does this project solve the problem? (1-2 sentences)",
    "value_proposition": "What value does this provide to users? (1-2 sentences)",
    "target_users": "Who are the primary users of this project? (1 sentence)",
    "key_features": ["List 3-5 key features as short phrases"],
    "current_focus": "What is the current development focus? (1 sentence)",
    "future_plans": "What are likely future plans for this project? (1 sentence)"
}

Base your analysis on the actual code, documentation, and project structure. Be specific and accurate.
Respond only with the JSON object, no additional text.`;
}

function text(data: JsonRecord, key: string, fallback: string): string {
  const value = data[key];
  return typeof value === 'string' && value.trim() !== '' ? value : fallback;
}

/**
 * Map a parsed reply onto Insights, filling missing fields with defaults
 */
export function toInsights(data: unknown): Insights {
  if (!isRecord(data)) {
    throw new Error('LLM reply is not a JSON object');
  }

  const features = data.key_features;
  return {
    problem: text(data, 'problem', FIELD_DEFAULTS.problem),
    solution: text(data, 'solution', FIELD_DEFAULTS.solution),
    valueProposition: text(data, 'value_proposition', FIELD_DEFAULTS.valueProposition),
    targetUsers: text(data, 'target_users', FIELD_DEFAULTS.targetUsers),
    keyFeatures: (isStringArray(features) && features.length > 0 ? features : FIELD_DEFAULTS.keyFeatures).slice(
      0,
      MAX_FEATURES
    ),
    currentFocus: text(data, 'current_focus', FIELD_DEFAULTS.currentFocus),
    futurePlans: text(data, 'future_plans', FIELD_DEFAULTS.futurePlans),
  };
}

export class LLMReasoningEngine implements ReasoningEngine {
  readonly name: string;
  private llm: LLMService;

  constructor(llm: LLMService) {
    this.llm = llm;
    this.name = llm.getProviderName();
  }

  async reason(signals: TechnicalSignals, content: string): Promise<Insights> {
    logger.inference(`Generating insights with ${this.name}`);
    try {
      const data = await this.llm.completeJSON({
        systemPrompt: SYSTEM_PROMPT,
        userPrompt: buildPrompt(signals, content),
        temperature: 0.3,
        maxTokens: 2000,
      });
      return toInsights(data);
    } catch (error) {
      logger.warning(`${this.name} reasoning failed, using fallback insights: ${errorMessage(error)}`);
      return fallbackInsights();
    }
  }
}
