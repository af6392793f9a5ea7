/**
 * Reasoning engine contract and the shared fallback bundle
 */

import type { Insights, TechnicalSignals } from '../../types/index.js';

/**
 * Produces insights from technical signals and a content digest.
 * Implementations never reject for backend failures; they fall back instead.
 */
export interface ReasoningEngine {
  readonly name: string;
  reason(signals: TechnicalSignals, content: string): Promise<Insights>;
}

export const FALLBACK_INSIGHTS: Readonly<Insights> = {
  problem: 'This project addresses specific technical challenges in its domain.',
  solution: 'The project provides a comprehensive solution using modern development practices.',
  valueProposition: 'Offers improved efficiency, reliability, and user experience.',
  targetUsers: 'Developers, engineers, and technical professionals.',
  keyFeatures: [
    'Modern architecture and design',
    'Comprehensive functionality',
    'Developer-friendly interface',
    'Reliable performance',
  ],
  currentFocus: 'Enhancing core features and improving documentation.',
  futurePlans: 'Expanding capabilities and growing the user community.',
};

/**
 * A fresh, mutable copy of the fallback bundle
 */
export function fallbackInsights(): Insights {
  return { ...FALLBACK_INSIGHTS, keyFeatures: [...FALLBACK_INSIGHTS.keyFeatures] };
}
