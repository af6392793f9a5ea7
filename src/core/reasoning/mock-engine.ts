/**
 * Fixed-template engine for tests and offline runs
 */

import type { Insights, TechnicalSignals } from '../../types/index.js';
import { fallbackInsights, type ReasoningEngine } from './reasoning-engine.js';

export class MockReasoningEngine implements ReasoningEngine {
  readonly name = 'mock';

  async reason(_signals: TechnicalSignals, _content: string): Promise<Insights> {
    return fallbackInsights();
  }
}
