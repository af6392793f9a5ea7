/**
 * Shared signal fixture for reasoning tests
 */

import type { TechnicalSignals } from '../../types/index.js';

export function makeSignals(overrides: Partial<TechnicalSignals> = {}): TechnicalSignals {
  return {
    languages: ['Python'],
    frameworks: ['flask'],
    projectType: 'api',
    maturity: 'mvp',
    activityLevel: 'high',
    techStack: ['Python', 'flask'],
    ...overrides,
  };
}
