/**
 * Rule-based reasoning engine
 *
 * Maps the project type to a pre-written bundle and scans the content
 * digest for keywords to pick features and a current focus. No network.
 */

import type { Insights, ProjectType, TechnicalSignals } from '../../types/index.js';
import type { ReasoningEngine } from './reasoning-engine.js';

type TypeBundle = Pick<Insights, 'problem' | 'solution' | 'valueProposition' | 'targetUsers' | 'futurePlans'>;

const TYPE_BUNDLES: Partial<Record<ProjectType, TypeBundle>> = {
  web_app: {
    problem:
      'Building modern web applications requires managing complex frontend and backend interactions, state management, and user experience optimization.',
    solution:
      'This web application provides a streamlined architecture with modern frameworks and best practices for scalable development.',
    valueProposition: 'Delivers fast, responsive user experiences with maintainable code architecture.',
    targetUsers: 'Web developers, frontend engineers, and product teams building user-facing applications.',
    futurePlans: 'Expanding cross-platform support and adding advanced user interface components.',
  },
  cli: {
    problem:
      'Developers need efficient command-line tools that are easy to use, well-documented, and integrate seamlessly into existing workflows.',
    solution:
      'This CLI tool provides intuitive commands with comprehensive help documentation and robust error handling.',
    valueProposition:
      'Streamlines development workflows and automates repetitive tasks with reliable command-line interface.',
    targetUsers: 'Software developers, DevOps engineers, and system administrators.',
    futurePlans: 'Adding more automation features and improving cross-platform compatibility.',
  },
  api: {
    problem:
      'Creating robust APIs requires careful design of endpoints, data validation, authentication, and comprehensive documentation.',
    solution:
      'This API provides well-structured endpoints with automatic validation, clear documentation, and scalable architecture.',
    valueProposition:
      'Enables reliable data exchange and integration with comprehensive API documentation and testing tools.',
    targetUsers: 'Backend developers, API consumers, and integration teams.',
    futurePlans: 'Expanding API endpoints and improving performance optimization.',
  },
  library: {
    problem:
      'Developers need reusable, well-tested libraries that solve common problems without adding unnecessary complexity.',
    solution:
      'This library provides clean APIs, comprehensive documentation, and thorough testing for reliable integration.',
    valueProposition: 'Accelerates development by providing tested, reusable components with clear documentation.',
    targetUsers: 'Software developers and engineering teams building applications.',
    futurePlans: 'Adding new features and maintaining backward compatibility.',
  },
};

const DEFAULT_BUNDLE: TypeBundle = {
  problem: 'This project addresses specific technical challenges in its domain with innovative solutions.',
  solution: 'Implements comprehensive functionality using modern development practices and proven patterns.',
  valueProposition: 'Provides reliable, efficient solutions that improve productivity and code quality.',
  targetUsers: 'Developers, engineers, and technical professionals in the relevant domain.',
  futurePlans: 'Expanding capabilities and improving user experience based on community feedback.',
};

/** Substring keywords, checked in order; each rule contributes one feature */
const FEATURE_RULES: { keywords: string[]; feature: string }[] = [
  { keywords: ['test', 'spec'], feature: 'Comprehensive testing suite' },
  { keywords: ['docker'], feature: 'Containerized deployment' },
  { keywords: ['api', 'endpoint'], feature: 'RESTful API design' },
  { keywords: ['react', 'vue', 'angular'], feature: 'Modern frontend framework' },
  { keywords: ['typescript'], feature: 'Type-safe development' },
  { keywords: ['auth', 'login'], feature: 'Authentication system' },
  { keywords: ['database', 'db'], feature: 'Database integration' },
];

const DEFAULT_FEATURES = [
  'Clean, maintainable code architecture',
  'Comprehensive documentation',
  'User-friendly interface',
  'Reliable performance',
];

/** First matching rule wins */
const FOCUS_RULES: { keywords: string[]; focus: string }[] = [
  { keywords: ['todo', 'fixme'], focus: 'Addressing technical debt and implementing planned improvements.' },
  { keywords: ['beta', 'alpha'], focus: 'Stabilizing features and preparing for production release.' },
  { keywords: ['v1', 'release'], focus: 'Finalizing features and ensuring production readiness.' },
];

const DEFAULT_FOCUS = 'Improving core functionality and user experience.';

export const MAX_FEATURES = 5;

/**
 * Problem/solution/value/target/future-plans bundle for a project type
 */
export function bundleForType(projectType: ProjectType): TypeBundle {
  return TYPE_BUNDLES[projectType] ?? DEFAULT_BUNDLE;
}

/**
 * Features suggested by keyword hits in the content
 */
export function detectFeatures(content: string): string[] {
  const lower = content.toLowerCase();
  const features = FEATURE_RULES.filter((rule) => rule.keywords.some((kw) => lower.includes(kw))).map(
    (rule) => rule.feature
  );
  return features.length > 0 ? features.slice(0, MAX_FEATURES) : [...DEFAULT_FEATURES];
}

export function detectFocus(content: string): string {
  const lower = content.toLowerCase();
  const rule = FOCUS_RULES.find((r) => r.keywords.some((kw) => lower.includes(kw)));
  return rule?.focus ?? DEFAULT_FOCUS;
}

export class RuleBasedReasoningEngine implements ReasoningEngine {
  readonly name = 'rules';

  async reason(signals: TechnicalSignals, content: string): Promise<Insights> {
    const bundle = bundleForType(signals.projectType);
    return {
      ...bundle,
      keyFeatures: detectFeatures(content),
      currentFocus: detectFocus(content),
    };
  }
}
