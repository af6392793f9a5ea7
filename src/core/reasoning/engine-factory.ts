/**
 * Reasoning engine selection
 *
 * Turns a provider name plus explicit credentials into an engine choice,
 * then builds the engine. Nothing here reads or writes process.env.
 */

import logger from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import { createLLMService, normalizeApiBase } from '../services/llm-service.js';
import type { EngineName, ReasoningCredentials, ResolvedConfig } from '../../types/index.js';
import type { ReasoningEngine } from './reasoning-engine.js';
import { MockReasoningEngine } from './mock-engine.js';
import { RuleBasedReasoningEngine } from './rule-based-engine.js';
import { LLMReasoningEngine } from './llm-engine.js';

export interface EngineRequest {
  /** openai | anthropic | local | rules | simple | mock | auto */
  provider: string;
  credentials: ReasoningCredentials;
  model?: string | null;
}

export interface EngineChoice {
  name: EngineName;
  apiKey?: string;
  model?: string | null;
  /** Human-readable explanation of the choice */
  reason: string;
}

export interface ProviderStatus {
  name: EngineName;
  available: boolean;
  hasKey: boolean;
  detail: string;
}

const LOCAL_PROBE_TIMEOUT_MS = 2000;

/**
 * Decide which engine to build. Missing keys and unknown names
 * degrade to the rule-based engine with a warning.
 */
export function resolveEngineChoice(request: EngineRequest): EngineChoice {
  const provider = request.provider.trim().toLowerCase();
  const { openaiApiKey, anthropicApiKey } = request.credentials;
  const model = request.model ?? null;

  switch (provider) {
    case 'mock':
      return { name: 'mock', reason: 'mock engine requested' };
    case 'rules':
    case 'simple':
      return { name: 'rules', reason: 'rule-based engine requested' };
    case 'local':
      return { name: 'local', model, reason: 'local model requested' };
    case 'openai':
    case 'anthropic': {
      const apiKey = provider === 'openai' ? openaiApiKey : anthropicApiKey;
      if (apiKey) {
        return { name: provider, apiKey, model, reason: `${provider} requested` };
      }
      logger.warning(`No ${provider} API key provided, falling back to rule-based reasoning`);
      return { name: 'rules', reason: `no ${provider} API key` };
    }
    case 'auto':
      if (openaiApiKey) {
        return { name: 'openai', apiKey: openaiApiKey, model, reason: 'OpenAI API key found' };
      }
      if (anthropicApiKey) {
        return { name: 'anthropic', apiKey: anthropicApiKey, model, reason: 'Anthropic API key found' };
      }
      return { name: 'rules', reason: 'no API key found' };
    default:
      logger.warning(`Unknown provider '${request.provider}', falling back to rule-based reasoning`);
      return { name: 'rules', reason: `unknown provider '${request.provider}'` };
  }
}

/**
 * Build the engine for a resolved choice
 */
export function createReasoningEngine(choice: EngineChoice, config: ResolvedConfig): ReasoningEngine {
  const { reasoning } = config;

  switch (choice.name) {
    case 'mock':
      return new MockReasoningEngine();
    case 'rules':
      return new RuleBasedReasoningEngine();
    case 'openai':
      return new LLMReasoningEngine(
        createLLMService({
          provider: 'openai',
          apiKey: choice.apiKey,
          model: choice.model,
          apiBase: reasoning.openaiBaseUrl,
          timeout: reasoning.timeoutMs,
        })
      );
    case 'anthropic':
      return new LLMReasoningEngine(
        createLLMService({
          provider: 'anthropic',
          apiKey: choice.apiKey,
          model: choice.model,
          apiBase: reasoning.anthropicBaseUrl,
          timeout: reasoning.timeoutMs,
        })
      );
    case 'local':
      return new LLMReasoningEngine(
        createLLMService({
          provider: 'local',
          model: choice.model,
          apiBase: reasoning.localBaseUrl,
          timeout: reasoning.timeoutMs,
        })
      );
  }
}

/**
 * Check whether an OpenAI-compatible local server answers GET /models
 */
export async function probeLocalServer(baseUrl: string, timeoutMs = LOCAL_PROBE_TIMEOUT_MS): Promise<boolean> {
  try {
    const response = await fetch(`${normalizeApiBase(baseUrl)}/models`, {
      signal: AbortSignal.timeout(timeoutMs),
    });
    return response.ok;
  } catch (error) {
    logger.debug(`Local model server not reachable at ${baseUrl}: ${errorMessage(error)}`);
    return false;
  }
}

/**
 * Availability of every backend for the given configuration
 */
export async function listProviders(config: ResolvedConfig): Promise<ProviderStatus[]> {
  const { credentials, localBaseUrl } = config.reasoning;
  const localUp = await probeLocalServer(localBaseUrl);

  return [
    {
      name: 'openai',
      available: Boolean(credentials.openaiApiKey),
      hasKey: Boolean(credentials.openaiApiKey),
      detail: credentials.openaiApiKey ? 'API key configured' : 'set OPENAI_API_KEY or pass --openai-key',
    },
    {
      name: 'anthropic',
      available: Boolean(credentials.anthropicApiKey),
      hasKey: Boolean(credentials.anthropicApiKey),
      detail: credentials.anthropicApiKey ? 'API key configured' : 'set ANTHROPIC_API_KEY or pass --anthropic-key',
    },
    {
      name: 'local',
      available: localUp,
      hasKey: true,
      detail: localUp ? `server at ${localBaseUrl}` : `no server at ${localBaseUrl} (start Ollama or set LOCAL_LLM_BASE_URL)`,
    },
    { name: 'rules', available: true, hasKey: true, detail: 'built-in' },
    { name: 'mock', available: true, hasKey: true, detail: 'built-in' },
  ];
}
