/**
 * Interactive prompts for the repo-profiler CLI
 *
 * Every prompt returns plain values; callers feed them into config
 * resolution. Nothing here touches process.env.
 */

import { confirm, password, select } from '@inquirer/prompts';

let interactiveMode = Boolean(process.stdin.isTTY && process.stdout.isTTY) && !process.env.CI;

/**
 * Whether prompts may be shown
 */
export function isInteractive(): boolean {
  return interactiveMode;
}

/**
 * Force interactive mode on or off (e.g. --no-interactive)
 */
export function setInteractiveMode(enabled: boolean): void {
  interactiveMode = enabled;
}

export type HostedProvider = 'openai' | 'anthropic';

export const PROVIDER_CHOICES = [
  { name: 'OpenAI (requires API key)', value: 'openai' },
  { name: 'Anthropic (requires API key)', value: 'anthropic' },
  { name: 'Local model (Ollama or another OpenAI-compatible server)', value: 'local' },
  { name: 'Rule-based (offline, no AI)', value: 'rules' },
  { name: 'Mock (fixed templates)', value: 'mock' },
] as const;

export type ProviderChoice = (typeof PROVIDER_CHOICES)[number]['value'];

const KEY_URLS: Record<HostedProvider, string> = {
  openai: 'https://platform.openai.com/api-keys',
  anthropic: 'https://console.anthropic.com/',
};

/**
 * Ask which reasoning backend to use
 */
export async function selectProvider(): Promise<ProviderChoice> {
  return select<ProviderChoice>({
    message: 'No AI provider is configured. Choose a reasoning backend:',
    choices: PROVIDER_CHOICES.map((choice) => ({ name: choice.name, value: choice.value })),
    default: 'rules',
  });
}

/**
 * Ask for an API key; null when the user has none
 */
export async function promptApiKey(provider: HostedProvider): Promise<string | null> {
  const label = provider === 'openai' ? 'OpenAI' : 'Anthropic';
  const hasKey = await confirm({
    message: `Do you have an ${label} API key? (get one at ${KEY_URLS[provider]})`,
    default: true,
  });
  if (!hasKey) {
    return null;
  }

  const key = await password({ message: `Enter your ${label} API key:`, mask: '*' });
  return key.trim() || null;
}

/**
 * Confirm replacing an existing output file
 */
export async function confirmOverwrite(filePath: string): Promise<boolean> {
  return confirm({ message: `${filePath} already exists. Overwrite it?`, default: false });
}
