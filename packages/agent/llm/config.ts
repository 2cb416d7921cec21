import { Logger } from '@nestjs/common';
import { ValidationError } from '@timekeeper/types';
import type { LLMProvider } from './types.js';

/**
 * LLM Configuration interface
 */
export interface LLMConfig {
  provider: LLMProvider;
  openai?: {
    apiKey: string;
    model: string;
    baseURL?: string;
  };
  anthropic?: {
    apiKey: string;
    model: string;
  };
}

export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini';
export const DEFAULT_ANTHROPIC_MODEL = 'claude-3-5-haiku-20241022';

/**
 * Load LLM configuration from environment variables
 */
export function loadLLMConfig(env: NodeJS.ProcessEnv = process.env): LLMConfig {
  const config: LLMConfig = {
    provider: detectProvider(env),
  };

  if (env.OPENAI_API_KEY) {
    config.openai = {
      apiKey: env.OPENAI_API_KEY,
      model: env.OPENAI_MODEL || DEFAULT_OPENAI_MODEL,
      baseURL: env.OPENAI_BASE_URL || undefined,
    };
  }

  if (env.ANTHROPIC_API_KEY) {
    config.anthropic = {
      apiKey: env.ANTHROPIC_API_KEY,
      model: env.ANTHROPIC_MODEL || DEFAULT_ANTHROPIC_MODEL,
    };
  }

  return config;
}

/**
 * Detects which LLM provider to use.
 * Priority:
 * 1. LLM_PROVIDER env var (openai, anthropic / claude)
 * 2. ANTHROPIC_API_KEY present without OPENAI_API_KEY → anthropic
 * 3. Default to openai
 */
export function detectProvider(env: NodeJS.ProcessEnv = process.env): LLMProvider {
  const explicitProvider = env.LLM_PROVIDER?.toLowerCase();

  if (explicitProvider === 'anthropic' || explicitProvider === 'claude') {
    return 'anthropic';
  }

  if (explicitProvider === 'openai') {
    return 'openai';
  }

  if (env.ANTHROPIC_API_KEY && !env.OPENAI_API_KEY) {
    return 'anthropic';
  }

  return 'openai';
}

/**
 * Validate that required settings are present for the selected provider
 * @throws ValidationError if required variables are missing
 */
export function validateLLMConfig(config: LLMConfig): void {
  switch (config.provider) {
    case 'openai':
      if (!config.openai?.apiKey) {
        throw new ValidationError(
          'OpenAI API key is required. Set OPENAI_API_KEY environment variable.',
        );
      }
      break;

    case 'anthropic':
      if (!config.anthropic?.apiKey) {
        throw new ValidationError(
          'Anthropic API key is required. Set ANTHROPIC_API_KEY environment variable.',
        );
      }
      break;

    default: {
      const unknown: never = config.provider;
      throw new ValidationError(`Unsupported LLM provider: ${String(unknown)}`);
    }
  }
}

export function getProviderDisplayName(provider: LLMProvider): string {
  switch (provider) {
    case 'openai':
      return 'OpenAI';
    case 'anthropic':
      return 'Anthropic Claude';
  }
}

/**
 * Log current LLM configuration (never logs API keys)
 */
export function logLLMConfig(config: LLMConfig, logger = new Logger('LLMConfig')): void {
  logger.log(`Provider: ${getProviderDisplayName(config.provider)}`);
  const settings = config.provider === 'openai' ? config.openai : config.anthropic;
  logger.log(`Model: ${settings?.model ?? '(none)'}`);
  logger.log(`API Key: ${settings?.apiKey ? '✓ Set' : '✗ Missing'}`);
}
