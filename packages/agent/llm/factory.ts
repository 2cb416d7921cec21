import { Logger } from '@nestjs/common';
import type { LLM, LLMProvider } from './types.js';
import { makeOpenAiLLM } from './openai.js';
import { makeAnthropicLLM } from './anthropic.js';
import { loadLLMConfig, validateLLMConfig, logLLMConfig } from './config.js';

const logger = new Logger('LLMFactory');

/**
 * Create the LLM instance for the configured provider.
 *
 * @param provider - The LLM provider to use (defaults to environment config)
 * @param verbose - If true, logs configuration details
 *
 * @example
 * ```typescript
 * // Use default provider from environment
 * const llm = createLLM();
 *
 * // Explicitly use Claude
 * const claudeLLM = createLLM('anthropic');
 * ```
 */
export function createLLM(provider?: LLMProvider, verbose = false): LLM {
  const config = loadLLMConfig();
  if (provider) {
    config.provider = provider;
  }

  validateLLMConfig(config);

  if (verbose) {
    logLLMConfig(config, logger);
  }

  switch (config.provider) {
    case 'anthropic':
      logger.log('Using Anthropic Claude');
      return makeAnthropicLLM();

    case 'openai':
      logger.log('Using OpenAI');
      return makeOpenAiLLM();
  }
}

/**
 * Get all available LLM providers based on configured API keys
 */
export function getAvailableProviders(env: NodeJS.ProcessEnv = process.env): LLMProvider[] {
  const providers: LLMProvider[] = [];

  if (env.OPENAI_API_KEY) {
    providers.push('openai');
  }

  if (env.ANTHROPIC_API_KEY) {
    providers.push('anthropic');
  }

  return providers;
}
