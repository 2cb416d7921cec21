import Anthropic from '@anthropic-ai/sdk';
import type { LLM } from './types.js';
import { DEFAULT_ANTHROPIC_MODEL, loadLLMConfig } from './config.js';

/**
 * Create Anthropic (Claude) client
 */
const createAnthropicClient = () => {
  const apiKey = loadLLMConfig().anthropic?.apiKey;

  if (!apiKey) {
    throw new Error('ANTHROPIC_API_KEY environment variable is required for Claude');
  }

  return new Anthropic({
    apiKey,
  });
};

/**
 * Creates a Claude LLM instance using Anthropic's API.
 *
 * @param client - Optional Anthropic client instance (useful for testing)
 */
export function makeAnthropicLLM(
  client: Anthropic = createAnthropicClient(),
  defaultModel = loadLLMConfig().anthropic?.model ?? DEFAULT_ANTHROPIC_MODEL,
): LLM {
  return {
    async text({ system, user, temperature = 0.2, maxTokens = 300, timeoutMs = 15_000, json, metadata }) {
      const ctrl = new AbortController();
      const t = setTimeout(() => ctrl.abort(), timeoutMs);

      const modelOverride = metadata?.model;
      const chosenModel =
        typeof modelOverride === 'string' && modelOverride.trim().length > 0
          ? modelOverride
          : defaultModel;

      // Claude has no JSON response mode; steer it with the system prompt instead.
      const systemPrompt = json
        ? [system, 'Respond with a single JSON object and nothing else.'].filter(Boolean).join('\n\n')
        : system;

      try {
        const res = await client.messages.create(
          {
            model: chosenModel,
            messages: [{ role: 'user', content: user }],
            system: systemPrompt || undefined,
            temperature,
            max_tokens: maxTokens,
          },
          {
            signal: ctrl.signal,
          },
        );

        return res.content
          .map((block) => (block.type === 'text' ? block.text : ''))
          .filter(Boolean)
          .join('\n');
      } finally {
        clearTimeout(t);
      }
    },
  };
}
