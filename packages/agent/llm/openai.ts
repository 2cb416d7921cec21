import OpenAI from 'openai';
import type { LLM } from './types.js';
import { DEFAULT_OPENAI_MODEL, loadLLMConfig } from './config.js';

const createOpenAIClient = () => {
  const config = loadLLMConfig();
  return new OpenAI({
    apiKey: config.openai?.apiKey,
    baseURL: config.openai?.baseURL,
  });
};

export function makeOpenAiLLM(
  client: OpenAI = createOpenAIClient(),
  defaultModel = loadLLMConfig().openai?.model ?? DEFAULT_OPENAI_MODEL,
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

      try {
        const res = await client.chat.completions.create(
          {
            model: chosenModel,
            messages: system
              ? [
                  { role: 'system', content: system },
                  { role: 'user', content: user },
                ]
              : [{ role: 'user', content: user }],
            temperature,
            max_tokens: maxTokens,
            response_format: json ? { type: 'json_object' } : undefined,
            user: metadata?.userId,
          },
          { signal: ctrl.signal },
        );

        return res.choices?.[0]?.message?.content?.toString() ?? '';
      } finally {
        clearTimeout(t);
      }
    },
  };
}
