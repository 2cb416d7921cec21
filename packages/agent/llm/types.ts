export type LLMProvider = 'openai' | 'anthropic';

export interface LlmCallMetadata {
  // Chat user the call is made on behalf of
  userId?: string;
  // Optional model override for this call (e.g., 'gpt-4o-mini', 'claude-3-5-haiku-20241022')
  model?: string;
  requestType?: string;
}

export interface LLM {
  text(args: {
    system?: string;
    user: string;
    temperature?: number;
    maxTokens?: number;
    timeoutMs?: number;
    /** Ask the provider for a single JSON object where it supports that. */
    json?: boolean;
    metadata?: LlmCallMetadata;
  }): Promise<string>;
}
