import type { Intent } from './intents.js';

export interface IntentContext {
  userId?: string;
}

/**
 * Turns one chat message into an `Intent`. Implementations raise
 * `ExternalServiceError` when their backend fails; text they cannot make
 * sense of comes back as a `fallback` intent.
 */
export interface IntentParser {
  parse(text: string, context?: IntentContext): Promise<Intent>;
}
