/**
 * Central export for the intent-extraction prompts
 */
export { buildIntentSystemPrompt } from './INTENT_SYSTEM.js';
export { buildIntentUserPrompt } from './INTENT_USER_PROMPT.js';
