export * from './clock.js';
export * from './llm/index.js';
export * from './scheduling/working-hours.js';
export * from './scheduling/busy-index.js';
export * from './scheduling/free-slots.js';
export * from './scheduling/recurrence.js';
export * from './scheduling/event-request.js';
export * from './scheduling/time-slot-manager.js';
export * from './similarity/types.js';
export * from './similarity/lexical.js';
export * from './similarity/openai-embeddings.js';
export * from './selection/event-selector.js';
export * from './intents/intents.js';
export * from './intents/intent-parser.js';
export * from './intents/llm-intent-parser.js';
export * from './conversation/session.js';
export * from './conversation/session-store.js';
export * from './conversation/conversation.service.js';
export * from './nest/index.js';
