export * from './assistant.module.js';
export * from './assistant.tokens.js';
