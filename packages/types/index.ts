export * from './errors.js';
export * from './chat.js';
