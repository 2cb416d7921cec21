export * from './queue/keyed-serial-queue.js';
