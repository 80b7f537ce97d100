export * from './types.js';
export * from './message.js';
export * from './task.js';
export * from './card.js';
