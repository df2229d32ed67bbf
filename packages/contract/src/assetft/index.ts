export * from './features.js';
export type * from './messages.js';
export type * from './queries.js';
export * from './responses.js';
