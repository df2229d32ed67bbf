export * from './errors/index.js';
export * from './schemas/primitives.js';
export * from './schemas/coin.js';
export * from './utils/decimal-utils.js';
export * from './utils/type-guard-utils.js';
export * from './utils/zod-utils.js';
