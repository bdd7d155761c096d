export * from './lib/types';
export * from './lib/errors';
export * from './lib/history';
export * from './lib/similarity';
export * from './lib/item';
export * from './lib/matching';
export * from './lib/difficulty';
export * from './lib/engine';
export * from './lib/random';
export * from './lib/selection';
export * from './lib/deck';
export * from './lib/env';
export * from './lib/session';
