export * from './answer-composer.js';
export * from './highlights.js';
export * from './passage-aggregator.js';
export * from './query.module.js';
export * from './query.service.js';
export * from './query.types.js';
