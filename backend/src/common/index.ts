export * from './retrieval.errors.js';
export * from './retrieval-exception.filter.js';
