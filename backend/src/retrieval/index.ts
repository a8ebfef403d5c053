export * from './chunker.js';
export * from './retrieval.types.js';
export * from './similarity-index.js';
export * from './tokenizer.js';
