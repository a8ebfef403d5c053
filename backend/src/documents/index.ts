export * from './document-registry.js';
export * from './document.types.js';
export * from './documents.module.js';
export * from './documents.service.js';
