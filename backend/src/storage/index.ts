export * from './document-storage.js';
export * from './file-system-document-storage.js';
export * from './storage.module.js';
