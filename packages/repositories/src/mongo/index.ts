// MongoDB backend: the official driver, explicit transaction handles

export * from './client.js';
export * from './documents.js';
export * from './errors.js';
export * from './sessions.js';
export * from './record-repository.js';
export * from './context.js';
