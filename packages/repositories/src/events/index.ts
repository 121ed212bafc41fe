export * from './dispatch.js';
export * from './envelope.js';
