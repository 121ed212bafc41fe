// Redis: pub/sub collaborator, not a repository backend

export * from './errors.js';
export * from './event-bus.js';
