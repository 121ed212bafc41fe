// Re-export all protocol types

export * from './common.js';
export * from './addons.js';
export * from './records.js';
export * from './events.js';
export * from './logging.js';
