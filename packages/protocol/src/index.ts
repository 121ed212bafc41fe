// @fastapp/protocol - shared types, errors and validation

export * from './types/index.js';
export * from './errors.js';
export * from './validation/identifiers.js';
export * from './validation/addons.js';
