// Repository interfaces - the contract every backend implements

export * from './record-repository.js';
export * from './repository-context.js';
