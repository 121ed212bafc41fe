// Common types used across FastApp core

/**
 * ISO 8601 timestamp string
 */
export type Timestamp = string;
