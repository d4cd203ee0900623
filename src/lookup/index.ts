/**
 * Lookup module exports
 * Provides easy access to the remote lookup classes
 */

export { LookupRequest } from './LookupRequest';
export { LookupClient } from './LookupClient';

// Re-export for convenience
export type { FetchLike, LookupResponse, LookupRequestOptions } from './LookupRequest';
export type { LookupEndpoints } from './LookupClient';
