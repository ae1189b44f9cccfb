/**
 * Command exports
 */

export { discoverCommand, type DiscoverOptions, type DiscoverSummary } from './discover.js';
export { updateCommand, type UpdateOptions, type UpdateSummary } from './update.js';
