/**
 * Planning commands
 * Compare snapshots and preview the resulting rewrites
 */

export { diffCommand } from './diff';
export { rewriteCommand } from './rewrite';
