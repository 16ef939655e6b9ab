/**
 * Flowport CLI Commands
 *
 * - plan/  - Snapshot comparison (diff, rewrite)
 */

export { diffCommand, rewriteCommand } from './plan';
