/**
 * Resource category table
 * Manifest names, content file prefixes and list tags per category
 */

import type { Category } from './schema.js';

export interface CategoryDefinition {
  category: Category;
  /** Human-readable label used in rule comments and summaries */
  label: string;
  /** Summary manifest inside a snapshot directory */
  manifest: string;
  /**
   * Tags used for new/existing list labels. A routing profile carries its
   * queue associations along, so it has two tags.
   */
  tags: readonly string[];
  /** Prefixes of the companion content files (`<prefix>_<encoded name>.json`) */
  contentPrefixes: readonly string[];
}

export const CATEGORIES: readonly CategoryDefinition[] = [
  {
    category: 'prompt',
    label: 'Prompt',
    manifest: 'prompts.json',
    tags: ['prompt'],
    contentPrefixes: [],
  },
  {
    category: 'hoursOfOperation',
    label: 'Hours of operation',
    manifest: 'hours.json',
    tags: ['hour'],
    contentPrefixes: ['hour'],
  },
  {
    category: 'queue',
    label: 'Queue',
    manifest: 'queues.json',
    tags: ['queue'],
    contentPrefixes: ['queue'],
  },
  {
    category: 'routingProfile',
    label: 'Routing profile',
    manifest: 'routings.json',
    tags: ['routing', 'routingQs'],
    contentPrefixes: ['routing', 'routingQs'],
  },
  {
    category: 'contactFlowModule',
    label: 'Flow module',
    manifest: 'modules.json',
    tags: ['module'],
    contentPrefixes: ['module'],
  },
  {
    category: 'contactFlow',
    label: 'Flow',
    manifest: 'flows.json',
    tags: ['flow'],
    contentPrefixes: ['flow'],
  },
];

export const CATEGORY_ORDER: readonly Category[] = CATEGORIES.map((c) => c.category);

export function getCategoryDefinition(category: Category): CategoryDefinition {
  const definition = CATEGORIES.find((c) => c.category === category);
  if (!definition) {
    throw new Error(`Unknown category: ${category}`);
  }
  return definition;
}

/**
 * List labels for one resource, e.g. `flow_Welcome` or
 * `routing_Tier1` + `routingQs_Tier1`
 */
export function labelsFor(category: Category, name: string): string[] {
  return getCategoryDefinition(category).tags.map((tag) => `${tag}_${name}`);
}
