/**
 * Category Reconciler
 * Pairs snapshot A resources with snapshot B resources by exact name
 */

import { CATEGORY_ORDER, labelsFor } from './categories.js';
import { AmbiguousMatchError } from './errors.js';
import { getRecords } from './snapshot.js';
import type {
  Category,
  CategoryOutcomes,
  DuplicatePolicy,
  ExistingOutcome,
  MatchOutcome,
  NewOutcome,
  ResourceRecord,
  Snapshot,
} from './schema.js';

export interface ReconcileOptions {
  /** Defaults to 'reject' */
  duplicates?: DuplicatePolicy;
}

/**
 * Build a name → ids lookup. Ids keep manifest order, so the first entry
 * is the first record carrying that name.
 */
export function buildNameIndex(records: readonly ResourceRecord[]): Map<string, string[]> {
  const index = new Map<string, string[]>();
  for (const record of records) {
    const ids = index.get(record.name);
    if (ids) {
      ids.push(record.id);
    } else {
      index.set(record.name, [record.id]);
    }
  }
  return index;
}

function assertUniqueNames(category: Category, snapshot: Snapshot): void {
  for (const [name, ids] of buildNameIndex(getRecords(snapshot, category))) {
    if (ids.length > 1) {
      throw new AmbiguousMatchError(category, snapshot.alias, name, ids);
    }
  }
}

/**
 * Classify every snapshot A record of one category as new or existing.
 * Outcomes follow snapshot A's manifest order.
 */
export function reconcileCategory(
  category: Category,
  snapshotA: Snapshot,
  snapshotB: Snapshot,
  options: ReconcileOptions = {}
): MatchOutcome[] {
  const policy = options.duplicates ?? 'reject';
  if (policy === 'reject') {
    assertUniqueNames(category, snapshotA);
  }

  const index = buildNameIndex(getRecords(snapshotB, category));

  return getRecords(snapshotA, category).map((record): MatchOutcome => {
    const candidates = index.get(record.name);
    if (!candidates) {
      return { kind: 'new', record };
    }
    if (candidates.length > 1 && policy === 'reject') {
      throw new AmbiguousMatchError(category, snapshotB.alias, record.name, candidates);
    }
    return {
      kind: 'existing',
      idA: record.id,
      idB: candidates[0],
      name: record.name,
      category,
    };
  });
}

/**
 * Reconcile every category in processing order
 */
export function reconcileSnapshots(
  snapshotA: Snapshot,
  snapshotB: Snapshot,
  options: ReconcileOptions = {}
): CategoryOutcomes[] {
  return CATEGORY_ORDER.map((category) => ({
    category,
    outcomes: reconcileCategory(category, snapshotA, snapshotB, options),
  }));
}

export function partitionOutcomes(outcomes: readonly MatchOutcome[]): {
  created: NewOutcome[];
  existing: ExistingOutcome[];
} {
  const created: NewOutcome[] = [];
  const existing: ExistingOutcome[] = [];
  for (const outcome of outcomes) {
    if (outcome.kind === 'new') {
      created.push(outcome);
    } else {
      existing.push(outcome);
    }
  }
  return { created, existing };
}

export function outcomeName(outcome: MatchOutcome): string {
  return outcome.kind === 'new' ? outcome.record.name : outcome.name;
}

export function outcomeCategory(outcome: MatchOutcome): Category {
  return outcome.kind === 'new' ? outcome.record.category : outcome.category;
}

/**
 * New/existing list labels for an outcome. A routing profile yields its
 * queue-association label too, so both always land in the same list.
 */
export function outcomeLabels(outcome: MatchOutcome): string[] {
  return labelsFor(outcomeCategory(outcome), outcomeName(outcome));
}
