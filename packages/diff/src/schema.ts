/**
 * Flowport Diff Schema
 * Types shared by the snapshot reader, reconciler, rule generator and writer
 */

// =============================================================================
// Resources
// =============================================================================

/**
 * Resource categories, listed in processing order
 */
export type Category =
  | 'prompt'
  | 'hoursOfOperation'
  | 'queue'
  | 'routingProfile'
  | 'contactFlowModule'
  | 'contactFlow';

export interface ResourceRecord {
  readonly id: string;
  readonly name: string;
  readonly category: Category;
  /** Absolute paths of the companion content files, one per content prefix */
  readonly files: readonly string[];
}

export interface InstanceInfo {
  id: string;
  arn: string;
  alias: string;
  partition: string;
  region: string;
  accountId: string;
  /** Named credentials profile used when the snapshot was captured */
  profile: string;
  /** Flow-name prefix the capture was restricted to, if any */
  flowPrefix: string;
  /** Every key read from instance.var */
  variables: Readonly<Record<string, string>>;
}

export interface Snapshot {
  readonly alias: string;
  readonly rootDir: string;
  readonly instance: Readonly<InstanceInfo>;
  readonly records: ReadonlyMap<Category, readonly ResourceRecord[]>;
}

// =============================================================================
// Reconciliation
// =============================================================================

export interface NewOutcome {
  kind: 'new';
  record: ResourceRecord;
}

export interface ExistingOutcome {
  kind: 'existing';
  idA: string;
  idB: string;
  name: string;
  category: Category;
}

export type MatchOutcome = NewOutcome | ExistingOutcome;

/**
 * How repeated names inside one snapshot category are handled
 * - reject: fail with AmbiguousMatchError
 * - first-match: pair with the first record carrying the name
 */
export type DuplicatePolicy = 'reject' | 'first-match';

export interface CategoryOutcomes {
  category: Category;
  outcomes: MatchOutcome[];
}

// =============================================================================
// Substitution Rules
// =============================================================================

export interface SubstitutionRule {
  pattern: string;
  replacement: string;
  comment: string;
}

export interface PrefixPair {
  source: string;
  target: string;
}

export interface RuleContext {
  source: InstanceInfo;
  target: InstanceInfo;
  lambdaPrefix?: PrefixPair;
  botPrefix?: PrefixPair;
}

// =============================================================================
// Helper Bundle
// =============================================================================

export interface CategorySummary {
  category: Category;
  label: string;
  created: number;
  existing: number;
}

export interface HelperBundle {
  variables: Record<string, string>;
  newList: string[];
  existingList: string[];
  rules: SubstitutionRule[];
  summary: CategorySummary[];
}

export interface BundleFile {
  name: string;
  content: string;
}
