/**
 * @flowport/diff
 * Snapshot reconciliation and substitution rule generation for
 * contact-center resources
 */

// Schema types
export type {
  Category,
  ResourceRecord,
  InstanceInfo,
  Snapshot,
  NewOutcome,
  ExistingOutcome,
  MatchOutcome,
  DuplicatePolicy,
  CategoryOutcomes,
  SubstitutionRule,
  PrefixPair,
  RuleContext,
  CategorySummary,
  HelperBundle,
  BundleFile,
} from './schema.js';

// Categories
export {
  CATEGORIES,
  CATEGORY_ORDER,
  getCategoryDefinition,
  labelsFor,
  type CategoryDefinition,
} from './categories.js';

// Errors
export {
  FlowportError,
  MissingInputError,
  InvalidInputError,
  DirectoryConflictError,
  EncodingUnsupportedError,
  AmbiguousMatchError,
  RuleScriptError,
  type FlowportErrorCode,
} from './errors.js';

// Naming
export {
  encodeName,
  isSafeName,
  hasLoneSurrogate,
  contentFileName,
  localeCharset,
  checkEncodingSupport,
  assertEncodingSupport,
  REFERENCE_CHARACTER,
  REFERENCE_TOKEN,
  type EncodingCheck,
  type EncodingCheckOptions,
} from './naming.js';

// Snapshot reader
export {
  loadSnapshot,
  loadInstance,
  loadCategory,
  getRecords,
  parseVarFile,
  parseInstanceArn,
  readRequiredFile,
  INSTANCE_JSON,
  INSTANCE_VAR,
  type ParsedInstanceArn,
} from './snapshot.js';

// Reconciler
export {
  buildNameIndex,
  reconcileCategory,
  reconcileSnapshots,
  partitionOutcomes,
  outcomeLabels,
  outcomeName,
  outcomeCategory,
  type ReconcileOptions,
} from './reconciler.js';

// Rules
export {
  applyRules,
  createRuleApplier,
  arnScope,
  arnPartition,
  lambdaArnPrefix,
  botArnPrefix,
  buildGeneralRules,
  buildResourceRules,
  buildRules,
  chooseDelimiter,
  formatRuleScript,
  parseRuleScript,
  DELIMITER_CANDIDATES,
  type RuleApplier,
} from './rules.js';

// Templates
export {
  FLOW_TEMPLATE,
  MODULE_TEMPLATE,
  FLOW_TEMPLATE_FILE,
  MODULE_TEMPLATE_FILE,
  renderTemplate,
} from './templates.js';

// Helper bundle
export {
  buildVariables,
  buildHelperBundle,
  formatVariable,
  renderBundleFiles,
  writeHelperBundle,
  runReconciliation,
  HELPER_VAR_FILE,
  HELPER_NEW_FILE,
  HELPER_OLD_FILE,
  HELPER_SED_FILE,
  type BundleOptions,
  type WriteOptions,
  type ReconciliationRun,
  type ReconciliationResult,
} from './bundle.js';
