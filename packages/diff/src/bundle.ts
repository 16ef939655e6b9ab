/**
 * Helper Bundle
 * Assembles reconciliation results in memory and writes them out in one step
 */

import { existsSync, mkdirSync, mkdtempSync, renameSync, rmSync, writeFileSync } from 'fs';
import { basename, dirname, join, resolve } from 'path';
import { getCategoryDefinition } from './categories.js';
import { DirectoryConflictError } from './errors.js';
import { outcomeLabels, partitionOutcomes, reconcileSnapshots, type ReconcileOptions } from './reconciler.js';
import { buildRules, formatRuleScript } from './rules.js';
import { loadSnapshot } from './snapshot.js';
import {
  FLOW_TEMPLATE,
  FLOW_TEMPLATE_FILE,
  MODULE_TEMPLATE,
  MODULE_TEMPLATE_FILE,
  renderTemplate,
} from './templates.js';
import type { BundleFile, HelperBundle, InstanceInfo, PrefixPair, Snapshot } from './schema.js';

export const HELPER_VAR_FILE = 'helper.var';
export const HELPER_NEW_FILE = 'helper.new';
export const HELPER_OLD_FILE = 'helper.old';
export const HELPER_SED_FILE = 'helper.sed';

export interface BundleOptions extends ReconcileOptions {
  lambdaPrefix?: PrefixPair;
  botPrefix?: PrefixPair;
}

export interface WriteOptions {
  force?: boolean;
}

// =============================================================================
// Assembly
// =============================================================================

function sideVariables(instance: InstanceInfo, suffix: 'a' | 'b', lambdaPrefix: string, botPrefix: string) {
  return {
    [`instance_alias_${suffix}`]: instance.alias,
    [`instance_id_${suffix}`]: instance.id,
    [`instance_arn_${suffix}`]: instance.arn,
    [`account_id_${suffix}`]: instance.accountId,
    [`region_${suffix}`]: instance.region,
    [`profile_${suffix}`]: instance.profile,
    [`lambda_prefix_${suffix}`]: lambdaPrefix,
    [`bot_prefix_${suffix}`]: botPrefix,
  };
}

export function buildVariables(
  snapshotA: Snapshot,
  snapshotB: Snapshot,
  options: BundleOptions = {}
): Record<string, string> {
  const lambda = options.lambdaPrefix ?? { source: '', target: '' };
  const bot = options.botPrefix ?? { source: '', target: '' };
  return {
    ...sideVariables(snapshotA.instance, 'a', lambda.source, bot.source),
    ...sideVariables(snapshotB.instance, 'b', lambda.target, bot.target),
    flow_prefix_b: snapshotB.instance.flowPrefix,
  };
}

/**
 * Reconcile two loaded snapshots into a helper bundle
 */
export function buildHelperBundle(
  snapshotA: Snapshot,
  snapshotB: Snapshot,
  options: BundleOptions = {}
): HelperBundle {
  const results = reconcileSnapshots(snapshotA, snapshotB, options);

  const bundle: HelperBundle = {
    variables: buildVariables(snapshotA, snapshotB, options),
    newList: [],
    existingList: [],
    rules: [],
    summary: [],
  };

  for (const { category, outcomes } of results) {
    const { created, existing } = partitionOutcomes(outcomes);
    for (const outcome of outcomes) {
      const list = outcome.kind === 'new' ? bundle.newList : bundle.existingList;
      list.push(...outcomeLabels(outcome));
    }
    bundle.summary.push({
      category,
      label: getCategoryDefinition(category).label,
      created: created.length,
      existing: existing.length,
    });
  }

  bundle.rules = buildRules(
    {
      source: snapshotA.instance,
      target: snapshotB.instance,
      lambdaPrefix: options.lambdaPrefix,
      botPrefix: options.botPrefix,
    },
    results.flatMap((r) => r.outcomes)
  );

  return bundle;
}

// =============================================================================
// Rendering
// =============================================================================

const PLAIN_VALUE = /^[A-Za-z0-9_./:@%+,=-]*$/;

/**
 * `key=value`, single-quoted when the value holds anything a shell
 * would interpret
 */
export function formatVariable(key: string, value: string): string {
  if (PLAIN_VALUE.test(value)) {
    return `${key}=${value}`;
  }
  return `${key}='${value.replace(/'/g, `'\\''`)}'`;
}

function formatLines(lines: readonly string[]): string {
  return lines.length === 0 ? '' : lines.join('\n') + '\n';
}

/**
 * Bundle contents keyed by file name, in write order
 */
export function renderBundleFiles(bundle: HelperBundle): BundleFile[] {
  const variables = Object.entries(bundle.variables).map(([key, value]) => formatVariable(key, value));
  return [
    { name: HELPER_VAR_FILE, content: formatLines(variables) },
    { name: HELPER_NEW_FILE, content: formatLines(bundle.newList) },
    { name: HELPER_OLD_FILE, content: formatLines(bundle.existingList) },
    { name: HELPER_SED_FILE, content: formatRuleScript(bundle.rules) },
    { name: FLOW_TEMPLATE_FILE, content: renderTemplate(FLOW_TEMPLATE) },
    { name: MODULE_TEMPLATE_FILE, content: renderTemplate(MODULE_TEMPLATE) },
  ];
}

// =============================================================================
// Writer
// =============================================================================

/**
 * Write a bundle to `outputDir`. Files are staged in a sibling directory and
 * renamed into place, so the output directory only ever appears complete.
 * An existing directory is a conflict unless `force` is set.
 *
 * @returns names of the files written
 */
export function writeHelperBundle(outputDir: string, bundle: HelperBundle, options: WriteOptions = {}): string[] {
  const target = resolve(outputDir);
  const exists = existsSync(target);
  if (exists && !options.force) {
    throw new DirectoryConflictError(target);
  }

  const files = renderBundleFiles(bundle);

  const parent = dirname(target);
  mkdirSync(parent, { recursive: true });
  const staging = mkdtempSync(join(parent, `.${basename(target)}.staging-`));

  try {
    for (const file of files) {
      writeFileSync(join(staging, file.name), file.content);
    }
    if (exists) {
      rmSync(target, { recursive: true, force: true });
    }
    renameSync(staging, target);
  } finally {
    // Already gone after a successful rename
    rmSync(staging, { recursive: true, force: true });
  }

  return files.map((f) => f.name);
}

// =============================================================================
// Pipeline
// =============================================================================

export interface ReconciliationRun extends BundleOptions, WriteOptions {
  sourceDir: string;
  targetDir: string;
  outputDir: string;
}

export interface ReconciliationResult {
  bundle: HelperBundle;
  files: string[];
}

/**
 * Load both snapshots, reconcile them and write the helper bundle
 */
export function runReconciliation(run: ReconciliationRun): ReconciliationResult {
  const target = resolve(run.outputDir);
  if (existsSync(target) && !run.force) {
    throw new DirectoryConflictError(target);
  }

  const snapshotA = loadSnapshot(run.sourceDir);
  const snapshotB = loadSnapshot(run.targetDir);
  const bundle = buildHelperBundle(snapshotA, snapshotB, run);
  const files = writeHelperBundle(target, bundle, { force: run.force });

  return { bundle, files };
}
