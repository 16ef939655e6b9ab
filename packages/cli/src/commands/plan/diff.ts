/**
 * flowport diff
 *
 * Compare a source snapshot with a target snapshot and write the helper
 * bundle the copy step consumes.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import * as fs from 'fs';
import * as path from 'path';
import {
  assertEncodingSupport,
  buildHelperBundle,
  loadSnapshot,
  writeHelperBundle,
  DirectoryConflictError,
  type HelperBundle,
  type Snapshot,
} from '@flowport/diff';
import { loadFlowportConfig, resolveDiffSettings } from '../../config';
import { createCommandLogger } from '../../logger';

interface DiffCommandOptions {
  force?: boolean;
  extendedChars?: boolean;
  firstMatch?: boolean;
  config?: string;
}

/**
 * Run one pipeline step behind a spinner
 */
function step<T>(text: string, run: () => T, done: (result: T) => string): T {
  const spinner = ora(text).start();
  try {
    const result = run();
    spinner.succeed(done(result));
    return result;
  } catch (error) {
    spinner.fail(text);
    throw error;
  }
}

function countRecords(snapshot: Snapshot): number {
  let total = 0;
  for (const records of snapshot.records.values()) {
    total += records.length;
  }
  return total;
}

/**
 * Per-category table of new and existing counts
 */
export function formatSummary(bundle: HelperBundle): string[] {
  const width = Math.max(...bundle.summary.map((s) => s.label.length), 'Category'.length);
  const lines = [`${'Category'.padEnd(width)}  ${'New'.padStart(5)}  ${'Existing'.padStart(8)}`];
  for (const entry of bundle.summary) {
    lines.push(
      `${entry.label.padEnd(width)}  ${String(entry.created).padStart(5)}  ${String(entry.existing).padStart(8)}`
    );
  }
  return lines;
}

export const diffCommand = new Command('diff')
  .description('Compare two snapshots and write a helper bundle for copying resources')
  .argument('<snapshotA>', 'Source snapshot directory')
  .argument('<snapshotB>', 'Target snapshot directory')
  .argument('<helper>', 'Helper bundle directory to create')
  .argument('[lambdaPrefixA]', 'Lambda function name prefix in the source instance')
  .argument('[lambdaPrefixB]', 'Lambda function name prefix in the target instance')
  .argument('[botPrefixA]', 'Lex bot name prefix in the source instance')
  .argument('[botPrefixB]', 'Lex bot name prefix in the target instance')
  .option('-f, --force', 'Replace the helper directory if it already exists')
  .option('-e, --extended-chars', 'Proceed even if the host cannot encode extended characters')
  .option('--first-match', 'Pair duplicate names with their first match instead of failing')
  .option('-c, --config <file>', 'Config file (default: ./flowport.config.json when present)')
  .action(
    (
      snapshotA: string,
      snapshotB: string,
      helper: string,
      lambdaPrefixA: string | undefined,
      lambdaPrefixB: string | undefined,
      botPrefixA: string | undefined,
      botPrefixB: string | undefined,
      options: DiffCommandOptions
    ) => {
      const log = createCommandLogger('diff');
      log.info('Starting diff', { snapshotA, snapshotB, helper, options });

      console.log(chalk.bold('\n  Flowport Diff\n'));

      const encoding = assertEncodingSupport({ allowUnsupported: options.extendedChars });
      if (!encoding.supported) {
        console.log(chalk.yellow(`  Warning: ${encoding.reason}; continuing because --extended-chars is set\n`));
        log.warn('Encoding check failed, overridden', encoding);
      }

      const config = loadFlowportConfig(options.config);
      const settings = resolveDiffSettings(
        { lambdaPrefixA, lambdaPrefixB, botPrefixA, botPrefixB, firstMatch: options.firstMatch },
        config
      );
      log.debug('Resolved settings', settings);

      const outputDir = path.resolve(helper);
      if (fs.existsSync(outputDir) && !options.force) {
        throw new DirectoryConflictError(outputDir);
      }

      const source = step(
        `Loading source snapshot ${snapshotA}...`,
        () => loadSnapshot(snapshotA),
        (s) => `Source ${s.alias}: ${countRecords(s)} resource(s)`
      );
      const target = step(
        `Loading target snapshot ${snapshotB}...`,
        () => loadSnapshot(snapshotB),
        (s) => `Target ${s.alias}: ${countRecords(s)} resource(s)`
      );

      const bundle = step(
        'Reconciling resources...',
        () => buildHelperBundle(source, target, settings),
        (b) => `${b.newList.length} new, ${b.existingList.length} existing, ${b.rules.length} rule(s)`
      );

      const files = step(
        `Writing helper bundle to ${outputDir}...`,
        () => writeHelperBundle(outputDir, bundle, { force: options.force }),
        (written) => `Wrote ${written.length} file(s) to ${outputDir}`
      );
      log.info('Helper bundle written', { outputDir, files, summary: bundle.summary });

      console.log('');
      for (const line of formatSummary(bundle)) {
        console.log(chalk.gray(`  ${line}`));
      }
      console.log('');
      console.log(chalk.gray('  Review helper.new and helper.old before copying.'));
      console.log(chalk.gray('  Preview a rewrite with:'));
      console.log(chalk.cyan(`    flowport rewrite ${helper} <content-file>`));
      console.log('');
    }
  );
