/**
 * flowport rewrite
 *
 * Apply a helper bundle's substitution rules to one content file, for
 * reviewing what the copy step will send to the target instance.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as fs from 'fs';
import * as path from 'path';
import {
  createRuleApplier,
  parseRuleScript,
  readRequiredFile,
  HELPER_SED_FILE,
  MissingInputError,
} from '@flowport/diff';
import { createCommandLogger } from '../../logger';

export const rewriteCommand = new Command('rewrite')
  .description("Apply a helper bundle's substitution rules to a content file")
  .argument('<helper>', 'Helper bundle directory')
  .argument('<file>', 'Resource content file to rewrite')
  .option('-o, --output <file>', 'Write the result to a file instead of stdout')
  .action((helper: string, file: string, options: { output?: string }) => {
    const log = createCommandLogger('rewrite');

    // An empty rule script is valid: nothing to rewrite
    const scriptPath = path.join(helper, HELPER_SED_FILE);
    if (!fs.existsSync(scriptPath)) {
      throw new MissingInputError(scriptPath, 'not found');
    }
    const rules = parseRuleScript(fs.readFileSync(scriptPath, 'utf-8'));
    const applier = createRuleApplier(rules);
    const result = applier.apply(readRequiredFile(file));
    log.info('Rewrote content file', { helper, file, rules: rules.length });

    if (options.output) {
      fs.writeFileSync(options.output, result);
      console.error(chalk.green(`  ✓ ${options.output}`));
      return;
    }
    process.stdout.write(result);
  });
