/**
 * Substitution Rule Generator
 *
 * Rules are literal find/replace pairs applied globally, one after another,
 * in emission order:
 *   1. instance id
 *   2. ARN region/account scope
 *   3. ARN partition (only when it changes)
 *   4. lambda function prefix (only when it changes)
 *   5. lex bot prefix (only when it changes)
 *   6. one rule per existing resource, category order then snapshot A order
 */

import { getCategoryDefinition } from './categories.js';
import { RuleScriptError } from './errors.js';
import type { InstanceInfo, MatchOutcome, PrefixPair, RuleContext, SubstitutionRule } from './schema.js';

const NO_PREFIX: PrefixPair = { source: '', target: '' };

// =============================================================================
// Rule application
// =============================================================================

export interface RuleApplier {
  apply(content: string): string;
}

/**
 * Apply rules in order, each replacing every literal occurrence of its
 * pattern. Empty patterns are skipped.
 */
export function applyRules(content: string, rules: readonly SubstitutionRule[]): string {
  let result = content;
  for (const rule of rules) {
    if (rule.pattern === '') continue;
    result = result.split(rule.pattern).join(rule.replacement);
  }
  return result;
}

export function createRuleApplier(rules: readonly SubstitutionRule[]): RuleApplier {
  const frozen = [...rules];
  return {
    apply: (content) => applyRules(content, frozen),
  };
}

// =============================================================================
// ARN prefixes
// =============================================================================

/**
 * Region/account segment shared by every service ARN of an instance,
 * e.g. ":eu-west-2:111122223333:"
 */
export function arnScope(instance: InstanceInfo): string {
  return `:${instance.region}:${instance.accountId}:`;
}

/**
 * Leading partition segment, e.g. "arn:aws:"
 */
export function arnPartition(instance: InstanceInfo): string {
  return `arn:${instance.partition}:`;
}

export function lambdaArnPrefix(instance: InstanceInfo, prefix: string): string {
  return `arn:${instance.partition}:lambda:${instance.region}:${instance.accountId}:function:${prefix}`;
}

export function botArnPrefix(instance: InstanceInfo, prefix: string): string {
  return `arn:${instance.partition}:lex:${instance.region}:${instance.accountId}:bot:${prefix}`;
}

/**
 * Prefix rules run after the ARN rules, so the source prefix is compared
 * and matched in its already-rescoped form
 */
function prefixRule(
  comment: string,
  sourcePrefix: string,
  targetPrefix: string,
  arnRules: readonly SubstitutionRule[]
): SubstitutionRule | null {
  const pattern = applyRules(sourcePrefix, arnRules);
  if (pattern === targetPrefix) return null;
  return { pattern, replacement: targetPrefix, comment };
}

// =============================================================================
// Rule generation
// =============================================================================

/**
 * Instance, ARN and prefix rules.
 *
 * A lambda or bot rule is emitted only when the source prefix, after the
 * ARN scope and partition rules have rewritten it, still differs from the
 * target prefix. A region, account or partition change alone is already
 * covered by those rules and adds no prefix rule.
 */
export function buildGeneralRules(context: RuleContext): SubstitutionRule[] {
  const { source, target } = context;
  const lambda = context.lambdaPrefix ?? NO_PREFIX;
  const bot = context.botPrefix ?? NO_PREFIX;

  const instanceRule: SubstitutionRule = {
    pattern: source.id,
    replacement: target.id,
    comment: `Instance: ${source.alias} -> ${target.alias}`,
  };
  const scopeRule: SubstitutionRule = {
    pattern: arnScope(source),
    replacement: arnScope(target),
    comment: `ARN scope: ${source.region}/${source.accountId} -> ${target.region}/${target.accountId}`,
  };

  const rules = [instanceRule, scopeRule];
  if (source.partition !== target.partition) {
    rules.push({
      pattern: arnPartition(source),
      replacement: arnPartition(target),
      comment: `ARN partition: ${source.partition} -> ${target.partition}`,
    });
  }
  const arnRules = rules.slice(1);

  const lambdaRule = prefixRule(
    `Lambda function prefix: "${lambda.source}" -> "${lambda.target}"`,
    lambdaArnPrefix(source, lambda.source),
    lambdaArnPrefix(target, lambda.target),
    arnRules
  );
  if (lambdaRule) rules.push(lambdaRule);

  const botRule = prefixRule(
    `Lex bot prefix: "${bot.source}" -> "${bot.target}"`,
    botArnPrefix(source, bot.source),
    botArnPrefix(target, bot.target),
    arnRules
  );
  if (botRule) rules.push(botRule);

  return rules;
}

/**
 * One id rule per existing outcome. New outcomes contribute nothing.
 */
export function buildResourceRules(outcomes: readonly MatchOutcome[]): SubstitutionRule[] {
  const rules: SubstitutionRule[] = [];
  for (const outcome of outcomes) {
    if (outcome.kind !== 'existing') continue;
    rules.push({
      pattern: outcome.idA,
      replacement: outcome.idB,
      comment: `${getCategoryDefinition(outcome.category).label}: ${outcome.name}`,
    });
  }
  return rules;
}

/**
 * Outcomes must already be in category order
 */
export function buildRules(context: RuleContext, outcomes: readonly MatchOutcome[]): SubstitutionRule[] {
  return [...buildGeneralRules(context), ...buildResourceRules(outcomes)];
}

// =============================================================================
// Rule script (sed-compatible)
// =============================================================================

export const DELIMITER_CANDIDATES = ['|', '#', '%', '@', '!', ',', ';', '~', '^', '+', '=', ':'] as const;

/**
 * First candidate delimiter that appears in no pattern or replacement
 */
export function chooseDelimiter(rules: readonly SubstitutionRule[]): string {
  const delimiter = DELIMITER_CANDIDATES.find(
    (candidate) => !rules.some((r) => r.pattern.includes(candidate) || r.replacement.includes(candidate))
  );
  if (!delimiter) {
    throw new RuleScriptError(`No free delimiter among ${DELIMITER_CANDIDATES.join(' ')}`);
  }
  return delimiter;
}

// Basic regular expression metacharacters, so the sed rule matches literally
function escapePattern(value: string): string {
  return value.replace(/[\\.*[\]^$]/g, '\\$&');
}

function escapeReplacement(value: string): string {
  return value.replace(/[\\&]/g, '\\$&');
}

function unescape(value: string): string {
  return value.replace(/\\(.)/g, '$1');
}

function singleLine(value: string): string {
  return value.replace(/[\r\n]+/g, ' ');
}

const LINE_BREAK = /[\r\n]/;

/**
 * Render rules as `# comment` + `s<SEP>pattern<SEP>replacement<SEP>g` pairs.
 * Patterns and replacements must be single-line.
 */
export function formatRuleScript(rules: readonly SubstitutionRule[]): string {
  if (rules.length === 0) return '';

  const broken = rules.find((r) => LINE_BREAK.test(r.pattern) || LINE_BREAK.test(r.replacement));
  if (broken) {
    throw new RuleScriptError(`Rule "${singleLine(broken.comment)}" contains a line break`);
  }

  const d = chooseDelimiter(rules);
  const lines: string[] = [];
  for (const rule of rules) {
    lines.push(`# ${singleLine(rule.comment)}`);
    lines.push(`s${d}${escapePattern(rule.pattern)}${d}${escapeReplacement(rule.replacement)}${d}g`);
  }
  return lines.join('\n') + '\n';
}

/**
 * Read a script written by formatRuleScript back into rules. The comment
 * preceding a rule becomes its comment.
 */
export function parseRuleScript(script: string): SubstitutionRule[] {
  const rules: SubstitutionRule[] = [];
  let comment = '';

  script.split(/\r?\n/).forEach((line, index) => {
    if (line.trim() === '') return;

    if (line.startsWith('#')) {
      comment = line.slice(1).trim();
      return;
    }

    const d = line[1];
    const terminator = `${d}g`;
    if (!line.startsWith('s') || !d || !line.endsWith(terminator) || line.length < 2 + terminator.length) {
      throw new RuleScriptError(`Malformed rule on line ${index + 1}: ${line}`);
    }

    const parts = line.slice(2, -terminator.length).split(d);
    if (parts.length !== 2) {
      throw new RuleScriptError(`Malformed rule on line ${index + 1}: ${line}`);
    }

    rules.push({ pattern: unescape(parts[0]), replacement: unescape(parts[1]), comment });
    comment = '';
  });

  return rules;
}
