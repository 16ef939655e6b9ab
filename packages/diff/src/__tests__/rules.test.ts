import { describe, it, expect } from 'vitest';
import {
  applyRules,
  createRuleApplier,
  arnScope,
  lambdaArnPrefix,
  buildGeneralRules,
  buildResourceRules,
  buildRules,
  chooseDelimiter,
  formatRuleScript,
  parseRuleScript,
} from '../rules';
import { RuleScriptError } from '../errors';
import type { MatchOutcome, SubstitutionRule } from '../schema';
import { makeInstance, makeTargetInstance, SOURCE_ID, TARGET_ID } from './helpers';

const source = makeInstance();
const target = makeTargetInstance();

function rule(pattern: string, replacement: string, comment = ''): SubstitutionRule {
  return { pattern, replacement, comment };
}

describe('applyRules', () => {
  it('should replace every occurrence', () => {
    expect(applyRules('Q1 then Q1 again', [rule('Q1', 'Q9')])).toBe('Q9 then Q9 again');
  });

  it('should apply rules in order', () => {
    expect(applyRules('a', [rule('a', 'b'), rule('b', 'c')])).toBe('c');
    expect(applyRules('a', [rule('b', 'c'), rule('a', 'b')])).toBe('b');
  });

  it('should treat patterns and replacements literally', () => {
    expect(applyRules('a.c abc', [rule('a.c', 'X')])).toBe('X abc');
    expect(applyRules('axb', [rule('x', '$&y')])).toBe('a$&yb');
  });

  it('should skip empty patterns', () => {
    expect(applyRules('abc', [rule('', 'X')])).toBe('abc');
  });

  it('should expose the same behaviour through a rule applier', () => {
    const applier = createRuleApplier([rule('F1', 'F9')]);
    expect(applier.apply('"F1"')).toBe('"F9"');
  });
});

describe('ARN prefixes', () => {
  it('should build the region/account scope', () => {
    expect(arnScope(source)).toBe(':eu-west-2:111122223333:');
  });

  it('should build a lambda function prefix', () => {
    expect(lambdaArnPrefix(source, 'dev-')).toBe('arn:aws:lambda:eu-west-2:111122223333:function:dev-');
  });
});

describe('buildGeneralRules', () => {
  it('should start with the instance rule followed by the ARN scope rule', () => {
    expect(buildGeneralRules({ source, target })).toEqual([
      {
        pattern: SOURCE_ID,
        replacement: TARGET_ID,
        comment: 'Instance: source-centre -> target-centre',
      },
      {
        pattern: ':eu-west-2:111122223333:',
        replacement: ':us-east-1:444455556666:',
        comment: 'ARN scope: eu-west-2/111122223333 -> us-east-1/444455556666',
      },
    ]);
  });

  it('should add a lambda rule when the prefixes differ', () => {
    const rules = buildGeneralRules({ source, target, lambdaPrefix: { source: 'dev-', target: 'prod-' } });

    expect(rules).toHaveLength(3);
    expect(rules[2]).toEqual({
      pattern: 'arn:aws:lambda:us-east-1:444455556666:function:dev-',
      replacement: 'arn:aws:lambda:us-east-1:444455556666:function:prod-',
      comment: 'Lambda function prefix: "dev-" -> "prod-"',
    });
  });

  it('should omit the lambda rule when the prefixes are equal', () => {
    const rules = buildGeneralRules({ source, target, lambdaPrefix: { source: 'app-', target: 'app-' } });

    expect(rules).toHaveLength(2);
  });

  it('should add a partition rule when the partition changes', () => {
    const china = makeTargetInstance({ partition: 'aws-cn', region: 'cn-north-1' });

    const rules = buildGeneralRules({ source, target: china });

    expect(rules).toHaveLength(3);
    expect(rules[2]).toEqual({
      pattern: 'arn:aws:',
      replacement: 'arn:aws-cn:',
      comment: 'ARN partition: aws -> aws-cn',
    });
    expect(applyRules('arn:aws:connect:eu-west-2:111122223333:instance/x', rules)).toBe(
      'arn:aws-cn:connect:cn-north-1:444455556666:instance/x'
    );
  });

  it('should compare prefixes after the partition rule', () => {
    const china = makeTargetInstance({ partition: 'aws-cn', region: 'cn-north-1' });

    const rules = buildGeneralRules({ source, target: china, lambdaPrefix: { source: 'dev-', target: 'prod-' } });

    expect(rules).toHaveLength(4);
    expect(rules[3].pattern).toBe('arn:aws-cn:lambda:cn-north-1:444455556666:function:dev-');
    expect(rules[3].replacement).toBe('arn:aws-cn:lambda:cn-north-1:444455556666:function:prod-');
  });

  it('should add a bot rule after the lambda rule', () => {
    const rules = buildGeneralRules({
      source,
      target,
      lambdaPrefix: { source: 'dev-', target: 'prod-' },
      botPrefix: { source: 'DevBot', target: 'ProdBot' },
    });

    expect(rules.map((r) => r.comment)).toEqual([
      'Instance: source-centre -> target-centre',
      'ARN scope: eu-west-2/111122223333 -> us-east-1/444455556666',
      'Lambda function prefix: "dev-" -> "prod-"',
      'Lex bot prefix: "DevBot" -> "ProdBot"',
    ]);
    expect(rules[3].pattern).toBe('arn:aws:lex:us-east-1:444455556666:bot:DevBot');
  });
});

describe('buildResourceRules', () => {
  it('should emit one rule per existing outcome and none for new ones', () => {
    const outcomes: MatchOutcome[] = [
      { kind: 'new', record: { id: 'Q2', name: 'Returns', category: 'queue', files: [] } },
      { kind: 'existing', idA: 'Q1', idB: 'Q9', name: 'Sales', category: 'queue' },
      { kind: 'existing', idA: 'F1', idB: 'F9', name: 'Welcome', category: 'contactFlow' },
    ];

    expect(buildResourceRules(outcomes)).toEqual([
      { pattern: 'Q1', replacement: 'Q9', comment: 'Queue: Sales' },
      { pattern: 'F1', replacement: 'F9', comment: 'Flow: Welcome' },
    ]);
  });
});

describe('buildRules', () => {
  it('should rewrite resource content end to end', () => {
    const rules = buildRules({ source, target, lambdaPrefix: { source: 'dev-', target: 'prod-' } }, [
      { kind: 'existing', idA: 'Q1', idB: 'Q9', name: 'Sales', category: 'queue' },
    ]);
    const instanceArnA = `arn:aws:connect:eu-west-2:111122223333:instance/${SOURCE_ID}`;
    const instanceArnB = `arn:aws:connect:us-east-1:444455556666:instance/${TARGET_ID}`;
    const content = JSON.stringify({
      Queue: `${instanceArnA}/queue/Q1`,
      Lambda: 'arn:aws:lambda:eu-west-2:111122223333:function:dev-lookup',
    });

    expect(JSON.parse(applyRules(content, rules))).toEqual({
      Queue: `${instanceArnB}/queue/Q9`,
      Lambda: 'arn:aws:lambda:us-east-1:444455556666:function:prod-lookup',
    });
  });
});

describe('chooseDelimiter', () => {
  it('should prefer the pipe', () => {
    expect(chooseDelimiter([rule('a', 'b')])).toBe('|');
  });

  it('should skip delimiters used by any rule', () => {
    expect(chooseDelimiter([rule('a|b', 'c'), rule('d', 'e#f')])).toBe('%');
  });

  it('should throw when every candidate is taken', () => {
    expect(() => chooseDelimiter([rule('|#%@!,;~^+=:', 'x')])).toThrow(RuleScriptError);
  });
});

describe('formatRuleScript', () => {
  it('should write a comment line before each rule', () => {
    expect(formatRuleScript(buildGeneralRules({ source, target }))).toBe(
      [
        '# Instance: source-centre -> target-centre',
        `s|${SOURCE_ID}|${TARGET_ID}|g`,
        '# ARN scope: eu-west-2/111122223333 -> us-east-1/444455556666',
        's|:eu-west-2:111122223333:|:us-east-1:444455556666:|g',
        '',
      ].join('\n')
    );
  });

  it('should escape regex and replacement metacharacters', () => {
    const script = formatRuleScript([rule('a.b*[c]^$\\', 'x&y\\z', 'odd')]);

    expect(script).toBe('# odd\ns|a\\.b\\*\\[c\\]\\^\\$\\\\|x\\&y\\\\z|g\n');
  });

  it('should return an empty script for no rules', () => {
    expect(formatRuleScript([])).toBe('');
  });

  it('should refuse patterns or replacements spanning lines', () => {
    expect(() => formatRuleScript([rule('F1\ninjected', 'F9', 'Flow: Welcome')])).toThrow(RuleScriptError);
    expect(() => formatRuleScript([rule('F1', 'F9\r', 'Flow: Welcome')])).toThrow(
      'Rule "Flow: Welcome" contains a line break'
    );
  });
});

describe('parseRuleScript', () => {
  it('should read back an escaped rule', () => {
    const original = rule('arn:aws:lex:*.x', 'a\\b&c', 'Flow: Welcome');

    expect(parseRuleScript(formatRuleScript([original]))).toEqual([original]);
  });

  it('should attach each comment to the following rule only', () => {
    expect(parseRuleScript('# first\ns|a|b|g\ns|c|d|g\n')).toEqual([
      { pattern: 'a', replacement: 'b', comment: 'first' },
      { pattern: 'c', replacement: 'd', comment: '' },
    ]);
  });

  it('should read scripts using another delimiter', () => {
    expect(parseRuleScript('s%a|b%c%g')).toEqual([{ pattern: 'a|b', replacement: 'c', comment: '' }]);
  });

  it('should reject malformed lines', () => {
    expect(() => parseRuleScript('x|a|b|g')).toThrow(RuleScriptError);
    expect(() => parseRuleScript('s|a|b')).toThrow('Malformed rule on line 1: s|a|b');
    expect(() => parseRuleScript('s|a|b|c|g')).toThrow(RuleScriptError);
  });
});
