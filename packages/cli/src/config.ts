/**
 * Flowport CLI configuration
 *
 * Optional flowport.config.json supplying defaults that CLI arguments override:
 *
 *   {
 *     "lambdaPrefix": { "source": "dev-", "target": "prod-" },
 *     "botPrefix": { "source": "DevBot", "target": "ProdBot" },
 *     "duplicateNames": "reject"
 *   }
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { InvalidInputError, MissingInputError, type DuplicatePolicy, type PrefixPair } from '@flowport/diff';

export const CONFIG_FILENAME = 'flowport.config.json';

const prefixPairSchema = z
  .object({
    source: z.string().default(''),
    target: z.string().default(''),
  })
  .strict();

const configSchema = z
  .object({
    lambdaPrefix: prefixPairSchema.optional(),
    botPrefix: prefixPairSchema.optional(),
    duplicateNames: z.enum(['reject', 'first-match']).optional(),
  })
  .strict();

export type FlowportConfig = z.infer<typeof configSchema>;

/**
 * Load the config file. An explicit path must exist; without one, the
 * default file in `cwd` is used when present.
 */
export function loadFlowportConfig(configPath?: string, cwd = process.cwd()): FlowportConfig {
  const filePath = configPath ? path.resolve(cwd, configPath) : path.join(cwd, CONFIG_FILENAME);

  if (!fs.existsSync(filePath)) {
    if (configPath) {
      throw new MissingInputError(filePath, 'not found');
    }
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new InvalidInputError(filePath, `invalid JSON (${err instanceof Error ? err.message : String(err)})`);
  }

  const result = configSchema.safeParse(parsed);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new InvalidInputError(filePath, detail);
  }
  return result.data;
}

export interface DiffArguments {
  lambdaPrefixA?: string;
  lambdaPrefixB?: string;
  botPrefixA?: string;
  botPrefixB?: string;
  firstMatch?: boolean;
}

export interface DiffSettings {
  lambdaPrefix: PrefixPair;
  botPrefix: PrefixPair;
  duplicates: DuplicatePolicy;
}

function mergePrefix(source: string | undefined, target: string | undefined, fallback?: PrefixPair): PrefixPair {
  return {
    source: source ?? fallback?.source ?? '',
    target: target ?? fallback?.target ?? '',
  };
}

/**
 * Combine CLI arguments with config defaults, arguments first
 */
export function resolveDiffSettings(args: DiffArguments, config: FlowportConfig = {}): DiffSettings {
  return {
    lambdaPrefix: mergePrefix(args.lambdaPrefixA, args.lambdaPrefixB, config.lambdaPrefix),
    botPrefix: mergePrefix(args.botPrefixA, args.botPrefixB, config.botPrefix),
    duplicates: args.firstMatch ? 'first-match' : (config.duplicateNames ?? 'reject'),
  };
}
