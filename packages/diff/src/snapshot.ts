/**
 * Snapshot Reader
 * Loads instance identity and per-category resource summaries from a
 * snapshot directory, and checks every companion content file is present
 */

import { existsSync, readFileSync } from 'fs';
import { basename, join, resolve } from 'path';
import { z } from 'zod';
import { CATEGORIES, type CategoryDefinition } from './categories.js';
import { InvalidInputError, MissingInputError } from './errors.js';
import { contentFileName, hasLoneSurrogate } from './naming.js';
import type { Category, InstanceInfo, ResourceRecord, Snapshot } from './schema.js';

export const INSTANCE_JSON = 'instance.json';
export const INSTANCE_VAR = 'instance.var';

const LINE_BREAK = /[\r\n]/;

const singleLineString = (field: string) =>
  z
    .string()
    .min(1)
    .refine((value) => !LINE_BREAK.test(value), { message: `${field} must not contain line breaks` });

const summarySchema = z.object({
  Id: singleLineString('id'),
  Name: singleLineString('name').refine((name) => !hasLoneSurrogate(name), {
    message: 'name must be well-formed Unicode',
  }),
});

const instanceSchema = z.object({
  Instance: z.object({
    Id: singleLineString('instance id'),
    Arn: z.string().min(1),
    InstanceAlias: z.string().optional(),
  }),
});

const INSTANCE_ARN = /^arn:([^:]+):connect:([^:]+):(\d{12}):instance\/(.+)$/;

export interface ParsedInstanceArn {
  partition: string;
  region: string;
  accountId: string;
  instanceId: string;
}

// =============================================================================
// File helpers
// =============================================================================

/**
 * Read a file that must exist and hold more than whitespace
 */
export function readRequiredFile(path: string): string {
  if (!existsSync(path)) {
    throw new MissingInputError(path, 'not found');
  }
  const content = readFileSync(path, 'utf-8');
  if (content.trim() === '') {
    throw new MissingInputError(path, 'empty');
  }
  return content;
}

function requireContentFile(path: string): string {
  readRequiredFile(path);
  return path;
}

function parseJson(path: string, content: string): unknown {
  try {
    return JSON.parse(content);
  } catch (err) {
    throw new InvalidInputError(path, `invalid JSON (${err instanceof Error ? err.message : String(err)})`);
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

// =============================================================================
// Instance identity
// =============================================================================

/**
 * Parse `key=value` lines. Blank lines and `#` comments are skipped,
 * a leading `export ` and matching surrounding quotes are dropped.
 */
export function parseVarFile(content: string, path = INSTANCE_VAR): Record<string, string> {
  const variables: Record<string, string> = {};
  const lines = content.split(/\r?\n/);

  lines.forEach((raw, index) => {
    const line = raw.trim();
    if (line === '' || line.startsWith('#')) return;

    const assignment = line.startsWith('export ') ? line.slice('export '.length).trim() : line;
    const eq = assignment.indexOf('=');
    if (eq <= 0) {
      throw new InvalidInputError(path, `line ${index + 1} is not a key=value pair`);
    }

    const key = assignment.slice(0, eq).trim();
    let value = assignment.slice(eq + 1).trim();
    if (value.length >= 2 && (value[0] === '"' || value[0] === "'") && value.endsWith(value[0])) {
      value = value.slice(1, -1);
    }
    variables[key] = value;
  });

  return variables;
}

export function parseInstanceArn(arn: string): ParsedInstanceArn | null {
  const match = INSTANCE_ARN.exec(arn);
  if (!match) return null;
  return {
    partition: match[1],
    region: match[2],
    accountId: match[3],
    instanceId: match[4],
  };
}

export function loadInstance(rootDir: string): InstanceInfo {
  const jsonPath = join(rootDir, INSTANCE_JSON);
  const varPath = join(rootDir, INSTANCE_VAR);

  const parsed = instanceSchema.safeParse(parseJson(jsonPath, readRequiredFile(jsonPath)));
  if (!parsed.success) {
    throw new InvalidInputError(jsonPath, formatIssues(parsed.error));
  }
  const variables = parseVarFile(readRequiredFile(varPath), varPath);

  const { Id: id, Arn: arn, InstanceAlias } = parsed.data.Instance;
  const arnParts = parseInstanceArn(arn);
  if (!arnParts) {
    throw new InvalidInputError(jsonPath, `unrecognised instance ARN ${arn}`);
  }
  if (arnParts.instanceId !== id) {
    throw new InvalidInputError(jsonPath, `instance ARN ${arn} does not belong to instance ${id}`);
  }

  return {
    id,
    arn,
    alias: InstanceAlias || variables.instance_alias || basename(rootDir),
    partition: arnParts.partition,
    region: arnParts.region,
    accountId: arnParts.accountId,
    profile: variables.profile ?? '',
    flowPrefix: variables.contact_flow_prefix ?? '',
    variables,
  };
}

// =============================================================================
// Category manifests
// =============================================================================

/**
 * Accept a bare summary array or a list-call response holding one,
 * e.g. `{ "QueueSummaryList": [...] }`
 */
function extractSummaryList(path: string, parsed: unknown): unknown {
  if (Array.isArray(parsed)) return parsed;

  if (parsed !== null && typeof parsed === 'object') {
    const lists = Object.values(parsed).filter((value) => Array.isArray(value));
    if (lists.length === 1) return lists[0];
    throw new InvalidInputError(path, `expected exactly one summary list, found ${lists.length}`);
  }

  throw new InvalidInputError(path, 'expected a summary list');
}

export function loadCategory(rootDir: string, definition: CategoryDefinition): ResourceRecord[] {
  const manifestPath = join(rootDir, definition.manifest);
  const parsed = parseJson(manifestPath, readRequiredFile(manifestPath));

  const summaries = z.array(summarySchema).safeParse(extractSummaryList(manifestPath, parsed));
  if (!summaries.success) {
    throw new InvalidInputError(manifestPath, formatIssues(summaries.error));
  }

  return summaries.data.map((summary) =>
    Object.freeze({
      id: summary.Id,
      name: summary.Name,
      category: definition.category,
      files: definition.contentPrefixes.map((prefix) =>
        requireContentFile(join(rootDir, contentFileName(prefix, summary.Name)))
      ),
    })
  );
}

/**
 * Load a snapshot directory. Records keep their manifest order.
 */
export function loadSnapshot(rootDir: string): Snapshot {
  const root = resolve(rootDir);
  if (!existsSync(root)) {
    throw new MissingInputError(root, 'not found');
  }

  const instance = loadInstance(root);
  const records = new Map<Category, readonly ResourceRecord[]>();
  for (const definition of CATEGORIES) {
    records.set(definition.category, Object.freeze(loadCategory(root, definition)));
  }

  return Object.freeze({
    alias: instance.alias,
    rootDir: root,
    instance: Object.freeze(instance),
    records,
  });
}

export function getRecords(snapshot: Snapshot, category: Category): readonly ResourceRecord[] {
  return snapshot.records.get(category) ?? [];
}
