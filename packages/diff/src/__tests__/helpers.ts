import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CATEGORIES } from '../categories';
import { contentFileName } from '../naming';
import type { Category, InstanceInfo, ResourceRecord, Snapshot } from '../schema';

export const SOURCE_ID = 'aaaa1111-0000-4000-8000-000000000001';
export const TARGET_ID = 'bbbb2222-0000-4000-8000-000000000002';

export type RecordSpec = Partial<Record<Category, Array<[id: string, name: string]>>>;

export function makeInstance(overrides: Partial<InstanceInfo> = {}): InstanceInfo {
  const id = overrides.id ?? SOURCE_ID;
  const region = overrides.region ?? 'eu-west-2';
  const accountId = overrides.accountId ?? '111122223333';
  return {
    id,
    arn: `arn:aws:connect:${region}:${accountId}:instance/${id}`,
    alias: 'source-centre',
    partition: 'aws',
    region,
    accountId,
    profile: '',
    flowPrefix: '',
    variables: {},
    ...overrides,
  };
}

export function makeTargetInstance(overrides: Partial<InstanceInfo> = {}): InstanceInfo {
  return makeInstance({
    id: TARGET_ID,
    alias: 'target-centre',
    region: 'us-east-1',
    accountId: '444455556666',
    ...overrides,
  });
}

export function makeSnapshot(instance: InstanceInfo, layout: RecordSpec = {}): Snapshot {
  const records = new Map<Category, readonly ResourceRecord[]>();
  for (const { category } of CATEGORIES) {
    records.set(
      category,
      (layout[category] ?? []).map(([id, name]) => ({ id, name, category, files: [] }))
    );
  }
  return { alias: instance.alias, rootDir: `/snapshots/${instance.alias}`, instance, records };
}

export function createTempDir(label: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `flowport-${label}-`));
}

export function cleanupTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Write a complete snapshot directory: instance files, one manifest per
 * category and a content file for every resource that needs one
 */
export function writeSnapshotDir(root: string, instance: InstanceInfo, layout: RecordSpec = {}): string {
  fs.mkdirSync(root, { recursive: true });
  fs.writeFileSync(
    path.join(root, 'instance.json'),
    JSON.stringify({ Instance: { Id: instance.id, Arn: instance.arn, InstanceAlias: instance.alias } }, null, 2)
  );
  fs.writeFileSync(
    path.join(root, 'instance.var'),
    `profile=${instance.profile}\ncontact_flow_prefix=${instance.flowPrefix}\n`
  );

  for (const definition of CATEGORIES) {
    const entries = layout[definition.category] ?? [];
    fs.writeFileSync(
      path.join(root, definition.manifest),
      JSON.stringify(entries.map(([Id, Name]) => ({ Id, Name })), null, 2)
    );
    for (const [id, name] of entries) {
      for (const prefix of definition.contentPrefixes) {
        fs.writeFileSync(path.join(root, contentFileName(prefix, name)), JSON.stringify({ Id: id, Name: name }));
      }
    }
  }

  return root;
}
