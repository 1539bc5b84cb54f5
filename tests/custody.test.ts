import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import type { ManifestEntry } from '../src/types/index.js';
import { generateKeyPair, sha256 } from '../src/crypto/index.js';
import {
  BundleScheduler,
  CHAIN_FILE,
  MANIFEST_FILE,
  META_FILE,
  MoralIntegrityLedger,
  bundleStamp,
  exportBundle,
  formatManifest,
  parseManifest,
  recordFileName,
  verifyBundle
} from '../src/ledger/index.js';
import { entry, silentLogger, tempDir } from './helpers.js';

const NOW = new Date('2026-10-18T09:30:00.000Z');

let root: string;
let outDir: string;

beforeEach(async () => {
  root = await tempDir('guardian-custody-');
  outDir = join(root, 'bundles');
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

async function ledgerWith(count: number): Promise<MoralIntegrityLedger> {
  const ledger = await MoralIntegrityLedger.open({ dir: join(root, 'ledger'), logger: silentLogger });
  for (let n = 0; n < count; n++) {
    await ledger.append(entry(n));
  }
  return ledger;
}

async function rewriteManifest(bundle: string): Promise<void> {
  const { entries } = parseManifest(await readFile(join(bundle, MANIFEST_FILE), 'utf-8'));
  const rewritten: ManifestEntry[] = [];
  for (const { path } of entries) {
    const bytes = await readFile(join(bundle, path)).catch(() => null);
    if (bytes) rewritten.push({ digest: sha256(bytes), path });
  }
  await writeFile(join(bundle, MANIFEST_FILE), formatManifest(rewritten), 'utf-8');
}

describe('exportBundle', () => {
  it('names bundles by UTC timestamp', () => {
    expect(bundleStamp(NOW)).toBe('20261018T093000Z');
  });

  it('writes evidence, chain, metadata and a sorted manifest', async () => {
    const ledger = await ledgerWith(2);
    const bundle = await exportBundle(ledger, { outDir, now: NOW });

    expect(bundle.name).toBe('bundle_20261018T093000Z');
    expect(bundle.signed).toBe(false);
    expect(bundle.meta).toEqual({
      format: 'guardian-bundle/1',
      created_at: '2026-10-18T09:30:00.000Z',
      record_count: 2,
      first_sequence: 0,
      last_sequence: 1,
      anchor_hash: '0'.repeat(64),
      head_hash: ledger.head()
    });

    const manifest = await readFile(join(bundle.path, MANIFEST_FILE), 'utf-8');
    const paths = manifest.trim().split('\n').map((line) => line.split('  ')[1]);
    expect(paths).toEqual(['bundle.json', 'chain.jsonl', 'records/000000000000.json', 'records/000000000001.json']);

    const evidence = await readFile(join(bundle.path, recordFileName(1)), 'utf-8');
    expect(evidence).toBe(await readFile(ledger.evidencePath(1), 'utf-8'));
  });

  it('does not overwrite a bundle exported in the same second', async () => {
    const ledger = await ledgerWith(1);
    const first = await exportBundle(ledger, { outDir, now: NOW });
    const second = await exportBundle(ledger, { outDir, now: NOW });
    expect(first.name).toBe('bundle_20261018T093000Z');
    expect(second.name).toBe('bundle_20261018T093000Z_1');
  });
});

describe('verifyBundle', () => {
  it('passes an untouched bundle', async () => {
    const ledger = await ledgerWith(3);
    const bundle = await exportBundle(ledger, { outDir, now: NOW });
    const report = await verifyBundle(bundle.path);

    expect(report.final_pass).toBe(true);
    expect(report.chain_valid).toBe(true);
    expect(report.first_break).toBeNull();
    expect(report.declared_count).toBe(3);
    expect(report.actual_count).toBe(3);
    expect(report.signature).toBe('absent');
    expect(report.notes).toEqual([]);
    expect(report.per_file.map((check) => check.path)).toEqual([
      'bundle.json',
      'chain.jsonl',
      'records/000000000000.json',
      'records/000000000001.json',
      'records/000000000002.json'
    ]);
    expect(report.records).toEqual([
      { sequence: 0, valid: true },
      { sequence: 1, valid: true },
      { sequence: 2, valid: true }
    ]);
  });

  it('is idempotent', async () => {
    const bundle = await exportBundle(await ledgerWith(2), { outDir, now: NOW });
    expect(await verifyBundle(bundle.path)).toEqual(await verifyBundle(bundle.path));
  });

  it('invalidates the tampered record and every record after it', async () => {
    const bundle = await exportBundle(await ledgerWith(5), { outDir, now: NOW });
    const path = join(bundle.path, recordFileName(2));
    const content = await readFile(path, 'utf-8');
    await writeFile(path, content.replace('"request_id":"req-2"', '"request_id":"req-Z"'), 'utf-8');

    const report = await verifyBundle(bundle.path);

    expect(report.final_pass).toBe(false);
    expect(report.chain_valid).toBe(false);
    expect(report.first_break).toBe(2);
    expect(report.records.map((record) => record.valid)).toEqual([true, true, false, false, false]);
    expect(report.records[2].reason).toBe('recomputed record hash does not match stored hash');
    expect(report.records[4].reason).toBe('follows broken record 2');
    expect(report.per_file.filter((check) => !check.pass).map((check) => check.path)).toEqual([
      'records/000000000002.json'
    ]);
    expect(report.notes).toContain('Chain broken at record 2');
  });

  it('breaks the chain at a record whose bytes changed but whose value did not', async () => {
    const bundle = await exportBundle(await ledgerWith(4), { outDir, now: NOW });
    const path = join(bundle.path, recordFileName(1));
    const content = await readFile(path, 'utf-8');
    await writeFile(path, ' ' + content.replace('"req-1"', '"\\u0072eq-1"'), 'utf-8');
    await rewriteManifest(bundle.path);

    const report = await verifyBundle(bundle.path);

    expect(report.per_file.every((check) => check.pass)).toBe(true);
    expect(report.chain_valid).toBe(false);
    expect(report.first_break).toBe(1);
    expect(report.records.map((record) => record.valid)).toEqual([true, false, false, false]);
    expect(report.records[1].reason).toBe('evidence file is not in canonical form');
    expect(report.final_pass).toBe(false);
  });

  it('fails when the bundle holds fewer records than it declares', async () => {
    const bundle = await exportBundle(await ledgerWith(30), { outDir, now: NOW });

    // Drop the last record and re-seal the manifest so only the count disagrees.
    await rm(join(bundle.path, recordFileName(29)));
    const chain = (await readFile(join(bundle.path, CHAIN_FILE), 'utf-8')).split('\n').filter(Boolean);
    await writeFile(join(bundle.path, CHAIN_FILE), chain.slice(0, 29).map((line) => line + '\n').join(''), 'utf-8');
    await rewriteManifest(bundle.path);

    const report = await verifyBundle(bundle.path);

    expect(report.final_pass).toBe(false);
    expect(report.chain_valid).toBe(true);
    expect(report.per_file.every((check) => check.pass)).toBe(true);
    expect(report.declared_count).toBe(30);
    expect(report.actual_count).toBe(29);
    expect(report.notes).toContain('Record count mismatch: manifest declares 30, bundle contains 29');
    expect(report.notes).toContain(
      'Sequence range mismatch: bundle.json declares records 0..29, chain holds records 0..28'
    );
  });

  it('fails when bundle.json misstates the sequence range or anchor', async () => {
    const bundle = await exportBundle(await ledgerWith(3), { outDir, now: NOW });
    const metaPath = join(bundle.path, META_FILE);
    const meta = JSON.parse(await readFile(metaPath, 'utf-8'));
    await writeFile(metaPath, JSON.stringify({ ...meta, first_sequence: 1 }, null, 2) + '\n', 'utf-8');
    await rewriteManifest(bundle.path);

    const report = await verifyBundle(bundle.path);

    expect(report.chain_valid).toBe(true);
    expect(report.per_file.every((check) => check.pass)).toBe(true);
    expect(report.notes).toEqual([
      'Sequence range mismatch: bundle.json declares records 1..2, chain holds records 0..2',
      'Anchor hash does not fit first_sequence 1'
    ]);
    expect(report.final_pass).toBe(false);
  });

  it('fails files that are missing or not covered by the manifest', async () => {
    const bundle = await exportBundle(await ledgerWith(2), { outDir, now: NOW });
    await writeFile(join(bundle.path, 'extra.txt'), 'hello', 'utf-8');

    const extra = await verifyBundle(bundle.path);
    expect(extra.final_pass).toBe(false);
    expect(extra.notes).toEqual(['File not covered by manifest: extra.txt']);

    await rm(join(bundle.path, 'extra.txt'));
    await rm(join(bundle.path, META_FILE));
    const missing = await verifyBundle(bundle.path);
    expect(missing.final_pass).toBe(false);
    expect(missing.per_file[0]).toMatchObject({ path: 'bundle.json', actual: null, pass: false });
    expect(missing.notes).toContain('Missing file: bundle.json');
  });

  it('reports a missing manifest instead of throwing', async () => {
    const bundle = await exportBundle(await ledgerWith(1), { outDir, now: NOW });
    await rm(join(bundle.path, MANIFEST_FILE));

    const report = await verifyBundle(bundle.path);
    expect(report.final_pass).toBe(false);
    expect(report.per_file).toEqual([]);
    expect(report.notes).toContain('MANIFEST.sha256 is missing');

    const nowhere = await verifyBundle(join(root, 'no-such-bundle'));
    expect(nowhere.final_pass).toBe(false);
  });

  it('reports a path that is not a directory instead of throwing', async () => {
    const file = join(root, 'file.txt');
    await writeFile(file, 'not a bundle', 'utf-8');

    const report = await verifyBundle(file);
    expect(report.final_pass).toBe(false);
    expect(report.per_file).toEqual([]);
    expect(report.notes).toContain(`Bundle path is not a directory: ${file}`);
  });

  it('verifies a slice anchored mid-chain', async () => {
    const ledger = await ledgerWith(5);
    const bundle = await exportBundle(ledger, { outDir, now: NOW, range: { from: 2, to: 4 } });

    expect(bundle.meta.anchor_hash).toBe(ledger.read()[1].record_hash);
    expect(bundle.meta.first_sequence).toBe(2);
    expect(bundle.meta.last_sequence).toBe(3);

    const report = await verifyBundle(bundle.path);
    expect(report.final_pass).toBe(true);
    expect(report.records.map((record) => record.sequence)).toEqual([2, 3]);
  });

  it('checks the manifest signature against a supplied public key', async () => {
    const keyPair = generateKeyPair();
    const bundle = await exportBundle(await ledgerWith(2), { outDir, now: NOW, keyPair });
    expect(bundle.signed).toBe(true);

    const valid = await verifyBundle(bundle.path, { publicKey: keyPair.publicKey });
    expect(valid.signature).toBe('valid');
    expect(valid.final_pass).toBe(true);

    expect((await verifyBundle(bundle.path)).signature).toBe('unchecked');

    const wrongKey = await verifyBundle(bundle.path, { publicKey: generateKeyPair().publicKey });
    expect(wrongKey.signature).toBe('invalid');
    expect(wrongKey.final_pass).toBe(false);
  });

  it('fails an unsigned bundle when a public key is required', async () => {
    const bundle = await exportBundle(await ledgerWith(1), { outDir, now: NOW });
    const report = await verifyBundle(bundle.path, { publicKey: generateKeyPair().publicKey });
    expect(report.signature).toBe('absent');
    expect(report.final_pass).toBe(false);
  });
});

describe('BundleScheduler', () => {
  it('exports only when the ledger has grown', async () => {
    const ledger = await ledgerWith(1);
    const scheduler = new BundleScheduler({ ledger, outDir, intervalMs: 0, keyPair: null, logger: silentLogger });

    const first = await scheduler.runOnce();
    expect(first?.meta.record_count).toBe(1);
    expect(await scheduler.runOnce()).toBeNull();

    await ledger.append(entry(1));
    const second = await scheduler.runOnce();
    expect(second?.meta.record_count).toBe(2);
    expect((await verifyBundle(second?.path ?? '')).final_pass).toBe(true);
  });
});
