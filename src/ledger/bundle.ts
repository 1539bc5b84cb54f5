import { copyFile, mkdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import type { BundleMeta, ManifestEntry } from '../types/index.js';
import { canonicalJson, sha256, signData, type KeyPair } from '../crypto/index.js';
import { CHAIN_FILE, RECORDS_DIR, type LedgerRange, type MoralIntegrityLedger } from './ledger.js';
import { META_FILE, MANIFEST_FILE, SIGNATURE_FILE, formatManifest } from './manifest.js';

export interface ExportOptions {
  outDir: string;
  range?: LedgerRange;
  keyPair?: KeyPair | null;
  now?: Date;
}

export interface ExportedBundle {
  name: string;
  path: string;
  meta: BundleMeta;
  manifest: ManifestEntry[];
  signed: boolean;
}

// 2026-10-18T09:30:00.000Z -> 20261018T093000Z
export function bundleStamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z').replace(/[-:]/g, '');
}

async function createBundleDir(outDir: string, stamp: string): Promise<{ name: string; path: string }> {
  await mkdir(outDir, { recursive: true });
  for (let attempt = 0; ; attempt++) {
    const name = attempt === 0 ? `bundle_${stamp}` : `bundle_${stamp}_${attempt}`;
    const path = join(outDir, name);
    try {
      await mkdir(path);
      return { name, path };
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'EEXIST') continue;
      throw error;
    }
  }
}

/**
 * Snapshot a slice of the ledger into a self-contained bundle directory:
 * evidence files, the matching chain lines, bundle.json and a SHA-256
 * manifest (signed when a key pair is available).
 */
export async function exportBundle(ledger: MoralIntegrityLedger, options: ExportOptions): Promise<ExportedBundle> {
  const links = ledger.links(options.range);
  const created = options.now ?? new Date();
  const { name, path } = await createBundleDir(options.outDir, bundleStamp(created));
  await mkdir(join(path, RECORDS_DIR));

  const first = links[0];
  const last = links[links.length - 1];
  const anchor = first ? first.previous_hash : ledger.head();

  const files: string[] = [];
  for (const link of links) {
    await copyFile(ledger.evidencePath(link.sequence), join(path, link.file));
    files.push(link.file);
  }

  await writeFile(join(path, CHAIN_FILE), links.map((link) => canonicalJson(link) + '\n').join(''), 'utf-8');
  files.push(CHAIN_FILE);

  const meta: BundleMeta = {
    format: 'guardian-bundle/1',
    created_at: created.toISOString(),
    record_count: links.length,
    first_sequence: first ? first.sequence : null,
    last_sequence: last ? last.sequence : null,
    anchor_hash: anchor,
    head_hash: last ? last.record_hash : anchor
  };
  await writeFile(join(path, META_FILE), JSON.stringify(meta, null, 2) + '\n', 'utf-8');
  files.push(META_FILE);

  const manifest: ManifestEntry[] = [];
  for (const file of files) {
    manifest.push({ digest: sha256(await readFile(join(path, file))), path: file });
  }
  const manifestText = formatManifest(manifest);
  await writeFile(join(path, MANIFEST_FILE), manifestText, 'utf-8');

  const signed = Boolean(options.keyPair);
  if (options.keyPair) {
    await writeFile(join(path, SIGNATURE_FILE), signData(manifestText, options.keyPair.privateKey) + '\n', 'utf-8');
  }

  return { name, path, meta, manifest, signed };
}
