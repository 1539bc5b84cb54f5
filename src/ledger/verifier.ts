import { readFile, readdir } from 'fs/promises';
import { existsSync, statSync } from 'fs';
import { basename, join } from 'path';
import type { BundleMeta, ChainLink, CustodyReport, FileCheck, RecordCheck } from '../types/index.js';
import { GENESIS_HASH, HashChain, sha256, verifySignature } from '../crypto/index.js';
import { compareIds } from '../gates/rules.js';
import { CHAIN_FILE, RECORDS_DIR } from './ledger.js';
import { META_FILE, MANIFEST_FILE, SIGNATURE_FILE, isSafeBundlePath, parseManifest } from './manifest.js';
import { bundleMetaSchema, chainLinkSchema, isCanonicalEvidence, parseJsonObject } from './schema.js';

export interface CustodyVerifyOptions {
  /** PEM public key. When given, MANIFEST.sig must exist and verify. */
  publicKey?: string;
}

async function readOptional(path: string): Promise<Buffer | null> {
  if (!existsSync(path) || !statSync(path).isFile()) return null;
  return readFile(path);
}

async function listBundleFiles(dir: string): Promise<string[]> {
  const files: string[] = [];
  for (const entry of await readdir(dir, { withFileTypes: true })) {
    if (entry.isFile()) {
      files.push(entry.name);
    } else if (entry.isDirectory() && entry.name === RECORDS_DIR) {
      for (const name of await readdir(join(dir, RECORDS_DIR))) {
        files.push(`${RECORDS_DIR}/${name}`);
      }
    } else {
      files.push(`${entry.name}/`);
    }
  }
  return files.sort(compareIds);
}

function checkFiles(
  entries: { digest: string; path: string }[],
  contents: Map<string, Buffer | null>
): FileCheck[] {
  return entries.map(({ digest, path }) => {
    const bytes = contents.get(path) ?? null;
    const actual = bytes ? sha256(bytes) : null;
    return { path, expected: digest, actual, pass: actual === digest };
  });
}

/**
 * Replays the chain in chain.jsonl against the evidence files. The first
 * record that fails to link or re-hash breaks the chain, and every record
 * after it is reported invalid as well.
 */
async function replayChain(
  dir: string,
  chainText: string,
  anchor: string
): Promise<{ records: RecordCheck[]; firstBreak: number | null; count: number; head: string }> {
  const lines = chainText.split('\n').filter(Boolean);
  const records: RecordCheck[] = [];
  let firstBreak: number | null = null;
  let prevHash = anchor;
  let expectedSequence: number | null = null;

  for (let index = 0; index < lines.length; index++) {
    const parsed = chainLinkSchema.safeParse(parseJsonObject(lines[index]));
    const link: ChainLink | null = parsed.success ? parsed.data : null;
    const sequence = link ? link.sequence : index;

    if (firstBreak !== null) {
      records.push({ sequence, valid: false, reason: `follows broken record ${firstBreak}` });
      continue;
    }

    const reason = link ? await checkLink(dir, link, prevHash, expectedSequence) : 'chain line is malformed';
    if (reason !== null || !link) {
      firstBreak = sequence;
      records.push({ sequence, valid: false, reason: reason ?? 'chain line is malformed' });
      continue;
    }

    records.push({ sequence, valid: true });
    prevHash = link.record_hash;
    expectedSequence = link.sequence + 1;
  }

  return { records, firstBreak, count: lines.length, head: prevHash };
}

async function checkLink(
  dir: string,
  link: ChainLink,
  prevHash: string,
  expectedSequence: number | null
): Promise<string | null> {
  if (expectedSequence !== null && link.sequence !== expectedSequence) {
    return `sequence gap: expected ${expectedSequence}, found ${link.sequence}`;
  }
  if (link.previous_hash !== prevHash) {
    return 'previous_hash does not link to the preceding record';
  }
  const bytes = isSafeBundlePath(link.file) ? await readOptional(join(dir, link.file)) : null;
  const text = bytes ? bytes.toString('utf-8') : '';
  const raw = parseJsonObject(text);
  if (!raw) {
    return `evidence file ${link.file} is missing or unreadable`;
  }
  if (raw.sequence !== link.sequence) {
    return 'evidence sequence differs from chain line';
  }
  if (!HashChain.verifyRecord(raw, prevHash)) {
    return 'recomputed record hash does not match stored hash';
  }
  if (raw.record_hash !== link.record_hash) {
    return 'chain line hash differs from evidence hash';
  }
  if (!isCanonicalEvidence(text, raw)) {
    return 'evidence file is not in canonical form';
  }
  return null;
}

function describeRange(first: number | null, last: number | null): string {
  return first === null || last === null ? 'no records' : `records ${first}..${last}`;
}

/**
 * Offline custody check of an exported bundle directory.
 *
 * Never throws for a bad bundle and never modifies it: every problem lands
 * in the report and forces `final_pass` to false. The report depends only on
 * the bundle bytes and the options, so repeated runs agree.
 */
export async function verifyBundle(dir: string, options: CustodyVerifyOptions = {}): Promise<CustodyReport> {
  const notes: string[] = [];
  let structural = true;

  const manifestBytes = await readOptional(join(dir, MANIFEST_FILE));
  const manifestText = manifestBytes?.toString('utf-8') ?? '';
  if (!manifestBytes) {
    notes.push(`${MANIFEST_FILE} is missing`);
    structural = false;
  }

  const { entries, errors } = parseManifest(manifestText);
  if (errors.length > 0) {
    notes.push(...errors);
    structural = false;
  }
  entries.sort((a, b) => compareIds(a.path, b.path));

  // (a) every manifest digest against the bytes on disk
  const contents = new Map<string, Buffer | null>();
  for (const entry of entries) {
    if (!isSafeBundlePath(entry.path)) {
      notes.push(`Manifest path escapes the bundle: ${entry.path}`);
      contents.set(entry.path, null);
      continue;
    }
    contents.set(entry.path, await readOptional(join(dir, entry.path)));
  }
  const perFile = checkFiles(entries, contents);
  for (const check of perFile) {
    if (!check.pass) {
      notes.push(check.actual === null ? `Missing file: ${check.path}` : `Digest mismatch: ${check.path}`);
    }
  }

  if (!existsSync(dir) || !statSync(dir).isDirectory()) {
    notes.push(`Bundle path is not a directory: ${dir}`);
    structural = false;
  } else {
    const listed = new Set([...entries.map((e) => e.path), MANIFEST_FILE, SIGNATURE_FILE]);
    for (const file of await listBundleFiles(dir)) {
      if (!listed.has(file)) {
        notes.push(`File not covered by manifest: ${file}`);
        structural = false;
      }
    }
  }

  let meta: BundleMeta | null = null;
  const metaParsed = bundleMetaSchema.safeParse(
    parseJsonObject((await readOptional(join(dir, META_FILE)))?.toString('utf-8') ?? '')
  );
  if (metaParsed.success) {
    meta = metaParsed.data;
  } else {
    notes.push(`${META_FILE} is missing or malformed`);
    structural = false;
  }

  // (b) chain replay from the bundle's anchor
  const chainBytes = await readOptional(join(dir, CHAIN_FILE));
  if (!chainBytes) {
    notes.push(`${CHAIN_FILE} is missing`);
  }
  const replay = await replayChain(dir, chainBytes?.toString('utf-8') ?? '', meta?.anchor_hash ?? GENESIS_HASH);
  const chainValid = chainBytes !== null && replay.firstBreak === null;
  if (replay.firstBreak !== null) {
    notes.push(`Chain broken at record ${replay.firstBreak}`);
  }

  // (c) declared count and head against what was replayed
  const declared = meta ? meta.record_count : null;
  if (declared !== null && declared !== replay.count) {
    notes.push(`Record count mismatch: manifest declares ${declared}, bundle contains ${replay.count}`);
  }
  if (meta) {
    const records = replay.records;
    const firstSequence = records.length > 0 ? records[0].sequence : null;
    const lastSequence = records.length > 0 ? records[records.length - 1].sequence : null;
    if (meta.first_sequence !== firstSequence || meta.last_sequence !== lastSequence) {
      notes.push(
        `Sequence range mismatch: ${META_FILE} declares ${describeRange(meta.first_sequence, meta.last_sequence)}, ` +
          `chain holds ${describeRange(firstSequence, lastSequence)}`
      );
      structural = false;
    }
    // Only a bundle starting at record 0 may be anchored at genesis, and it must be.
    const genesisAnchor = meta.anchor_hash === GENESIS_HASH;
    if (meta.first_sequence === 0 ? !genesisAnchor : genesisAnchor && meta.first_sequence !== null) {
      notes.push(`Anchor hash does not fit first_sequence ${meta.first_sequence}`);
      structural = false;
    }
  }
  if (meta && chainValid) {
    if (replay.head !== meta.head_hash) {
      notes.push('Bundle head_hash does not match the last chained record');
      structural = false;
    }
  }

  let signature: CustodyReport['signature'] = 'absent';
  const sigBytes = await readOptional(join(dir, SIGNATURE_FILE));
  if (sigBytes) {
    if (options.publicKey) {
      signature = verifySignature(manifestText, sigBytes.toString('utf-8'), options.publicKey) ? 'valid' : 'invalid';
      if (signature === 'invalid') notes.push('Manifest signature is invalid');
    } else {
      signature = 'unchecked';
    }
  } else if (options.publicKey) {
    notes.push('Public key supplied but the manifest is unsigned');
    structural = false;
  }

  const finalPass =
    structural &&
    perFile.length > 0 &&
    perFile.every((check) => check.pass) &&
    chainValid &&
    declared === replay.count &&
    signature !== 'invalid';

  return {
    bundle: basename(dir),
    per_file: perFile,
    records: replay.records,
    chain_valid: chainValid,
    first_break: replay.firstBreak,
    declared_count: declared,
    actual_count: replay.count,
    signature,
    final_pass: finalPass,
    notes
  };
}
