import { open, mkdir, readFile, readdir, rename, truncate } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import type { Logger } from 'pino';
import type { AppendResult, ChainLink, DecisionEntry, DecisionRecord } from '../types/index.js';
import { IntegrityError } from '../errors.js';
import { GENESIS_HASH, HashChain, canonicalJson } from '../crypto/index.js';
import { chainLinkSchema, decisionRecordSchema, isCanonicalEvidence, parseJsonObject } from './schema.js';

export const CHAIN_FILE = 'chain.jsonl';
export const RECORDS_DIR = 'records';
const ORPHANS_DIR = 'orphans';

export interface LedgerOptions {
  dir: string;
  logger: Logger;
}

export interface LedgerRange {
  from?: number;
  to?: number;
}

export function recordFileName(sequence: number): string {
  return `${RECORDS_DIR}/${String(sequence).padStart(12, '0')}.json`;
}

// Evidence and chain lines are flushed to disk before the append resolves.
async function writeDurably(path: string, data: string, flag: 'wx' | 'a'): Promise<void> {
  const handle = await open(path, flag);
  try {
    await handle.writeFile(data, 'utf-8');
    await handle.sync();
  } finally {
    await handle.close();
  }
}

/**
 * Append-only, hash-chained store of Guardian decisions.
 *
 * Layout under `dir`:
 *   records/<sequence>.json  one evidence file per decision, written first
 *   chain.jsonl              one link per line, written once the evidence is durable
 *
 * A crash between the two writes leaves an evidence file with no link; it is
 * moved to orphans/ on the next open and the chain before it is untouched.
 *
 * All appends go through a single promise queue, so sequence numbers and
 * hashes form one total order regardless of how many callers are waiting.
 * Once an integrity check fails the ledger refuses every further append.
 */
export class MoralIntegrityLedger {
  private readonly dir: string;
  private readonly logger: Logger;
  private readonly chain: HashChain;
  private readonly records: DecisionRecord[];
  private readonly chainLinks: ChainLink[];
  private queue: Promise<unknown> = Promise.resolve();
  private haltReason: string | null = null;

  private constructor(options: LedgerOptions, records: DecisionRecord[], links: ChainLink[]) {
    this.dir = options.dir;
    this.logger = options.logger;
    this.records = records;
    this.chainLinks = links;
    const last = links[links.length - 1];
    this.chain = last ? new HashChain(last.record_hash, links.length) : new HashChain();
  }

  static async open(options: LedgerOptions): Promise<MoralIntegrityLedger> {
    await mkdir(join(options.dir, RECORDS_DIR), { recursive: true });

    const links = await loadChain(options.dir, options.logger);
    const records: DecisionRecord[] = [];
    let prevHash = GENESIS_HASH;

    for (const link of links) {
      const raw = await readEvidence(options.dir, link.file);
      if (!raw || !HashChain.verifyRecord(raw, prevHash) || raw.record_hash !== link.record_hash) {
        throw new IntegrityError(`Ledger record ${link.sequence} does not match its chain link`, {
          sequence: link.sequence,
          file: link.file
        });
      }
      const parsed = decisionRecordSchema.safeParse(raw);
      if (!parsed.success || parsed.data.sequence !== link.sequence) {
        throw new IntegrityError(`Ledger record ${link.sequence} is malformed`, { sequence: link.sequence });
      }
      records.push(Object.freeze(parsed.data));
      prevHash = link.record_hash;
    }

    await quarantineOrphans(options.dir, links.length, options.logger);

    options.logger.info({ dir: options.dir, records: records.length, head: prevHash }, 'Ledger opened');
    return new MoralIntegrityLedger(options, records, links);
  }

  append(entry: DecisionEntry): Promise<AppendResult> {
    const run = this.queue.then(() => this.appendExclusive(entry));
    // Keep the queue alive after a failure; the caller still receives the rejection.
    this.queue = run.catch(() => undefined);
    return run;
  }

  read(range: LedgerRange = {}): readonly DecisionRecord[] {
    const { from, to } = this.bounds(range);
    return Object.freeze(this.records.slice(from, to));
  }

  links(range: LedgerRange = {}): readonly ChainLink[] {
    const { from, to } = this.bounds(range);
    return Object.freeze(this.chainLinks.slice(from, to));
  }

  size(): number {
    return this.records.length;
  }

  head(): string {
    return this.chain.getCurrentHash();
  }

  isHalted(): boolean {
    return this.haltReason !== null;
  }

  evidencePath(sequence: number): string {
    return join(this.dir, recordFileName(sequence));
  }

  // Re-hash the in-memory chain from genesis
  verify(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];
    let prevHash = GENESIS_HASH;

    for (const record of this.records) {
      if (!HashChain.verifyRecord(record, prevHash)) {
        errors.push(`Record ${record.sequence}: chain broken`);
      }
      prevHash = record.record_hash;
    }
    if (this.haltReason) {
      errors.push(`Ledger halted: ${this.haltReason}`);
    }

    return { valid: errors.length === 0, errors };
  }

  private bounds(range: LedgerRange): { from: number; to: number } {
    const size = this.records.length;
    const from = Math.max(0, Math.min(range.from ?? 0, size));
    const to = Math.max(from, Math.min(range.to ?? size, size));
    return { from, to };
  }

  private halt(reason: string, details: Record<string, unknown>): IntegrityError {
    this.haltReason = reason;
    this.logger.fatal({ ...details, reason }, 'Ledger integrity failure; refusing further writes');
    return new IntegrityError(reason, details);
  }

  private async appendExclusive(entry: DecisionEntry): Promise<AppendResult> {
    if (this.haltReason) {
      throw new IntegrityError(`Ledger halted: ${this.haltReason}`);
    }

    const head = this.chain.getCurrentHash();
    if (entry.previous_hash !== undefined && entry.previous_hash !== head) {
      throw this.halt('Supplied previous_hash does not match the ledger head', {
        supplied: entry.previous_hash,
        head
      });
    }

    await this.checkHeadOnDisk(head);

    const { previous_hash: _supplied, ...fields } = entry;
    const record: DecisionRecord = this.chain.seal(fields);
    const link: ChainLink = {
      sequence: record.sequence,
      file: recordFileName(record.sequence),
      previous_hash: record.previous_hash,
      record_hash: record.record_hash
    };

    try {
      await writeDurably(join(this.dir, link.file), canonicalJson(record) + '\n', 'wx');
      await writeDurably(join(this.dir, CHAIN_FILE), canonicalJson(link) + '\n', 'a');
    } catch (error) {
      throw this.halt('Ledger write failed', {
        sequence: record.sequence,
        cause: error instanceof Error ? error.message : String(error)
      });
    }

    this.chain.advance(record.record_hash);
    this.records.push(Object.freeze(record));
    this.chainLinks.push(Object.freeze(link));

    return { sequence: record.sequence, record_hash: record.record_hash };
  }

  // The newest evidence file must still hash to the head we are about to extend.
  private async checkHeadOnDisk(head: string): Promise<void> {
    const last = this.chainLinks[this.chainLinks.length - 1];
    if (!last) return;

    const raw = await readEvidence(this.dir, last.file);
    if (!raw || !HashChain.verifyRecord(raw, last.previous_hash) || raw.record_hash !== head) {
      throw this.halt(`Evidence file for record ${last.sequence} no longer matches the chain head`, {
        sequence: last.sequence,
        file: last.file
      });
    }
  }
}

async function readEvidence(dir: string, file: string): Promise<Record<string, unknown> | null> {
  const path = join(dir, file);
  if (!existsSync(path)) return null;
  const text = await readFile(path, 'utf-8');
  const raw = parseJsonObject(text);
  return raw && isCanonicalEvidence(text, raw) ? raw : null;
}

async function loadChain(dir: string, logger: Logger): Promise<ChainLink[]> {
  const path = join(dir, CHAIN_FILE);
  if (!existsSync(path)) return [];

  let content = await readFile(path, 'utf-8');
  if (content.length > 0 && !content.endsWith('\n')) {
    // Torn final line from an interrupted append: drop it, keep the chain before it.
    const keep = content.lastIndexOf('\n') + 1;
    logger.warn({ path, dropped_bytes: Buffer.byteLength(content.slice(keep)) }, 'Truncating torn chain tail');
    await truncate(path, Buffer.byteLength(content.slice(0, keep)));
    content = content.slice(0, keep);
  }

  const lines = content.split('\n').filter(Boolean);
  return lines.map((line, index) => {
    const parsed = chainLinkSchema.safeParse(parseJsonObject(line));
    if (!parsed.success || parsed.data.sequence !== index) {
      throw new IntegrityError(`Chain line ${index} is malformed or out of sequence`, { line: index });
    }
    return Object.freeze(parsed.data);
  });
}

// Evidence files past the last chain link are the unlinked tail of a crash.
async function quarantineOrphans(dir: string, linked: number, logger: Logger): Promise<void> {
  const names = await readdir(join(dir, RECORDS_DIR));
  const orphans = names.filter((name) => {
    const match = /^(\d{12})\.json$/.exec(name);
    return match !== null && Number(match[1]) >= linked;
  });
  if (orphans.length === 0) return;

  await mkdir(join(dir, ORPHANS_DIR), { recursive: true });
  for (const name of orphans.sort()) {
    await rename(join(dir, RECORDS_DIR, name), join(dir, ORPHANS_DIR, `${Date.now()}-${name}`));
  }
  logger.warn({ orphans }, 'Moved unlinked evidence files out of the chain');
}
