import { createHash } from 'crypto';
import type { UnsealedRecord } from '../types/index.js';
import { canonicalJson } from './canonical.js';

/** previous_hash of the first record in every ledger. */
export const GENESIS_HASH = '0'.repeat(64);

export function sha256(data: string | Buffer): string {
  return createHash('sha256').update(data).digest('hex');
}

export function hashObject(obj: unknown): string {
  return sha256(canonicalJson(obj));
}

// record_hash = sha256(canonical(record without record_hash) || previous_hash)
export function computeRecordHash(record: object, previousHash: string): string {
  const body = Object.fromEntries(Object.entries(record).filter(([key]) => key !== 'record_hash'));
  return sha256(canonicalJson(body) + previousHash);
}

// Tracks the head of a tamper-evident chain
export class HashChain {
  private head: string;
  private length: number;

  constructor(head: string = GENESIS_HASH, length = 0) {
    this.head = head;
    this.length = length;
  }

  // Seal a record against the current head without advancing it
  seal(record: Omit<UnsealedRecord, 'sequence' | 'previous_hash'>): UnsealedRecord & { record_hash: string } {
    const unsealed: UnsealedRecord = {
      ...record,
      sequence: this.length,
      previous_hash: this.head
    };
    return { ...unsealed, record_hash: computeRecordHash(unsealed, this.head) };
  }

  advance(recordHash: string): void {
    this.head = recordHash;
    this.length++;
  }

  // Checks linkage and self hash of a stored record (parsed JSON or in memory)
  static verifyRecord<T extends { previous_hash?: unknown; record_hash?: unknown }>(record: T, expectedPrevHash: string): boolean {
    if (record.previous_hash !== expectedPrevHash) return false;
    return computeRecordHash(record, expectedPrevHash) === record.record_hash;
  }

  getCurrentHash(): string {
    return this.head;
  }

  getLength(): number {
    return this.length;
  }
}
