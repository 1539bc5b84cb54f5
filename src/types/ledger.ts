import type { Phase, Verdict } from './policy.js';

export type DecisionKind = 'check' | 'answer' | 'verify';

export interface DecisionIndices {
  protection_index?: number;
  mhi?: number;
}

// A decision as the gateway hands it to the ledger, before chaining.
export interface DecisionEntry {
  kind: DecisionKind;
  phase: Phase;
  request_id: string;
  request_hash: string;
  subject_hash: string | null;
  verdict: Verdict;
  indices: DecisionIndices;
  rationale: string;
  jurisdiction: string;
  rule_set: string;
  rule_set_digest: string;
  timestamp: string;
  previous_hash?: string;
}

export interface DecisionRecord {
  sequence: number;
  kind: DecisionKind;
  phase: Phase;
  request_id: string;
  request_hash: string;
  subject_hash: string | null;
  verdict: Verdict;
  indices: DecisionIndices;
  rationale: string;
  jurisdiction: string;
  rule_set: string;
  rule_set_digest: string;
  timestamp: string;
  previous_hash: string;
  record_hash: string;
}

export type UnsealedRecord = Omit<DecisionRecord, 'record_hash'>;

// One line of chain.jsonl
export interface ChainLink {
  sequence: number;
  file: string;
  previous_hash: string;
  record_hash: string;
}

export interface AppendResult {
  sequence: number;
  record_hash: string;
}

export interface BundleMeta {
  format: 'guardian-bundle/1';
  created_at: string;
  record_count: number;
  first_sequence: number | null;
  last_sequence: number | null;
  anchor_hash: string;
  head_hash: string;
}

export interface ManifestEntry {
  digest: string;
  path: string;
}

export interface FileCheck {
  path: string;
  expected: string;
  actual: string | null;
  pass: boolean;
}

export interface RecordCheck {
  sequence: number;
  valid: boolean;
  reason?: string;
}

export interface CustodyReport {
  bundle: string;
  per_file: FileCheck[];
  records: RecordCheck[];
  chain_valid: boolean;
  first_break: number | null;
  declared_count: number | null;
  actual_count: number;
  signature: 'valid' | 'invalid' | 'absent' | 'unchecked';
  final_pass: boolean;
  notes: string[];
}
