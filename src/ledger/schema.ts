import { z } from 'zod';
import { canonicalJson } from '../crypto/index.js';

const hex64 = z.string().regex(/^[0-9a-f]{64}$/, 'expected a 64-character hex digest');

export const verdictSchema = z.object({
  status: z.enum(['pass', 'halt', 'defer']),
  risk: z.number().min(0).max(1),
  rationale: z.string(),
  fired: z.array(z.string()),
  phase: z.enum(['pre', 'post']),
  jurisdiction: z.string(),
  reversible: z.boolean().optional()
});

export const decisionRecordSchema = z.object({
  sequence: z.number().int().nonnegative(),
  kind: z.enum(['check', 'answer', 'verify']),
  phase: z.enum(['pre', 'post']),
  request_id: z.string(),
  request_hash: hex64,
  subject_hash: hex64.nullable(),
  verdict: verdictSchema,
  indices: z.object({
    protection_index: z.number().optional(),
    mhi: z.number().optional()
  }),
  rationale: z.string(),
  jurisdiction: z.string(),
  rule_set: z.string(),
  rule_set_digest: hex64,
  timestamp: z.string(),
  previous_hash: hex64,
  record_hash: hex64
});

export const chainLinkSchema = z.object({
  sequence: z.number().int().nonnegative(),
  file: z.string().regex(/^records\/\d{12}\.json$/),
  previous_hash: hex64,
  record_hash: hex64
});

export const bundleMetaSchema = z.object({
  format: z.literal('guardian-bundle/1'),
  created_at: z.string(),
  record_count: z.number().int().nonnegative(),
  first_sequence: z.number().int().nonnegative().nullable(),
  last_sequence: z.number().int().nonnegative().nullable(),
  anchor_hash: hex64,
  head_hash: hex64
});

/** Parses a JSON document into a plain object, or returns null. */
export function parseJsonObject(text: string): Record<string, unknown> | null {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return null;
  }
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return null;
  return Object.fromEntries(Object.entries(value));
}

/**
 * Evidence files hold exactly the canonical serialization of their record
 * and a trailing newline. Any other byte sequence is a modified file, even
 * when it parses to the same value.
 */
export function isCanonicalEvidence(text: string, raw: Record<string, unknown>): boolean {
  return text === canonicalJson(raw) + '\n';
}
