import type { VerdictStatus } from './policy.js';

export interface CheckResponse {
  request_id: string;
  status: VerdictStatus;
  risk: number;
  rationale: string;
  protection_index: number;
  sequence: number;
  record_hash: string;
}

export interface AnswerResponse {
  request_id: string;
  status: VerdictStatus;
  blocked: boolean;
  safe_output: string | null;
  rationale: string;
  // null when no output was generated
  mhi: number | null;
  retry_after_ms?: number;
  record_hash: string;
}

export interface VerifyResponse {
  request_id: string;
  status: VerdictStatus;
  reversible: boolean;
  blocked: boolean;
  rationale: string;
  mhi: number;
  hash: string;
  record_hash: string;
}

export interface ErrorResponse {
  error_code: string;
  message: string;
  details?: Record<string, unknown>;
}
