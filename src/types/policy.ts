export type Phase = 'pre' | 'post';

export type VerdictStatus = 'pass' | 'halt' | 'defer';

// Rule predicates are plain tagged data; one interpreter evaluates them all.
export type Predicate =
  | { type: 'keyword'; terms: string[] }
  | { type: 'pattern'; patterns: string[]; flags?: string }
  | { type: 'context'; key: string; equals?: string | number | boolean; in?: Array<string | number | boolean> }
  | { type: 'length_over'; chars: number }
  | { type: 'all'; of: Predicate[] }
  | { type: 'any'; of: Predicate[] }
  | { type: 'not'; predicate: Predicate };

export interface Rule {
  id: string;
  description: string;
  category: string;
  phases: Phase[];
  severity: number;
  jurisdictions: string[];
  hard_block: boolean;
  irreversible: boolean;
  when: Predicate;
}

export interface RuleSet {
  name: string;
  version: string;
  rules: Rule[];
}

export interface PolicyThresholds {
  halt: number;
  defer: number;
}

export interface JurisdictionSettings {
  default: string;
  known: string[];
  fallbacks: Record<string, string>;
}

export interface EngineSettings {
  thresholds: PolicyThresholds;
  jurisdiction: JurisdictionSettings;
  audienceAmplification: Record<string, number>;
  maxTextChars: number;
  maxOutputChars: number;
}

export interface Verdict {
  status: VerdictStatus;
  risk: number;
  rationale: string;
  fired: readonly string[];
  phase: Phase;
  jurisdiction: string;
  reversible?: boolean;
}

export const PRECHECK_CLEARED = 'Request cleared by Guardian precheck.';
export const POSTCHECK_CLEARED = 'Output is reversible and suitable for delivery.';
