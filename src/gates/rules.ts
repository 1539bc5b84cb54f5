import { z } from 'zod';
import type { Phase, Predicate, Rule, RuleSet } from '../types/index.js';
import { ConfigError } from '../errors.js';
import { hashObject } from '../crypto/index.js';
import { compilePredicate, type CompiledPredicate } from './predicates.js';

const scalar = z.union([z.string(), z.number(), z.boolean()]);

const predicateSchema: z.ZodType<Predicate> = z.lazy(() =>
  z.union([
    z.object({ type: z.literal('keyword'), terms: z.array(z.string().min(1)).min(1) }),
    z.object({
      type: z.literal('pattern'),
      patterns: z.array(z.string().min(1)).min(1),
      flags: z.string().optional()
    }),
    z.object({
      type: z.literal('context'),
      key: z.string().min(1),
      equals: scalar.optional(),
      in: z.array(scalar).optional()
    }),
    z.object({ type: z.literal('length_over'), chars: z.number().int().nonnegative() }),
    z.object({ type: z.literal('all'), of: z.array(predicateSchema).min(1) }),
    z.object({ type: z.literal('any'), of: z.array(predicateSchema).min(1) }),
    z.object({ type: z.literal('not'), predicate: predicateSchema })
  ])
);

const ruleSchema = z.object({
  id: z.string().min(1),
  description: z.string().default(''),
  category: z.string().min(1),
  phases: z.array(z.enum(['pre', 'post'])).min(1).default(['pre']),
  severity: z.number().min(0).max(1),
  jurisdictions: z.array(z.string().min(1)).min(1).default(['*']),
  hard_block: z.boolean().default(false),
  irreversible: z.boolean().default(false),
  when: predicateSchema
});

export const ruleSetSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
  rules: z.array(ruleSchema)
});

export interface CompiledRule {
  id: string;
  description: string;
  category: string;
  phases: ReadonlySet<Phase>;
  severity: number;
  jurisdictions: ReadonlySet<string>;
  hardBlock: boolean;
  irreversible: boolean;
  predicate: CompiledPredicate;
}

export interface CompiledRuleSet {
  name: string;
  version: string;
  label: string;
  digest: string;
  rules: readonly CompiledRule[];
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

export function parseRuleSet(raw: unknown, source = 'rule set'): RuleSet {
  const parsed = ruleSetSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Malformed ${source}: ${formatIssues(parsed.error)}`, { source });
  }
  return parsed.data;
}

// Plain code-unit comparison; localeCompare would vary with the host ICU data.
export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function compileRuleSet(ruleSet: RuleSet): CompiledRuleSet {
  const seen = new Set<string>();
  for (const rule of ruleSet.rules) {
    if (seen.has(rule.id)) {
      throw new ConfigError(`Duplicate rule id "${rule.id}" in ${ruleSet.name}`, { rule: rule.id });
    }
    seen.add(rule.id);
  }

  const ordered = [...ruleSet.rules].sort((a, b) => compareIds(a.id, b.id));

  const rules = ordered.map(
    (rule: Rule): CompiledRule =>
      Object.freeze({
        id: rule.id,
        description: rule.description,
        category: rule.category,
        phases: new Set(rule.phases),
        severity: rule.severity,
        jurisdictions: new Set(rule.jurisdictions.map((j) => (j === '*' ? j : j.toUpperCase()))),
        hardBlock: rule.hard_block,
        irreversible: rule.irreversible,
        predicate: compilePredicate(rule.when, rule.id)
      })
  );

  return Object.freeze({
    name: ruleSet.name,
    version: ruleSet.version,
    label: `${ruleSet.name}@${ruleSet.version}`,
    digest: hashObject({ ...ruleSet, rules: ordered }),
    rules: Object.freeze(rules)
  });
}
