import type { EngineSettings, EvaluationInput, Phase, RequestContext, Verdict, VerdictStatus } from '../types/index.js';
import { POSTCHECK_CLEARED, PRECHECK_CLEARED } from '../types/index.js';
import { ConfigError, ValidationError } from '../errors.js';
import { aggregateRisk } from './aggregate.js';
import { createJurisdictionResolver, type JurisdictionResolver } from './jurisdiction.js';
import { matchPredicate, type PredicateEnv } from './predicates.js';
import type { CompiledRule, CompiledRuleSet } from './rules.js';

function fmt(value: number): string {
  return value.toFixed(3);
}

function isPlainObject(value: unknown): value is RequestContext {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Stateless evaluator of one text against a compiled rule set.
 *
 * The result is a function of (input, rule set, settings) only: rules run in
 * ascending id order and nothing reads the clock or a random source, so two
 * calls with equal arguments return equal verdicts.
 */
export class PolicyEngine {
  private readonly ruleSet: CompiledRuleSet;
  private readonly settings: EngineSettings;
  private readonly jurisdictions: JurisdictionResolver;

  constructor(ruleSet: CompiledRuleSet, settings: EngineSettings) {
    const { halt, defer } = settings.thresholds;
    if (!(defer >= 0 && defer <= halt && halt <= 1)) {
      throw new ConfigError(`Thresholds must satisfy 0 <= defer <= halt <= 1 (got defer=${defer}, halt=${halt})`);
    }
    for (const [audience, amplification] of Object.entries(settings.audienceAmplification)) {
      if (!(amplification >= 0)) {
        throw new ConfigError(`Audience amplification for "${audience}" must be >= 0`);
      }
    }
    if (!(settings.maxTextChars > 0 && settings.maxOutputChars > 0)) {
      throw new ConfigError('Text limits must be positive');
    }

    this.ruleSet = ruleSet;
    this.settings = settings;
    this.jurisdictions = createJurisdictionResolver(settings.jurisdiction);
  }

  get rules(): CompiledRuleSet {
    return this.ruleSet;
  }

  evaluate(input: EvaluationInput, phase: Phase): Verdict {
    this.validate(input, phase === 'pre' ? this.settings.maxTextChars : this.settings.maxOutputChars);

    const { jurisdiction, chain } = this.jurisdictions.resolve(input.jurisdiction);
    const env: PredicateEnv = {
      text: input.text,
      lowered: input.text.toLowerCase(),
      context: input.context
    };

    const fired: CompiledRule[] = [];
    for (const rule of this.ruleSet.rules) {
      if (!rule.phases.has(phase)) continue;
      if (!rule.jurisdictions.has('*') && !chain.some((tag) => rule.jurisdictions.has(tag))) continue;
      if (matchPredicate(rule.predicate, env)) {
        fired.push(rule);
      }
    }

    const { halt, defer } = this.settings.thresholds;
    const hardBlock = fired.find((rule) => rule.hardBlock);
    const aggregated = aggregateRisk(
      fired.map((rule) => rule.severity),
      this.amplificationFor(input.context)
    );
    const risk = hardBlock ? Math.max(aggregated, halt) : aggregated;
    const firedIds = fired.map((rule) => rule.id);

    let status: VerdictStatus;
    let rationale: string;
    if (hardBlock) {
      status = 'halt';
      rationale = `Guardian halt: hard-block rule ${hardBlock.id} (${hardBlock.category})` +
        (hardBlock.description ? ` - ${hardBlock.description}` : '');
    } else if (risk >= halt) {
      status = 'halt';
      rationale = `Guardian halt: aggregate risk ${fmt(risk)} reached halt threshold ${fmt(halt)} (rules: ${firedIds.join(', ')})`;
    } else if (risk >= defer) {
      status = 'defer';
      rationale = `Guardian defer: aggregate risk ${fmt(risk)} reached defer threshold ${fmt(defer)} (rules: ${firedIds.join(', ')})`;
    } else {
      status = 'pass';
      rationale = phase === 'pre' ? PRECHECK_CLEARED : POSTCHECK_CLEARED;
      if (firedIds.length > 0) {
        rationale += ` Low-risk signals: ${firedIds.join(', ')}.`;
      }
    }

    if (phase === 'pre') {
      return Object.freeze({ status, risk, rationale, fired: Object.freeze(firedIds), phase, jurisdiction });
    }

    // Reversibility is carried by the caller's context and can be revoked by rules.
    const irreversibleRules = fired.filter((rule) => rule.irreversible).map((rule) => rule.id);
    const reversible = input.context.reversible !== false && irreversibleRules.length === 0;
    if (!reversible && status === 'pass') {
      rationale = irreversibleRules.length > 0
        ? `Guardian hold: output is not reversible (rules: ${irreversibleRules.join(', ')})`
        : 'Guardian hold: output was declared non-reversible by the caller';
    }

    return Object.freeze({ status, risk, rationale, fired: Object.freeze(firedIds), phase, jurisdiction, reversible });
  }

  private amplificationFor(context: RequestContext): number {
    const audience = context.audience;
    if (typeof audience !== 'string') return 0;
    const key = audience.toLowerCase();
    const table = this.settings.audienceAmplification;
    return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : 0;
  }

  private validate(input: EvaluationInput, limit: number): void {
    if (typeof input.text !== 'string' || input.text.trim().length === 0) {
      throw new ValidationError('Text must be a non-empty string');
    }
    if (input.text.length > limit) {
      throw new ValidationError(`Text exceeds ${limit} characters`, { length: input.text.length, limit });
    }
    if (!isPlainObject(input.context)) {
      throw new ValidationError('Context must be a JSON object');
    }
    if (input.jurisdiction !== undefined && typeof input.jurisdiction !== 'string') {
      throw new ValidationError('Jurisdiction must be a string');
    }
  }
}
