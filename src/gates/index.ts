export { PolicyEngine } from './engine.js';
export { aggregateRisk, clamp01, round6 } from './aggregate.js';
export { createJurisdictionResolver, type JurisdictionResolver } from './jurisdiction.js';
export { compilePredicate, matchPredicate, type CompiledPredicate, type PredicateEnv } from './predicates.js';
export {
  parseRuleSet,
  compileRuleSet,
  compareIds,
  ruleSetSchema,
  type CompiledRule,
  type CompiledRuleSet
} from './rules.js';
