import type { Predicate, RequestContext } from '../types/index.js';
import { ConfigError } from '../errors.js';

// Same shape as Predicate, with patterns compiled once at load time.
export type CompiledPredicate =
  | { type: 'keyword'; terms: string[] }
  | { type: 'pattern'; patterns: RegExp[] }
  | { type: 'context'; key: string; accepted: Array<string | number | boolean> }
  | { type: 'length_over'; chars: number }
  | { type: 'all'; of: CompiledPredicate[] }
  | { type: 'any'; of: CompiledPredicate[] }
  | { type: 'not'; predicate: CompiledPredicate };

export interface PredicateEnv {
  text: string;
  lowered: string;
  context: RequestContext;
}

// Stateful flags (g, y) would make RegExp.test depend on previous calls.
const ALLOWED_FLAGS = /^[imsu]*$/;

export function compilePredicate(predicate: Predicate, ruleId: string): CompiledPredicate {
  switch (predicate.type) {
    case 'keyword':
      return { type: 'keyword', terms: predicate.terms.map((term) => term.toLowerCase()) };

    case 'pattern': {
      const flags = predicate.flags ?? 'i';
      if (!ALLOWED_FLAGS.test(flags)) {
        throw new ConfigError(`Rule ${ruleId}: unsupported regex flags "${flags}"`, { rule: ruleId });
      }
      const patterns = predicate.patterns.map((source) => {
        try {
          return new RegExp(source, flags);
        } catch (error) {
          throw new ConfigError(`Rule ${ruleId}: invalid pattern ${JSON.stringify(source)}`, {
            rule: ruleId,
            cause: error instanceof Error ? error.message : String(error)
          });
        }
      });
      return { type: 'pattern', patterns };
    }

    case 'context': {
      const accepted = predicate.in ?? (predicate.equals !== undefined ? [predicate.equals] : []);
      if (accepted.length === 0) {
        throw new ConfigError(`Rule ${ruleId}: context predicate on "${predicate.key}" needs equals or in`, {
          rule: ruleId
        });
      }
      return { type: 'context', key: predicate.key, accepted };
    }

    case 'length_over':
      return { type: 'length_over', chars: predicate.chars };

    case 'all':
    case 'any':
      return { type: predicate.type, of: predicate.of.map((p) => compilePredicate(p, ruleId)) };

    case 'not':
      return { type: 'not', predicate: compilePredicate(predicate.predicate, ruleId) };
  }
}

export function matchPredicate(predicate: CompiledPredicate, env: PredicateEnv): boolean {
  switch (predicate.type) {
    case 'keyword':
      return predicate.terms.some((term) => env.lowered.includes(term));

    case 'pattern':
      return predicate.patterns.some((pattern) => pattern.test(env.text));

    case 'context': {
      if (!Object.prototype.hasOwnProperty.call(env.context, predicate.key)) return false;
      const value = env.context[predicate.key];
      return predicate.accepted.some((candidate) => candidate === value);
    }

    case 'length_over':
      return env.text.length > predicate.chars;

    case 'all':
      return predicate.of.every((p) => matchPredicate(p, env));

    case 'any':
      return predicate.of.some((p) => matchPredicate(p, env));

    case 'not':
      return !matchPredicate(predicate.predicate, env);
  }
}
