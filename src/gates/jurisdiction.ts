import type { JurisdictionSettings } from '../types/index.js';
import { ConfigError } from '../errors.js';

export interface JurisdictionResolver {
  resolve(tag?: string): { jurisdiction: string; chain: readonly string[] };
}

/**
 * Builds the lookup from configured jurisdiction tags to their fallback
 * chains. Every chain is computed up front, so a cycle or a fallback to an
 * unknown tag fails at startup instead of on the first request that hits it.
 */
export function createJurisdictionResolver(settings: JurisdictionSettings): JurisdictionResolver {
  const defaultTag = settings.default.toUpperCase();
  const fallbacks = new Map<string, string>();
  for (const [from, to] of Object.entries(settings.fallbacks)) {
    fallbacks.set(from.toUpperCase(), to.toUpperCase());
  }

  const known = new Set<string>([defaultTag, ...settings.known.map((tag) => tag.toUpperCase()), ...fallbacks.keys()]);

  for (const [from, to] of fallbacks) {
    if (!known.has(to)) {
      throw new ConfigError(`Jurisdiction ${from} falls back to unknown jurisdiction ${to}`, { from, to });
    }
  }

  const chains = new Map<string, readonly string[]>();
  for (const tag of [...known].sort()) {
    const chain: string[] = [];
    const visited = new Set<string>();
    let current: string | undefined = tag;
    while (current !== undefined) {
      if (visited.has(current)) {
        throw new ConfigError(`Cyclic jurisdiction fallback: ${[...chain, current].join(' -> ')}`, { chain });
      }
      visited.add(current);
      chain.push(current);
      current = fallbacks.get(current);
    }
    chains.set(tag, Object.freeze(chain));
  }

  return {
    resolve(tag?: string) {
      const normalized = tag?.trim().toUpperCase();
      const jurisdiction = normalized && chains.has(normalized) ? normalized : defaultTag;
      const chain = chains.get(jurisdiction) ?? [jurisdiction];
      return { jurisdiction, chain };
    }
  };
}
