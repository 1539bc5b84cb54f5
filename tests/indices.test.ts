import { describe, it, expect } from 'vitest';
import type { Verdict } from '../src/types/index.js';
import { ValidationError } from '../src/errors.js';
import { DEFAULT_INDICES, moralHealthIndex, protectionIndex } from '../src/indices/index.js';

function verdict(overrides: Partial<Verdict>): Verdict {
  return { status: 'pass', risk: 0, rationale: 'r', fired: [], phase: 'pre', jurisdiction: 'UK', ...overrides };
}

describe('protectionIndex', () => {
  it('reports the baseline when nothing fired', () => {
    expect(protectionIndex(verdict({}))).toBe(0.99);
    expect(protectionIndex(verdict({}), { baseline: 0.9, floor: 0.01 })).toBe(0.9);
  });

  it('inverts the risk of fired rules', () => {
    expect(protectionIndex(verdict({ risk: 0.25, fired: ['A'] }))).toBe(0.75);
  });

  it('never scores a fired rule above a clean request', () => {
    expect(protectionIndex(verdict({ risk: 0.004, fired: ['A'] }))).toBe(0.99);
    expect(protectionIndex(verdict({ risk: 0, fired: ['A'] }))).toBe(0.99);
    expect(protectionIndex(verdict({ risk: 0.05, fired: ['A'] }))).toBe(0.95);
  });

  it('never drops below the floor', () => {
    expect(protectionIndex(verdict({ status: 'halt', risk: 1, fired: ['A'] }))).toBe(DEFAULT_INDICES.floor);
  });

  it('is only defined before generation', () => {
    expect(() => protectionIndex(verdict({ phase: 'post', reversible: true }))).toThrow(ValidationError);
  });
});

describe('moralHealthIndex', () => {
  it('is 1 - risk for reversible output', () => {
    expect(moralHealthIndex(verdict({ phase: 'post', reversible: true, risk: 0.3, fired: ['A'] }))).toBe(0.7);
    expect(moralHealthIndex(verdict({ phase: 'post', reversible: true }))).toBe(1);
  });

  it('is zero for output that cannot be withdrawn', () => {
    expect(moralHealthIndex(verdict({ phase: 'post', reversible: false, risk: 0.2 }))).toBe(0);
  });

  it('stays within [0, 1]', () => {
    for (const risk of [0, 0.123456789, 0.5, 1]) {
      const value = moralHealthIndex(verdict({ phase: 'post', reversible: true, risk }));
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThanOrEqual(1);
    }
  });

  it('is only defined after generation', () => {
    expect(() => moralHealthIndex(verdict({}))).toThrow(ValidationError);
  });
});
