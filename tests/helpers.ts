import { mkdtemp } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import pino from 'pino';
import type { DecisionEntry, EngineSettings, Rule, RuleSet, Verdict } from '../src/types/index.js';
import { sha256 } from '../src/crypto/index.js';
import { compileRuleSet, PolicyEngine } from '../src/gates/index.js';
import type { GenerateOptions, TextGenerator } from '../src/inference/index.js';

export const silentLogger = pino({ level: 'silent' });

export function tempDir(prefix = 'guardian-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export const TEST_SETTINGS: EngineSettings = {
  thresholds: { halt: 0.7, defer: 0.45 },
  jurisdiction: { default: 'UK', known: ['UK', 'EU', 'US', 'IE'], fallbacks: { IE: 'EU' } },
  audienceAmplification: { child: 0.5, adult: 0 },
  maxTextChars: 200,
  maxOutputChars: 400
};

export function rule(overrides: Partial<Rule> & Pick<Rule, 'id' | 'when'>): Rule {
  return {
    description: '',
    category: 'test',
    phases: ['pre'],
    severity: 0.1,
    jurisdictions: ['*'],
    hard_block: false,
    irreversible: false,
    ...overrides
  };
}

export const TEST_RULES: RuleSet = {
  name: 'test-rules',
  version: '1.0.0',
  rules: [
    rule({
      id: 'R-BLOCK',
      description: 'Explosives',
      category: 'violence',
      severity: 1,
      hard_block: true,
      when: { type: 'keyword', terms: ['bomb'] }
    }),
    rule({ id: 'R-LOW', severity: 0.2, when: { type: 'keyword', terms: ['dare'] } }),
    rule({ id: 'R-MID', severity: 0.3, when: { type: 'keyword', terms: ['secret'] } }),
    rule({ id: 'R-HIGH', severity: 0.6, when: { type: 'pattern', patterns: ['ignore\\s+rules'] } }),
    rule({
      id: 'R-EU',
      severity: 0.5,
      jurisdictions: ['EU'],
      when: { type: 'keyword', terms: ['profile'] }
    }),
    rule({
      id: 'P-IRREV',
      category: 'irreversible-action',
      phases: ['post'],
      severity: 0.2,
      irreversible: true,
      when: { type: 'keyword', terms: ['already sent'] }
    }),
    rule({
      id: 'P-GROOM',
      category: 'minor-safety',
      phases: ['post'],
      severity: 1,
      hard_block: true,
      when: { type: 'keyword', terms: ['keep this secret'] }
    })
  ]
};

export function testEngine(ruleSet: RuleSet = TEST_RULES, settings: EngineSettings = TEST_SETTINGS): PolicyEngine {
  return new PolicyEngine(compileRuleSet(ruleSet), settings);
}

export function passVerdict(): Verdict {
  return { status: 'pass', risk: 0, rationale: 'ok', fired: [], phase: 'pre', jurisdiction: 'UK' };
}

export function entry(n: number, overrides: Partial<DecisionEntry> = {}): DecisionEntry {
  return {
    kind: 'check',
    phase: 'pre',
    request_id: `req-${n}`,
    request_hash: sha256(`request ${n}`),
    subject_hash: null,
    verdict: passVerdict(),
    indices: { protection_index: 0.99 },
    rationale: 'ok',
    jurisdiction: 'UK',
    rule_set: 'test-rules@1.0.0',
    rule_set_digest: sha256('rules'),
    timestamp: '2026-10-18T09:30:00.000Z',
    ...overrides
  };
}

type StubStep = string | Error | 'hang';

/**
 * In-process generator. Each call consumes the next scripted step; the last
 * step repeats. 'hang' never answers and only settles when aborted.
 */
export class StubGenerator implements TextGenerator {
  readonly name = 'stub:test';
  readonly prompts: string[] = [];
  private readonly steps: StubStep[];

  constructor(steps: StubStep[]) {
    this.steps = steps;
  }

  get calls(): number {
    return this.prompts.length;
  }

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    const step = this.steps[Math.min(this.prompts.length, this.steps.length - 1)];
    this.prompts.push(prompt);
    if (step === 'hang') {
      return new Promise<string>((_, reject) => {
        options.signal.addEventListener('abort', () => reject(new Error('aborted')));
      });
    }
    if (step instanceof Error) throw step;
    return step;
  }
}
