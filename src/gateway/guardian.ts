import { v4 as uuidv4 } from 'uuid';
import type { Logger } from 'pino';
import type {
  AnswerResponse,
  CheckResponse,
  DecisionIndices,
  DecisionKind,
  GuardianRequest,
  RequestContext,
  Verdict,
  VerifyRequest,
  VerifyResponse
} from '../types/index.js';
import { GenerationError, GenerationTimeoutError, ValidationError } from '../errors.js';
import { hashObject, sha256 } from '../crypto/index.js';
import type { PolicyEngine } from '../gates/index.js';
import { moralHealthIndex, protectionIndex, type IndicesSettings } from '../indices/index.js';
import { generateWithRetry, type GenerationPolicy, type TextGenerator } from '../inference/index.js';
import type { MoralIntegrityLedger } from '../ledger/index.js';

export interface GuardianDeps {
  engine: PolicyEngine;
  ledger: MoralIntegrityLedger;
  generator: TextGenerator;
  indices: IndicesSettings;
  generation: GenerationPolicy;
  deferRetryAfterMs: number;
  logger: Logger;
  clock?: () => Date;
}

export interface PromptInput {
  prompt: string;
  context?: RequestContext;
  jurisdiction?: string;
  request_id?: string;
}

export interface OutputInput {
  output: string;
  context?: RequestContext;
  jurisdiction?: string;
  request_id?: string;
}

/**
 * Sequences pre-check, generation, post-check, indices and the ledger
 * append for one call. Keeps nothing between calls; the ledger is the only
 * shared state and it is owned by the caller.
 */
export class Guardian {
  private readonly deps: GuardianDeps;
  private readonly clock: () => Date;

  constructor(deps: GuardianDeps) {
    this.deps = deps;
    this.clock = deps.clock ?? (() => new Date());
  }

  async check(input: PromptInput): Promise<CheckResponse> {
    const request = this.toRequest(input);
    const verdict = this.deps.engine.evaluate(
      { text: request.prompt, context: request.context, jurisdiction: request.jurisdiction },
      'pre'
    );
    const protection = protectionIndex(verdict, this.deps.indices);
    const appended = await this.record('check', request.request_id, this.requestHash(request), null, verdict, {
      protection_index: protection
    });

    return {
      request_id: request.request_id,
      status: verdict.status,
      risk: verdict.risk,
      rationale: verdict.rationale,
      protection_index: protection,
      sequence: appended.sequence,
      record_hash: appended.record_hash
    };
  }

  async answer(input: PromptInput): Promise<AnswerResponse> {
    const request = this.toRequest(input);
    const requestHash = this.requestHash(request);
    const pre = this.deps.engine.evaluate(
      { text: request.prompt, context: request.context, jurisdiction: request.jurisdiction },
      'pre'
    );
    const preRecord = await this.record('answer', request.request_id, requestHash, null, pre, {
      protection_index: protectionIndex(pre, this.deps.indices)
    });

    if (pre.status !== 'pass') {
      return this.withheld(request.request_id, pre, preRecord.record_hash);
    }

    let output: string;
    try {
      ({ output } = await generateWithRetry(this.deps.generator, request.prompt, this.deps.generation, this.deps.logger));
    } catch (error) {
      if (error instanceof GenerationTimeoutError) {
        const deferred = this.generationVerdict(pre, `Guardian defer: ${error.message}; no output was produced`);
        const appended = await this.record('answer', request.request_id, requestHash, null, deferred, {});
        return this.withheld(request.request_id, deferred, appended.record_hash);
      }
      if (error instanceof GenerationError) {
        const failed = this.generationVerdict(pre, `Guardian defer: ${error.message}`);
        await this.record('answer', request.request_id, requestHash, null, failed, {});
      }
      throw error;
    }

    const post = this.postCheck(output, request.context, pre);
    const mhi = moralHealthIndex(post);
    const appended = await this.record('answer', request.request_id, requestHash, sha256(output), post, { mhi });
    const blocked = post.status !== 'pass' || post.reversible !== true;

    return {
      request_id: request.request_id,
      status: post.status,
      blocked,
      safe_output: blocked ? null : output,
      rationale: post.rationale,
      mhi,
      ...(post.status === 'defer' ? { retry_after_ms: this.deps.deferRetryAfterMs } : {}),
      record_hash: appended.record_hash
    };
  }

  async verify(input: OutputInput): Promise<VerifyResponse> {
    const request: VerifyRequest = {
      request_id: input.request_id ?? uuidv4(),
      output: input.output,
      context: input.context ?? {},
      jurisdiction: input.jurisdiction,
      timestamp: this.clock().toISOString()
    };
    const verdict = this.deps.engine.evaluate(
      { text: request.output, context: request.context, jurisdiction: request.jurisdiction },
      'post'
    );
    const mhi = moralHealthIndex(verdict);
    const hash = sha256(request.output);
    const appended = await this.record(
      'verify',
      request.request_id,
      hashObject({ output: request.output, context: request.context, jurisdiction: verdict.jurisdiction }),
      hash,
      verdict,
      { mhi }
    );

    return {
      request_id: request.request_id,
      status: verdict.status,
      reversible: verdict.reversible === true,
      blocked: verdict.status !== 'pass' || verdict.reversible !== true,
      rationale: verdict.rationale,
      mhi,
      hash,
      record_hash: appended.record_hash
    };
  }

  private toRequest(input: PromptInput): GuardianRequest {
    return {
      request_id: input.request_id ?? uuidv4(),
      prompt: input.prompt,
      context: input.context ?? {},
      jurisdiction: input.jurisdiction,
      timestamp: this.clock().toISOString()
    };
  }

  private requestHash(request: GuardianRequest): string {
    return hashObject({ prompt: request.prompt, context: request.context, jurisdiction: request.jurisdiction ?? null });
  }

  // Generated output that the engine cannot accept is held back, not delivered.
  private postCheck(output: string, context: RequestContext, pre: Verdict): Verdict {
    try {
      return this.deps.engine.evaluate({ text: output, context, jurisdiction: pre.jurisdiction }, 'post');
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      return Object.freeze({
        status: 'halt',
        risk: 1,
        rationale: `Guardian halt: generated output rejected (${error.message})`,
        fired: Object.freeze([]),
        phase: 'post',
        jurisdiction: pre.jurisdiction,
        reversible: true
      });
    }
  }

  private generationVerdict(pre: Verdict, rationale: string): Verdict {
    return Object.freeze({
      status: 'defer',
      risk: pre.risk,
      rationale,
      fired: Object.freeze([]),
      phase: 'post',
      jurisdiction: pre.jurisdiction,
      reversible: true
    });
  }

  private withheld(requestId: string, verdict: Verdict, recordHash: string): AnswerResponse {
    return {
      request_id: requestId,
      status: verdict.status,
      blocked: true,
      safe_output: null,
      rationale: verdict.rationale,
      mhi: null,
      ...(verdict.status === 'defer' ? { retry_after_ms: this.deps.deferRetryAfterMs } : {}),
      record_hash: recordHash
    };
  }

  private async record(
    kind: DecisionKind,
    requestId: string,
    requestHash: string,
    subjectHash: string | null,
    verdict: Verdict,
    indices: DecisionIndices
  ) {
    const { engine, ledger, logger } = this.deps;
    const appended = await ledger.append({
      kind,
      phase: verdict.phase,
      request_id: requestId,
      request_hash: requestHash,
      subject_hash: subjectHash,
      verdict,
      indices,
      rationale: verdict.rationale,
      jurisdiction: verdict.jurisdiction,
      rule_set: engine.rules.label,
      rule_set_digest: engine.rules.digest,
      timestamp: this.clock().toISOString()
    });

    logger.info(
      {
        request_id: requestId,
        kind,
        phase: verdict.phase,
        status: verdict.status,
        risk: verdict.risk,
        fired: verdict.fired,
        sequence: appended.sequence
      },
      'Decision recorded'
    );
    return appended;
  }
}
