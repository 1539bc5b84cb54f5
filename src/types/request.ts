export type RequestContext = Record<string, unknown>;

export interface GuardianRequest {
  request_id: string;
  prompt: string;
  context: RequestContext;
  jurisdiction?: string;
  timestamp: string;
}

export interface VerifyRequest {
  request_id: string;
  output: string;
  context: RequestContext;
  jurisdiction?: string;
  timestamp: string;
}

// What the engine sees: the text under evaluation and its context.
export interface EvaluationInput {
  text: string;
  context: RequestContext;
  jurisdiction?: string;
}
