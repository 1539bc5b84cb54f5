import Anthropic from '@anthropic-ai/sdk';
import { GenerationError } from '../errors.js';

export interface InferenceBackend {
  name: string;
  type: 'anthropic' | 'ollama';
  model: string;
  baseUrl?: string;
  systemPrompt?: string;
}

export interface GenerateOptions {
  signal: AbortSignal;
  maxTokens?: number;
}

/** The one generation backend the gateway talks to. */
export interface TextGenerator {
  readonly name: string;
  generate(prompt: string, options: GenerateOptions): Promise<string>;
}

const DEFAULT_SYSTEM_PROMPT = 'You are a careful, kind assistant. Keep answers age-appropriate and non-graphic.';

export class InferenceRouter implements TextGenerator {
  private readonly backend: InferenceBackend;
  private readonly anthropic?: Anthropic;

  constructor(backend: InferenceBackend) {
    this.backend = backend;
    if (backend.type === 'anthropic') {
      this.anthropic = new Anthropic();
    }
  }

  get name(): string {
    return `${this.backend.name}:${this.backend.model}`;
  }

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    switch (this.backend.type) {
      case 'anthropic':
        return this.generateAnthropic(prompt, options);
      case 'ollama':
        return this.generateOllama(prompt, options);
    }
  }

  private async generateAnthropic(prompt: string, options: GenerateOptions): Promise<string> {
    if (!this.anthropic) {
      throw new GenerationError('Anthropic client not initialized');
    }

    const response = await this.anthropic.messages.create(
      {
        model: this.backend.model,
        max_tokens: options.maxTokens ?? 1024,
        system: this.backend.systemPrompt ?? DEFAULT_SYSTEM_PROMPT,
        messages: [{ role: 'user', content: prompt }]
      },
      { signal: options.signal }
    );

    return response.content
      .flatMap((block) => (block.type === 'text' ? [block.text] : []))
      .join('\n')
      .trim();
  }

  private async generateOllama(prompt: string, options: GenerateOptions): Promise<string> {
    const baseUrl = this.backend.baseUrl ?? 'http://127.0.0.1:11434';

    const response = await fetch(`${baseUrl}/api/generate`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: this.backend.model,
        prompt,
        system: this.backend.systemPrompt ?? DEFAULT_SYSTEM_PROMPT,
        stream: false,
        options: { num_predict: options.maxTokens ?? 256 }
      }),
      signal: options.signal
    });

    if (!response.ok) {
      throw new GenerationError(`Ollama error: ${response.status}`, { status: response.status });
    }

    const data: unknown = await response.json();
    if (typeof data !== 'object' || data === null || !('response' in data) || typeof data.response !== 'string') {
      throw new GenerationError('Ollama returned an unexpected payload');
    }
    return data.response.trim();
  }
}
