import { setTimeout as sleep } from 'timers/promises';
import type { Logger } from 'pino';
import { GenerationError, GenerationTimeoutError } from '../errors.js';
import type { TextGenerator } from './router.js';

export interface GenerationPolicy {
  timeoutMs: number;
  maxRetries: number;
  backoffMs: number;
  maxTokens?: number;
}

export interface GenerationResult {
  output: string;
  attempts: number;
}

class AttemptTimedOut extends Error {}

// One attempt, abandoned after timeoutMs even if the backend ignores the signal.
async function attempt(generator: TextGenerator, prompt: string, policy: GenerationPolicy): Promise<string> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new AttemptTimedOut());
      controller.abort();
    }, policy.timeoutMs);
  });

  let output: string;
  try {
    output = await Promise.race([
      generator.generate(prompt, { signal: controller.signal, maxTokens: policy.maxTokens }),
      timeout
    ]);
  } catch (error) {
    // A backend that honours the signal rejects with its own abort error.
    if (controller.signal.aborted) throw new AttemptTimedOut();
    throw error;
  } finally {
    clearTimeout(timer);
  }

  if (output.trim().length === 0) {
    throw new GenerationError('Generation backend returned an empty output');
  }
  return output;
}

/**
 * Calls the generator with a per-attempt timeout and at most
 * `maxRetries` further attempts, backing off `backoffMs * n` between them.
 *
 * @throws GenerationTimeoutError when the last attempt timed out
 * @throws GenerationError when the last attempt failed any other way
 */
export async function generateWithRetry(
  generator: TextGenerator,
  prompt: string,
  policy: GenerationPolicy,
  logger: Logger
): Promise<GenerationResult> {
  const attempts = policy.maxRetries + 1;
  let lastError: unknown;

  for (let n = 1; n <= attempts; n++) {
    try {
      const output = await attempt(generator, prompt, policy);
      return { output, attempts: n };
    } catch (error) {
      lastError = error;
      logger.warn(
        { backend: generator.name, attempt: n, timed_out: error instanceof AttemptTimedOut, error },
        'Generation attempt failed'
      );
      if (n < attempts && policy.backoffMs > 0) {
        await sleep(policy.backoffMs * n);
      }
    }
  }

  if (lastError instanceof AttemptTimedOut) {
    throw new GenerationTimeoutError(policy.timeoutMs, attempts);
  }
  throw new GenerationError(`Generation failed after ${attempts} attempt(s)`, {
    backend: generator.name,
    cause: lastError instanceof Error ? lastError.message : String(lastError)
  });
}
