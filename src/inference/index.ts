export { InferenceRouter, type InferenceBackend, type TextGenerator, type GenerateOptions } from './router.js';
export { generateWithRetry, type GenerationPolicy, type GenerationResult } from './retry.js';
