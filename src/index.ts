export * from './types/index.js';
export * from './errors.js';
export { buildApp, VERSION, type AppOptions } from './app.js';
export { configSchema, parseConfig, loadConfig, loadRuleSet, engineSettings, type GuardianConfig } from './config.js';
export {
  canonicalJson,
  sha256,
  hashObject,
  computeRecordHash,
  HashChain,
  GENESIS_HASH,
  generateKeyPair,
  loadKeyPair,
  keyFiles,
  keyFingerprint,
  saveKeyPair,
  signData,
  verifySignature,
  type KeyPair
} from './crypto/index.js';
export * from './gates/index.js';
export * from './indices/index.js';
export * from './inference/index.js';
export * from './ledger/index.js';
export { Guardian, type GuardianDeps, type PromptInput, type OutputInput } from './gateway/guardian.js';
