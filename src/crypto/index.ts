export { canonicalJson } from './canonical.js';
export { sha256, hashObject, computeRecordHash, HashChain, GENESIS_HASH } from './hasher.js';
export {
  generateKeyPair,
  saveKeyPair,
  loadKeyPair,
  keyFiles,
  keyFingerprint,
  signData,
  verifySignature,
  type KeyPair,
  type KeyFiles
} from './signer.js';
