import { createHash, createPrivateKey, createPublicKey, generateKeyPairSync, sign, verify } from 'crypto';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { ConfigError } from '../errors.js';

/** PEM-encoded Ed25519 pair used to sign bundle manifests. */
export interface KeyPair {
  privateKey: string;
  publicKey: string;
}

export interface KeyFiles {
  privateKey: string;
  publicKey: string;
}

export function keyFiles(keyDir: string): KeyFiles {
  return { privateKey: join(keyDir, 'guardian.key'), publicKey: join(keyDir, 'guardian.pub') };
}

export function generateKeyPair(): KeyPair {
  return generateKeyPairSync('ed25519', {
    privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
    publicKeyEncoding: { type: 'spki', format: 'pem' }
  });
}

/** Short hex id of a public key, derived from its DER encoding. */
export function keyFingerprint(publicKey: string): string {
  const der = createPublicKey(publicKey).export({ type: 'spki', format: 'der' });
  return createHash('sha256').update(der).digest('hex').slice(0, 16);
}

/**
 * Writes both key files. Existing files are never replaced: the `wx` flag
 * fails the write and the caller gets a ConfigError naming the directory.
 */
export function saveKeyPair(keyDir: string, keyPair: KeyPair): KeyFiles {
  const files = keyFiles(keyDir);
  mkdirSync(keyDir, { recursive: true, mode: 0o700 });
  if (existsSync(files.privateKey) || existsSync(files.publicKey)) {
    throw new ConfigError(`Signing keys already exist in ${keyDir}`, { key_dir: keyDir });
  }
  writeFileSync(files.privateKey, keyPair.privateKey, { mode: 0o600, flag: 'wx' });
  writeFileSync(files.publicKey, keyPair.publicKey, { mode: 0o644, flag: 'wx' });
  return files;
}

/**
 * Reads the signing pair from `keyDir`. Returns null when neither file
 * exists; a lone file or a public key that does not belong to the private
 * key is a configuration error.
 */
export function loadKeyPair(keyDir: string): KeyPair | null {
  const files = keyFiles(keyDir);
  const hasPrivate = existsSync(files.privateKey);
  const hasPublic = existsSync(files.publicKey);
  if (!hasPrivate && !hasPublic) return null;
  if (!hasPrivate || !hasPublic) {
    throw new ConfigError(`Incomplete signing key pair in ${keyDir}`, {
      missing: hasPrivate ? files.publicKey : files.privateKey
    });
  }

  const keyPair: KeyPair = {
    privateKey: readFileSync(files.privateKey, 'utf-8'),
    publicKey: readFileSync(files.publicKey, 'utf-8')
  };
  const derived = createPublicKey(createPrivateKey(keyPair.privateKey)).export({ type: 'spki', format: 'pem' });
  if (keyFingerprint(derived.toString()) !== keyFingerprint(keyPair.publicKey)) {
    throw new ConfigError(`Public key in ${keyDir} does not match the private key`, { key_dir: keyDir });
  }
  return keyPair;
}

export function signData(data: string | Buffer, privateKey: string): string {
  const payload = typeof data === 'string' ? Buffer.from(data) : data;
  return sign(null, payload, privateKey).toString('base64');
}

export function verifySignature(data: string | Buffer, signature: string, publicKey: string): boolean {
  const payload = typeof data === 'string' ? Buffer.from(data) : data;
  try {
    return verify(null, payload, publicKey, Buffer.from(signature.trim(), 'base64'));
  } catch {
    // malformed key or signature encoding counts as a failed verification
    return false;
  }
}
