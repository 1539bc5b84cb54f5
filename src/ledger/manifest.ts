import type { ManifestEntry } from '../types/index.js';
import { compareIds } from '../gates/rules.js';

export const MANIFEST_FILE = 'MANIFEST.sha256';
export const SIGNATURE_FILE = 'MANIFEST.sig';
export const META_FILE = 'bundle.json';

/** One "<hexdigest>  <path>" line per entry, sorted by path (sha256sum layout). */
export function formatManifest(entries: readonly ManifestEntry[]): string {
  return [...entries]
    .sort((a, b) => compareIds(a.path, b.path))
    .map((entry) => `${entry.digest}  ${entry.path}\n`)
    .join('');
}

export function parseManifest(text: string): { entries: ManifestEntry[]; errors: string[] } {
  const entries: ManifestEntry[] = [];
  const errors: string[] = [];

  text.split('\n').forEach((line, index) => {
    if (line.trim() === '') return;
    const match = /^([0-9a-f]{64})\s+\*?(\S.*)$/.exec(line);
    if (!match) {
      errors.push(`Manifest line ${index + 1} is malformed`);
      return;
    }
    entries.push({ digest: match[1], path: match[2] });
  });

  return { entries, errors };
}

// Manifest paths must stay inside the bundle directory.
export function isSafeBundlePath(path: string): boolean {
  if (path.startsWith('/') || path.includes('\\') || /^[A-Za-z]:/.test(path)) return false;
  return path.split('/').every((segment) => segment !== '' && segment !== '.' && segment !== '..');
}
