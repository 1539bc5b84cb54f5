import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { homedir } from 'os';
import type { CustodyReport } from '../types/index.js';
import { generateKeyPair, keyFiles, keyFingerprint, saveKeyPair } from '../crypto/index.js';
import { verifyBundle } from '../ledger/index.js';

export const DEFAULT_KEY_DIR = resolve(homedir(), '.guardian', 'keys');

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_USAGE = 2;

const USAGE = [
  'Usage:',
  '  guardian verify <bundle-dir> [--public-key <file>] [--json]',
  '  guardian keygen [key-dir]'
];

export function formatReport(report: CustodyReport): string[] {
  const lines = [`Bundle: ${report.bundle}`, '─'.repeat(40)];

  const failedFiles = report.per_file.filter((check) => !check.pass);
  lines.push(`Files:      ${report.per_file.length - failedFiles.length}/${report.per_file.length} match manifest`);
  for (const check of failedFiles) {
    lines.push(`  ✗ ${check.path}`);
  }

  lines.push(
    `Chain:      ${report.chain_valid ? 'valid' : `broken at record ${report.first_break ?? '?'}`}`,
    `Records:    ${report.actual_count} present, ${report.declared_count ?? 'unknown'} declared`,
    `Signature:  ${report.signature}`
  );

  if (report.notes.length > 0) {
    lines.push('', 'Notes:', ...report.notes.map((note) => `  - ${note}`));
  }

  lines.push('', report.final_pass ? '✓ PASS' : '✗ FAIL');
  return lines;
}

export async function verifyCommand(args: string[], io: CliIO): Promise<number> {
  let dir: string | undefined;
  let publicKeyPath: string | undefined;
  let json = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--json') {
      json = true;
    } else if (arg === '--public-key') {
      publicKeyPath = args[++i];
      if (!publicKeyPath) {
        io.err('--public-key needs a file');
        return EXIT_USAGE;
      }
    } else if (!dir && !arg.startsWith('--')) {
      dir = arg;
    } else {
      io.err(`Unexpected argument: ${arg}`);
      return EXIT_USAGE;
    }
  }

  if (!dir) {
    USAGE.forEach((line) => io.err(line));
    return EXIT_USAGE;
  }
  if (publicKeyPath && !existsSync(publicKeyPath)) {
    io.err(`Public key not found: ${publicKeyPath}`);
    return EXIT_USAGE;
  }

  const publicKey = publicKeyPath ? readFileSync(publicKeyPath, 'utf-8') : undefined;
  const report = await verifyBundle(resolve(dir), { publicKey });

  if (json) {
    io.out(JSON.stringify(report, null, 2));
  } else {
    formatReport(report).forEach((line) => io.out(line));
  }
  return report.final_pass ? EXIT_OK : EXIT_FAILED;
}

export function keygenCommand(args: string[], io: CliIO): number {
  const keyDir = args[0] ?? DEFAULT_KEY_DIR;

  io.out('Guardian Key Generator');
  io.out('─'.repeat(40));
  io.out(`Key directory: ${keyDir}`);

  const files = keyFiles(keyDir);
  if (existsSync(files.privateKey) || existsSync(files.publicKey)) {
    io.err('Keys already exist at this location. Delete them first to regenerate.');
    return EXIT_FAILED;
  }

  const keyPair = generateKeyPair();
  saveKeyPair(keyDir, keyPair);

  io.out('✓ Ed25519 key pair written:');
  io.out(`  Private key: ${files.privateKey} (mode 600)`);
  io.out(`  Public key:  ${files.publicKey} (mode 644)`);
  io.out(`  Fingerprint: ${keyFingerprint(keyPair.publicKey)}`);
  io.out('Keep the private key out of version control; share the public key with bundle verifiers.');
  return EXIT_OK;
}

export async function runCli(argv: string[], io: CliIO): Promise<number> {
  const [command, ...rest] = argv;
  switch (command) {
    case 'verify':
      return verifyCommand(rest, io);
    case 'keygen':
      return keygenCommand(rest, io);
    default:
      USAGE.forEach((line) => io.err(line));
      return EXIT_USAGE;
  }
}
