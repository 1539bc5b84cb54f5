import pino from 'pino';

import { buildApp, VERSION } from './app.js';
import { engineSettings, loadConfig, loadRuleSet } from './config.js';
import { keyFingerprint, loadKeyPair } from './crypto/index.js';
import { PolicyEngine } from './gates/index.js';
import { Guardian } from './gateway/guardian.js';
import { InferenceRouter } from './inference/index.js';
import { BundleScheduler, MoralIntegrityLedger } from './ledger/index.js';

async function main() {
  const config = loadConfig();

  const logger = pino({
    level: config.logging.level,
    ...(config.logging.pretty
      ? {
          transport: {
            target: 'pino-pretty',
            options: { colorize: true }
          }
        }
      : {})
  });

  logger.info({ version: VERSION }, 'Guardian starting...');

  // Initialize components
  const ruleSet = loadRuleSet(config);
  const engine = new PolicyEngine(ruleSet, engineSettings(config));
  logger.info({ rule_set: ruleSet.label, digest: ruleSet.digest, rules: ruleSet.rules.length }, 'Rule set loaded');

  const ledger = await MoralIntegrityLedger.open({ dir: config.ledger.dir, logger });
  const keyPair = loadKeyPair(config.ledger.key_dir);
  if (!keyPair) {
    logger.warn({ key_dir: config.ledger.key_dir }, 'No signing key found; bundles will be unsigned');
  } else {
    logger.info({ key_dir: config.ledger.key_dir, fingerprint: keyFingerprint(keyPair.publicKey) }, 'Signing key loaded');
  }

  const backend = config.generation.backend;
  const generator = new InferenceRouter({
    name: backend.name,
    type: backend.type,
    model: backend.model,
    baseUrl: backend.base_url,
    systemPrompt: backend.system_prompt
  });

  const guardian = new Guardian({
    engine,
    ledger,
    generator,
    indices: config.indices,
    generation: {
      timeoutMs: config.generation.timeout_ms,
      maxRetries: config.generation.max_retries,
      backoffMs: config.generation.retry_backoff_ms,
      maxTokens: config.generation.max_tokens
    },
    deferRetryAfterMs: config.defer.retry_after_ms,
    logger
  });

  const scheduler = new BundleScheduler({
    ledger,
    outDir: config.ledger.bundle_dir,
    intervalMs: config.bundles.interval_minutes * 60_000,
    keyPair,
    logger
  });

  let stopping = false;
  const shutdown = async (reason: string, exitCode: number) => {
    if (stopping) return;
    stopping = true;
    logger.info({ reason }, 'Guardian stopping');
    scheduler.stop();
    await app.close();
    process.exit(exitCode);
  };

  const app = await buildApp({
    guardian,
    ledger,
    config,
    logger,
    backend: generator.name,
    keyPair,
    onFatal: (error) => {
      logger.fatal({ error }, 'Ledger integrity lost; shutting down');
      shutdown('integrity failure', 1).catch(() => process.exit(1));
    }
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal, 0).catch(() => process.exit(1));
    });
  }

  // Start server
  await app.listen({ port: config.server.port, host: config.server.host });
  scheduler.start();
  logger.info(`Guardian listening on ${config.server.host}:${config.server.port}`);
}

main().catch((error: unknown) => {
  console.error('Guardian failed to start:', error instanceof Error ? error.message : error);
  process.exit(1);
});
