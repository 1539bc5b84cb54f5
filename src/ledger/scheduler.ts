import type { Logger } from 'pino';
import type { KeyPair } from '../crypto/index.js';
import { exportBundle, type ExportedBundle } from './bundle.js';
import type { MoralIntegrityLedger } from './ledger.js';

export interface BundleSchedulerOptions {
  ledger: MoralIntegrityLedger;
  outDir: string;
  intervalMs: number;
  keyPair: KeyPair | null;
  logger: Logger;
}

// Periodic custody snapshots of the whole ledger
export class BundleScheduler {
  private readonly options: BundleSchedulerOptions;
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private exportedSize = -1;

  constructor(options: BundleSchedulerOptions) {
    this.options = options;
  }

  start(): void {
    if (this.timer || this.options.intervalMs <= 0) return;
    this.timer = setInterval(() => {
      this.runOnce().catch((error: unknown) => {
        this.options.logger.error({ error }, 'Scheduled bundle export failed');
      });
    }, this.options.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** Exports a bundle unless nothing was appended since the previous one. */
  async runOnce(): Promise<ExportedBundle | null> {
    const { ledger, outDir, keyPair, logger } = this.options;
    if (this.running || ledger.size() === this.exportedSize) return null;

    this.running = true;
    try {
      const size = ledger.size();
      const bundle = await exportBundle(ledger, { outDir, keyPair, range: { to: size } });
      this.exportedSize = size;
      logger.info({ bundle: bundle.path, records: bundle.meta.record_count, signed: bundle.signed }, 'Bundle exported');
      return bundle;
    } finally {
      this.running = false;
    }
  }
}
