export { MoralIntegrityLedger, recordFileName, CHAIN_FILE, RECORDS_DIR, type LedgerOptions, type LedgerRange } from './ledger.js';
export { exportBundle, bundleStamp, type ExportOptions, type ExportedBundle } from './bundle.js';
export { verifyBundle, type CustodyVerifyOptions } from './verifier.js';
export { formatManifest, parseManifest, MANIFEST_FILE, SIGNATURE_FILE, META_FILE } from './manifest.js';
export { BundleScheduler, type BundleSchedulerOptions } from './scheduler.js';
