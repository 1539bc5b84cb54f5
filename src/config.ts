import { readFileSync, existsSync } from 'fs';
import { resolve, join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { EngineSettings } from './types/index.js';
import { ConfigError } from './errors.js';
import { compileRuleSet, parseRuleSet, type CompiledRuleSet } from './gates/index.js';

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const backendSchema = z.object({
  name: z.string().min(1).default('local'),
  type: z.enum(['ollama', 'anthropic']).default('ollama'),
  model: z.string().min(1).default('mistral'),
  base_url: z.string().url().optional(),
  system_prompt: z.string().optional()
});

export const configSchema = z.object({
  server: z
    .object({
      port: z.number().int().min(0).max(65535).default(8089),
      host: z.string().default('127.0.0.1')
    })
    .default({}),
  auth: z
    .object({
      api_keys: z.array(z.string().min(1)).default([]),
      allowed_origins: z.array(z.string()).default(['http://localhost:*', 'http://127.0.0.1:*'])
    })
    .default({}),
  rate_limits: z
    .object({
      requests_per_minute: z.number().int().positive().default(120)
    })
    .default({}),
  limits: z
    .object({
      max_prompt_chars: z.number().int().positive().default(4000),
      max_output_chars: z.number().int().positive().default(20000)
    })
    .default({}),
  policy: z
    .object({
      rules_dir: z.string().default('./config/rules'),
      variant: z.string().regex(/^[\w.-]+$/, 'variant must be a plain file stem').default('default'),
      halt_threshold: z.number().min(0).max(1).default(0.7),
      defer_threshold: z.number().min(0).max(1).default(0.45),
      audience_amplification: z.record(z.number().min(0)).default({ child: 0.5, teen: 0.3, adult: 0 })
    })
    .default({}),
  jurisdiction: z
    .object({
      default: z.string().min(1).default('UK'),
      known: z.array(z.string().min(1)).default(['UK', 'EU', 'US']),
      fallbacks: z.record(z.string().min(1)).default({})
    })
    .default({}),
  indices: z
    .object({
      baseline: z.number().min(0).max(1).default(0.99),
      floor: z.number().min(0).max(1).default(0.01)
    })
    .default({}),
  generation: z
    .object({
      backend: backendSchema.default({}),
      timeout_ms: z.number().int().positive().default(120000),
      max_retries: z.number().int().min(0).max(5).default(1),
      retry_backoff_ms: z.number().int().min(0).default(500),
      max_tokens: z.number().int().positive().default(256)
    })
    .default({}),
  ledger: z
    .object({
      dir: z.string().default('./evidence/ledger'),
      bundle_dir: z.string().default('./evidence/bundles'),
      key_dir: z.string().default('~/.guardian/keys')
    })
    .default({}),
  bundles: z
    .object({
      interval_minutes: z.number().min(0).default(1440)
    })
    .default({}),
  defer: z
    .object({
      retry_after_ms: z.number().int().min(0).default(60000)
    })
    .default({}),
  logging: z
    .object({
      level: logLevelSchema.default('info'),
      pretty: z.boolean().default(false)
    })
    .default({})
});

export type GuardianConfig = z.infer<typeof configSchema>;

function expandHome(path: string): string {
  return path === '~' || path.startsWith('~/') ? join(homedir(), path.slice(1)) : path;
}

export function parseConfig(raw: unknown, source = 'configuration'): GuardianConfig {
  const parsed = configSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid ${source}: ${issues}`, { source });
  }

  const config = parsed.data;
  if (config.policy.defer_threshold > config.policy.halt_threshold) {
    throw new ConfigError('policy.defer_threshold must not exceed policy.halt_threshold');
  }
  if (process.env.GUARDIAN_API_KEY) {
    config.auth.api_keys = [...config.auth.api_keys, process.env.GUARDIAN_API_KEY];
  }
  const envLevel = logLevelSchema.safeParse(process.env.LOG_LEVEL);
  if (envLevel.success) {
    config.logging.level = envLevel.data;
  }
  config.ledger.key_dir = expandHome(config.ledger.key_dir);
  return config;
}

function readYaml(path: string): unknown {
  try {
    return parseYaml(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`, { path });
  }
}

export function loadConfig(explicitPath = process.env.GUARDIAN_CONFIG): GuardianConfig {
  if (explicitPath) {
    if (!existsSync(explicitPath)) {
      throw new ConfigError(`Configuration file not found: ${explicitPath}`, { path: explicitPath });
    }
    return parseConfig(readYaml(explicitPath), explicitPath);
  }

  const configPaths = [
    resolve(process.cwd(), 'guardian.yaml'),
    resolve(homedir(), '.guardian', 'config.yaml'),
    resolve(homedir(), '.config', 'guardian', 'config.yaml')
  ];

  for (const path of configPaths) {
    if (existsSync(path)) {
      return parseConfig(readYaml(path), path);
    }
  }

  // Defaults only
  return parseConfig({});
}

export function loadRuleSet(config: GuardianConfig): CompiledRuleSet {
  const path = resolve(config.policy.rules_dir, `${config.policy.variant}.yaml`);
  if (!existsSync(path)) {
    throw new ConfigError(`Rule set "${config.policy.variant}" not found at ${path}`, { path });
  }
  return compileRuleSet(parseRuleSet(readYaml(path), path));
}

export function engineSettings(config: GuardianConfig): EngineSettings {
  return {
    thresholds: { halt: config.policy.halt_threshold, defer: config.policy.defer_threshold },
    jurisdiction: config.jurisdiction,
    audienceAmplification: config.policy.audience_amplification,
    maxTextChars: config.limits.max_prompt_chars,
    maxOutputChars: config.limits.max_output_chars
  };
}
