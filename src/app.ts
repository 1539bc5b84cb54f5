import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import type { Logger } from 'pino';
import { z } from 'zod';

import type { ErrorResponse } from './types/index.js';
import type { GuardianConfig } from './config.js';
import { GenerationError, IntegrityError, ValidationError, isGuardianError } from './errors.js';
import type { KeyPair } from './crypto/index.js';
import type { Guardian } from './gateway/guardian.js';
import { exportBundle, type MoralIntegrityLedger } from './ledger/index.js';

export const VERSION = '1.0.0';

// Reachable without an API key
const OPEN_ROUTES = new Set(['/ping', '/health']);

const contextSchema = z.record(z.unknown());

const promptBodySchema = z.object({
  prompt: z.string({ required_error: 'prompt is required' }),
  context: contextSchema.optional(),
  jurisdiction: z.string().optional(),
  request_id: z.string().min(1).max(128).optional()
});

// `meta` is accepted as an alias for `context` on /verify
const verifyBodySchema = z.object({
  output: z.string({ required_error: 'output is required' }),
  context: contextSchema.optional(),
  meta: contextSchema.optional(),
  jurisdiction: z.string().optional(),
  request_id: z.string().min(1).max(128).optional()
});

function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    throw new ValidationError(`Invalid request body: ${issues.join('; ')}`);
  }
  return parsed.data;
}

// 'http://localhost:*' style entries match any port
function originMatcher(origin: string): string | RegExp {
  if (!origin.includes('*')) return origin;
  const escaped = origin.split('*').map((part) => part.replace(/[.+?^${}()|[\]\\/]/g, '\\$&'));
  return new RegExp(`^${escaped.join('[^/]*')}$`);
}

export interface AppOptions {
  guardian: Guardian;
  ledger: MoralIntegrityLedger;
  config: GuardianConfig;
  logger: Logger;
  backend: string;
  keyPair: KeyPair | null;
  /** Called after an integrity failure has been answered; the process should stop. */
  onFatal?: (error: IntegrityError) => void;
}

export async function buildApp(options: AppOptions): Promise<FastifyInstance> {
  const { guardian, ledger, config, logger } = options;
  const apiKeys = new Set(config.auth.api_keys);

  const app = Fastify({ logger: false });

  await app.register(cors, {
    origin: config.auth.allowed_origins.map(originMatcher),
    credentials: true
  });

  await app.register(rateLimit, {
    max: config.rate_limits.requests_per_minute,
    timeWindow: '1 minute'
  });

  if (apiKeys.size > 0) {
    app.addHook('onRequest', async (request, reply) => {
      if (request.routeOptions.url && OPEN_ROUTES.has(request.routeOptions.url)) return;
      const apiKey = request.headers.authorization?.replace(/^Bearer\s+/i, '');
      if (!apiKey || !apiKeys.has(apiKey)) {
        const body: ErrorResponse = { error_code: 'UNAUTHORIZED', message: 'Missing or invalid API key' };
        return reply.code(401).send(body);
      }
    });
  }

  app.setErrorHandler((error, request, reply) => {
    let status: number;
    let body: ErrorResponse;

    if (isGuardianError(error)) {
      status = error instanceof ValidationError ? 400 : error instanceof GenerationError ? 502 : 500;
      body = { error_code: error.code, message: error.message, ...(error.details ? { details: error.details } : {}) };
    } else {
      status = error.statusCode ?? 500;
      body = { error_code: error.code ?? (status === 429 ? 'RATE_LIMITED' : 'REQUEST_FAILED'), message: status >= 500 ? 'Internal error' : error.message };
    }

    if (status >= 500) {
      logger.error({ error, url: request.url }, 'Request failed');
    } else {
      logger.warn({ error_code: body.error_code, message: error.message, url: request.url }, 'Request rejected');
    }

    void reply.code(status).send(body);

    if (error instanceof IntegrityError) {
      options.onFatal?.(error);
    }
  });

  app.get('/ping', async () => ({ status: 'ok' }));

  app.get('/health', async () => {
    const verification = ledger.verify();
    return {
      status: ledger.isHalted() ? 'halted' : 'healthy',
      version: VERSION,
      backend: options.backend,
      ledger: {
        records: ledger.size(),
        head: ledger.head(),
        valid: verification.valid
      }
    };
  });

  app.post('/check', async (request) => {
    return guardian.check(parseBody(promptBodySchema, request.body));
  });

  app.post('/answer', async (request) => {
    return guardian.answer(parseBody(promptBodySchema, request.body));
  });

  app.post('/verify', async (request) => {
    const { meta, context, ...rest } = parseBody(verifyBodySchema, request.body);
    return guardian.verify({ ...rest, context: context ?? meta });
  });

  app.post('/bundles', async (_request, reply) => {
    const bundle = await exportBundle(ledger, { outDir: config.ledger.bundle_dir, keyPair: options.keyPair });
    logger.info({ bundle: bundle.path, records: bundle.meta.record_count, signed: bundle.signed }, 'Bundle exported');
    reply.code(201);
    return {
      name: bundle.name,
      path: bundle.path,
      record_count: bundle.meta.record_count,
      head_hash: bundle.meta.head_hash,
      signed: bundle.signed
    };
  });

  return app;
}
