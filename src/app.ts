import express, { NextFunction, Request, Response } from 'express';
import path from 'path';
import { isImageError } from './errors.js';
import { DerivativeService } from './service.js';
import { DerivativeJob } from './types.js';
import { ResolveInput } from './pipeline/index.js';
import { logger, errorMessage } from './utils/logger.js';

/** Anything that can check a QStash signature, e.g. `@upstash/qstash`'s Receiver. */
export interface SignatureVerifier {
  verify(request: { signature: string; body: string }): Promise<boolean>;
}

export interface AppOptions {
  service: DerivativeService;
  serviceKey: string;
  verifier?: SignatureVerifier | null;
  // Map a path from a request body onto a store key
  sourcePathFor?: (requestPath: string) => string;
  serveStatic?: boolean;
}

type Parsed<T> = { ok: true; value: T } | { ok: false; error: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | null | undefined {
  if (value === undefined || value === null) return value;
  return typeof value === 'string' ? value : undefined;
}

function parseResolveBody(body: unknown): Parsed<Omit<ResolveInput, 'sourcePath'> & { path: string }> {
  if (!isRecord(body) || typeof body.path !== 'string' || !body.path) {
    return { ok: false, error: 'Missing path' };
  }

  const { width, height, mode } = body;
  if (typeof width !== 'number' || typeof height !== 'number') {
    return { ok: false, error: 'width and height must be numbers' };
  }
  if (typeof mode !== 'string') {
    return { ok: false, error: 'Missing mode' };
  }

  let quality: number | undefined;
  if (typeof body.quality === 'number') {
    quality = body.quality;
  } else if (body.quality !== undefined) {
    return { ok: false, error: 'quality must be a number' };
  }

  return {
    ok: true,
    value: { path: body.path, width, height, mode, quality, format: optionalString(body.format) },
  };
}

export function parseJob(body: unknown): Parsed<DerivativeJob> {
  if (!isRecord(body)) {
    return { ok: false, error: 'Invalid job payload' };
  }

  if (body.action === 'delete') {
    return typeof body.path === 'string' && body.path
      ? { ok: true, value: { action: 'delete', path: body.path } }
      : { ok: false, error: 'Missing path' };
  }

  if (body.action === 'resolve') {
    const parsed = parseResolveBody(body);
    return parsed.ok ? { ok: true, value: { action: 'resolve', ...parsed.value } } : parsed;
  }

  return { ok: false, error: `Unknown action: ${String(body.action)}` };
}

export function publicRootSourcePath(publicRoot: string): (requestPath: string) => string {
  // Normalizing against "/" first keeps ".." from climbing out of the root
  return requestPath => path.posix.join(publicRoot, path.posix.normalize(`/${requestPath}`));
}

function requireServiceKey(serviceKey: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    const authHeader = req.headers.authorization;
    if (!authHeader?.startsWith('Bearer ')) {
      res.status(401).json({ error: 'Missing authorization' });
      return;
    }

    if (authHeader.substring(7) !== serviceKey) {
      res.status(403).json({ error: 'Invalid token' });
      return;
    }

    next();
  };
}

function sendError(res: Response, error: unknown, context: string): void {
  const message = errorMessage(error);

  if (isImageError(error) && error.kind === 'invalid_request') {
    res.status(400).json({ error: message });
    return;
  }

  logger.error(context, { error: message });
  res.status(500).json({ error: message });
}

export function createApp(options: AppOptions): express.Express {
  const { service } = options;
  const sourcePathFor = options.sourcePathFor ?? publicRootSourcePath(service.publicRoot);

  async function runJob(job: DerivativeJob) {
    if (job.action === 'delete') {
      await service.delete(sourcePathFor(job.path));
      return { action: job.action, path: job.path };
    }

    const { path: requestPath, action, ...rest } = job;
    const outcome = await service.resolveOutcome({ ...rest, sourcePath: sourcePathFor(requestPath) });
    return { action, ...outcome };
  }

  const app = express();

  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  const authorize = requireServiceKey(options.serviceKey);

  app.post('/resolve', authorize, async (req, res) => {
    const startTime = Date.now();
    const parsed = parseResolveBody(req.body);

    if (!parsed.ok) {
      res.status(400).json({ error: parsed.error });
      return;
    }

    try {
      const { path: requestPath, ...rest } = parsed.value;
      const outcome = await service.resolveOutcome({ ...rest, sourcePath: sourcePathFor(requestPath) });

      logger.info('Resolve completed', {
        path: requestPath,
        result: outcome.path,
        errors: outcome.errors.length,
        elapsed: Date.now() - startTime,
      });

      res.status(outcome.path ? 200 : 422).json(outcome);
    } catch (error) {
      sendError(res, error, 'Resolve handler error');
    }
  });

  app.delete('/images', authorize, async (req, res) => {
    const body: unknown = req.body;
    if (!isRecord(body) || typeof body.path !== 'string' || !body.path) {
      res.status(400).json({ error: 'Missing path' });
      return;
    }

    try {
      await service.delete(sourcePathFor(body.path));
      res.status(204).end();
    } catch (error) {
      sendError(res, error, 'Delete handler error');
    }
  });

  const { verifier } = options;
  if (verifier) {
    app.post('/webhook/qstash', async (req, res) => {
      const signature = req.headers['upstash-signature'];
      if (!signature || typeof signature !== 'string') {
        logger.warn('Missing QStash signature');
        res.status(401).json({ error: 'Missing signature' });
        return;
      }

      let isValid = false;
      try {
        isValid = await verifier.verify({ signature, body: JSON.stringify(req.body) });
      } catch (error) {
        logger.warn('QStash signature rejected', { error: errorMessage(error) });
      }

      if (!isValid) {
        logger.warn('Invalid QStash signature');
        res.status(401).json({ error: 'Invalid signature' });
        return;
      }

      const parsed = parseJob(req.body);
      if (!parsed.ok) {
        logger.warn('Invalid job payload', { error: parsed.error });
        res.status(400).json({ error: parsed.error });
        return;
      }

      try {
        const result = await runJob(parsed.value);
        logger.info('Job completed', { action: parsed.value.action, path: parsed.value.path });
        res.json(result);
      } catch (error) {
        sendError(res, error, 'Webhook handler error');
      }
    });
  }

  if (options.serveStatic) {
    app.use(express.static(service.publicRoot));
  }

  return app;
}
