import { ImageError, isImageError } from '../errors.js';
import {
  OutputFormat,
  ResolveOutcome,
  TransformContext,
  TransformRequest,
  isOutputFormat,
  isSupportedMime,
  isTransformMode,
} from '../types.js';
import { CacheStore } from '../storage/cache-store.js';
import { CachePath, buildCachePath, ensureCacheDirs, parseSourcePath, publicPathOf } from '../storage/cache-path.js';
import { KeyedLock } from '../utils/keyed-lock.js';
import { logger, errorMessage } from '../utils/logger.js';

import { probeImage } from './decode.js';
import { computeTransform } from './geometry.js';
import { correctOrientation, orientationTransform } from './orientation.js';
import { carriesAlpha, encodeFormatOf, normalizeFormat, renderDerivative } from './codec.js';

export interface PipelineDeps {
  store: CacheStore;
  publicRoot: string;
  errorImage: string;
  // Write orientation-corrected JPEGs back over their source
  persistOrientedSource: boolean;
  lock: KeyedLock;
}

export interface ResolveInput {
  sourcePath: string;
  width: number;
  height: number;
  mode: string;
  quality?: number;
  format?: string | null;
}

type ResolveState = { kind: 'attempting'; context: TransformContext } | { kind: 'failed' };

type AttemptResult = { ok: true; path: string } | { ok: false; error: string };

/**
 * Check the caller's arguments. A bad size, mode or quality is a programming
 * error and throws; it is never answered with the error image.
 */
export function createRequest(input: ResolveInput, defaultQuality: number): TransformRequest {
  const { width, height, mode } = input;
  const quality = input.quality ?? defaultQuality;

  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new ImageError('invalid_request', `Invalid dimensions: ${width}x${height}`);
  }
  if (!isTransformMode(mode)) {
    throw new ImageError('invalid_request', `Invalid mode: ${mode}`);
  }
  if (!Number.isInteger(quality) || quality < 0 || quality > 100) {
    throw new ImageError('invalid_request', `Invalid quality: ${quality}`);
  }

  return {
    sourcePath: input.sourcePath,
    width,
    height,
    mode,
    quality,
    format: input.format ? input.format.toLowerCase() : null,
  };
}

/**
 * Return the public path of the derivative for `request`, generating it on a
 * cache miss. Recoverable failures are collected in `errors` and answered
 * once with the configured error image; when that is missing or fails too
 * the path is null.
 */
export async function resolveDerivative(request: TransformRequest, deps: PipelineDeps): Promise<ResolveOutcome> {
  const errors: string[] = [];
  let state: ResolveState = { kind: 'attempting', context: { ...request, stage: 'original' } };

  while (state.kind === 'attempting') {
    const { context } = state;
    const attempt = await attemptTransform(context, deps);

    if (attempt.ok) {
      return { path: attempt.path, errors };
    }

    errors.push(attempt.error);
    state = await fallbackState(context, deps, errors);
  }

  return { path: null, errors };
}

async function fallbackState(context: TransformContext, deps: PipelineDeps, errors: string[]): Promise<ResolveState> {
  if (context.stage === 'fallback') {
    logger.error('Error image could not be used', { errorImage: deps.errorImage, errors });
    return { kind: 'failed' };
  }

  if (!(await deps.store.exists(deps.errorImage))) {
    errors.push('Error image not found.');
    logger.error('Error image not found', { errorImage: deps.errorImage });
    return { kind: 'failed' };
  }

  logger.warn('Falling back to error image', { sourcePath: context.sourcePath, error: errors[errors.length - 1] });

  return {
    kind: 'attempting',
    context: { ...context, sourcePath: deps.errorImage, format: null, stage: 'fallback' },
  };
}

async function attemptTransform(context: TransformContext, deps: PipelineDeps): Promise<AttemptResult> {
  try {
    const kind = context.sourcePath ? await deps.store.stat(context.sourcePath) : null;
    if (kind !== 'file') {
      throw new ImageError('invalid_input', `Image not found: ${context.sourcePath || '(empty path)'}`);
    }

    const format = parseOutputFormat(context.format);

    // Vector images are the same at every size
    const source = parseSourcePath(context.sourcePath, deps.publicRoot);
    if (source.extension === 'svg') {
      return { ok: true, path: publicPathOf(source.urlBase, source.filename) };
    }

    const cachePath = buildCachePath({ ...context, format }, deps.publicRoot);
    await ensureCacheDirs(deps.store, cachePath);

    const path = await deps.lock.run(cachePath.absolutePath, () => populate(context, cachePath, format, deps));
    return { ok: true, path };
  } catch (error) {
    if (isImageError(error) && error.recoverable) {
      logger.warn('Derivative attempt failed', {
        sourcePath: context.sourcePath,
        stage: context.stage,
        kind: error.kind,
        error: error.message,
      });
      return { ok: false, error: error.message };
    }
    throw error;
  }
}

function parseOutputFormat(format: string | null): OutputFormat | null {
  if (format === null) return null;
  if (!isOutputFormat(format)) {
    throw new ImageError('unsupported_format', `${format} images are not supported`);
  }
  return format;
}

async function populate(
  context: TransformContext,
  cachePath: CachePath,
  format: OutputFormat | null,
  deps: PipelineDeps
): Promise<string> {
  const { store } = deps;

  // File already there so don't bother creating it
  if (await store.exists(cachePath.absolutePath)) {
    logger.debug('Cache hit', { path: cachePath.publicPath });
    return cachePath.publicPath;
  }

  let buffer = await readSource(store, context.sourcePath);

  const probe = await probeImage(buffer);
  if (!probe.ok) {
    throw new ImageError(probe.kind, probe.error);
  }

  const { metadata } = probe;
  const sourceFormat = encodeFormatOf(metadata.format);
  if (!isSupportedMime(metadata.mime) || !sourceFormat) {
    throw new ImageError('unsupported_format', `${metadata.mime} images are not supported`);
  }

  let { width, height } = metadata;

  if (metadata.mime === 'image/jpeg') {
    const transform = orientationTransform(metadata.orientation);
    if (transform) {
      const oriented = await correctOrientation(buffer, transform, context.quality);
      buffer = oriented.buffer;
      width = oriented.width;
      height = oriented.height;

      const persisted = deps.persistOrientedSource && (await persistSource(store, context.sourcePath, buffer));

      logger.info('Corrected image orientation', {
        sourcePath: context.sourcePath,
        orientation: metadata.orientation,
        persisted,
      });
    }
  }

  const spec = computeTransform(width, height, context.width, context.height, context.mode);

  const rendered = await renderDerivative(buffer, spec, {
    format: format ? normalizeFormat(format) : sourceFormat,
    quality: context.quality,
    preserveAlpha: carriesAlpha(metadata.format),
  });

  try {
    await store.write(cachePath.absolutePath, rendered.buffer);
  } catch (error) {
    throw new ImageError('encode_failure', `Could not write derivative: ${errorMessage(error)}`, { cause: error });
  }

  logger.info('Generated derivative', {
    sourcePath: context.sourcePath,
    path: cachePath.publicPath,
    mode: context.mode,
    width: rendered.width,
    height: rendered.height,
    bytes: rendered.buffer.length,
  });

  return cachePath.publicPath;
}

// The derivative is still built from the corrected pixels when the source can't be rewritten
async function persistSource(store: CacheStore, sourcePath: string, buffer: Buffer): Promise<boolean> {
  try {
    await store.write(sourcePath, buffer);
    return true;
  } catch (error) {
    logger.warn('Could not rewrite oriented source', { sourcePath, error: errorMessage(error) });
    return false;
  }
}

async function readSource(store: CacheStore, sourcePath: string): Promise<Buffer> {
  try {
    return await store.read(sourcePath);
  } catch (error) {
    throw new ImageError('invalid_input', `Image could not be read: ${sourcePath}`, { cause: error });
  }
}
