import { config } from './config.js';
import { CacheStore } from './storage/cache-store.js';
import { cascadeDelete } from './storage/cascade.js';
import { ResolveInput, createRequest, resolveDerivative } from './pipeline/index.js';
import { ResolveOutcome } from './types.js';
import { uniqueFilename } from './utils/filename.js';
import { KeyedLock } from './utils/keyed-lock.js';

export interface DerivativeServiceOptions {
  store: CacheStore;
  publicRoot?: string;
  errorImage?: string;
  defaultQuality?: number;
  persistOrientedSource?: boolean;
}

/**
 * Entry point for callers: resolve a derivative's public path, delete a
 * source with its derivatives, and read the messages the last operation
 * collected.
 */
export class DerivativeService {
  readonly store: CacheStore;
  readonly publicRoot: string;
  readonly errorImage: string;
  private readonly defaultQuality: number;
  private readonly persistOrientedSource: boolean;
  private readonly lock = new KeyedLock();
  private lastErrors: string[] = [];

  constructor(options: DerivativeServiceOptions) {
    this.store = options.store;
    this.publicRoot = options.publicRoot ?? config.publicRoot;
    this.errorImage = options.errorImage ?? config.errorImage;
    this.defaultQuality = options.defaultQuality ?? config.defaultQuality;
    this.persistOrientedSource = options.persistOrientedSource ?? config.persistOrientedSource;
  }

  /**
   * Public path of `sourcePath` at `width`×`height` in `mode`, or null when
   * neither the source nor the error image could be used. Check `errors()`
   * either way.
   */
  async resolve(
    sourcePath: string,
    width: number,
    height: number,
    mode: string,
    quality: number = this.defaultQuality,
    format: string | null = null
  ): Promise<string | null> {
    this.lastErrors = [];
    const outcome = await this.resolveOutcome({ sourcePath, width, height, mode, quality, format });
    this.lastErrors = outcome.errors;
    return outcome.path;
  }

  /**
   * Same as `resolve`, but hands back the messages with the path instead of
   * keeping them for `errors()`. Use this where calls overlap.
   */
  resolveOutcome(input: ResolveInput): Promise<ResolveOutcome> {
    const request = createRequest(input, this.defaultQuality);
    return resolveDerivative(request, {
      store: this.store,
      publicRoot: this.publicRoot,
      errorImage: this.errorImage,
      persistOrientedSource: this.persistOrientedSource,
      lock: this.lock,
    });
  }

  async delete(sourcePath: string): Promise<void> {
    this.lastErrors = [];
    await cascadeDelete(this.store, sourcePath);
  }

  /** Messages from the last operation; reading them clears the list. */
  errors(): string[] {
    const errors = this.lastErrors;
    this.lastErrors = [];
    return errors;
  }

  uniqueFilename(filename: string, destination: string): Promise<string> {
    return uniqueFilename(filename, destination, this.store);
  }
}
