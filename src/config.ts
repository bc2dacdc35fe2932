import 'dotenv/config';
import path from 'path';

export type StorageDriver = 'fs' | 'supabase';
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  return !['0', 'false', 'no', 'off'].includes(value.trim().toLowerCase());
}

function parseStorageDriver(value: string | undefined): StorageDriver {
  return value === 'supabase' ? 'supabase' : 'fs';
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const level = LOG_LEVELS.find(candidate => candidate === value?.trim().toLowerCase());
  return level ?? 'info';
}

const storageDriver = parseStorageDriver(process.env.STORAGE_DRIVER);
const publicRoot = path.resolve(process.env.PUBLIC_ROOT || path.join(process.cwd(), 'public'));
const defaultErrorImage = 'vendor/image-derivatives/error.jpg';

// Bucket keys stay relative; filesystem paths are made absolute
function resolveErrorImage(value: string | undefined): string {
  if (storageDriver === 'supabase') {
    return value || defaultErrorImage;
  }
  return value ? path.resolve(value) : path.join(publicRoot, defaultErrorImage);
}

export const config = {
  // Server
  port: parseInt(process.env.PORT || '3000', 10),
  serviceKey: process.env.SERVICE_KEY || '',

  // QStash
  qstashCurrentSigningKey: process.env.QSTASH_CURRENT_SIGNING_KEY || '',
  qstashNextSigningKey: process.env.QSTASH_NEXT_SIGNING_KEY || '',

  // Paths
  publicRoot,
  errorImage: resolveErrorImage(process.env.ERROR_IMAGE),

  // Processing
  defaultQuality: parseInt(process.env.DEFAULT_QUALITY || '90', 10),
  maxImagePixels: parseInt(process.env.MAX_IMAGE_PIXELS || '40000000', 10),
  persistOrientedSource: parseBoolean(process.env.PERSIST_ORIENTED_SOURCE, true),
  fileMode: 0o666,
  directoryMode: 0o777,

  // Storage
  storageDriver,
  supabaseUrl: process.env.SUPABASE_URL || '',
  supabaseServiceKey: process.env.SUPABASE_SERVICE_ROLE_KEY || '',
  derivativesBucket: process.env.DERIVATIVES_BUCKET || 'images',

  // Logging
  logLevel: parseLogLevel(process.env.LOG_LEVEL),
};

export function isWebhookEnabled(): boolean {
  return Boolean(config.qstashCurrentSigningKey && config.qstashNextSigningKey);
}

// Validate required config
export function validateConfig(): void {
  const required: Array<keyof typeof config> = ['serviceKey'];

  if (config.storageDriver === 'supabase') {
    required.push('supabaseUrl', 'supabaseServiceKey');
  }

  const missing = required.filter(key => !config[key]);

  if (missing.length > 0) {
    throw new Error(`Missing required config: ${missing.join(', ')}`);
  }

  if (!Number.isInteger(config.defaultQuality) || config.defaultQuality < 0 || config.defaultQuality > 100) {
    throw new Error(`DEFAULT_QUALITY must be an integer between 0 and 100, got ${config.defaultQuality}`);
  }
}
