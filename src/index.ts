import { Receiver } from '@upstash/qstash';
import path from 'path';
import { config, isWebhookEnabled, validateConfig } from './config.js';
import { createApp } from './app.js';
import { DerivativeService } from './service.js';
import { createCacheStore } from './storage/index.js';
import { logger } from './utils/logger.js';

// Validate config on startup
validateConfig();

const service = new DerivativeService({
  store: createCacheStore(),
  // Bucket keys carry no filesystem prefix to strip
  publicRoot: config.storageDriver === 'supabase' ? '' : config.publicRoot,
});

// QStash webhook receiver
const verifier = isWebhookEnabled()
  ? new Receiver({
      currentSigningKey: config.qstashCurrentSigningKey,
      nextSigningKey: config.qstashNextSigningKey,
    })
  : null;

if (!verifier) {
  logger.warn('QStash signing keys not configured, webhook disabled');
}

const app = createApp({
  service,
  serviceKey: config.serviceKey,
  verifier,
  // Bucket keys are relative to the bucket root
  sourcePathFor:
    config.storageDriver === 'supabase'
      ? requestPath => path.posix.normalize(`/${requestPath}`).slice(1)
      : undefined,
  serveStatic: config.storageDriver === 'fs',
});

// Start server
app.listen(config.port, () => {
  logger.info('Image derivative worker started', {
    port: config.port,
    storage: config.storageDriver,
    publicRoot: config.publicRoot,
    webhook: Boolean(verifier),
  });
});
