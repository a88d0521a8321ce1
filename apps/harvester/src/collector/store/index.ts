import type { ILogger } from '@boardwatch/logger'
import { createRedisClient } from '../../config/redis.js'
import type { StoreSettings } from '../../config/settings.js'
import type { FingerprintStore } from '../types.js'
import { FileFingerprintStore } from './file-store.js'
import { RedisFingerprintStore, type FingerprintRedisClient } from './redis-store.js'

export { FileFingerprintStore, parseFingerprintLog } from './file-store.js'
export type { FileFingerprintStoreOptions, ParsedFingerprintLog } from './file-store.js'
export { RedisFingerprintStore, DEFAULT_FINGERPRINT_NAMESPACE } from './redis-store.js'
export type { FingerprintRedisClient, RedisFingerprintStoreOptions } from './redis-store.js'

export interface OpenStoreOptions {
  logger?: ILogger
  /** Client for the redis backend; one is created (and owned) when omitted */
  redisClient?: FingerprintRedisClient
}

/**
 * Open the configured fingerprint backend.
 * @throws StoreUnavailableError when the backend cannot be loaded
 */
export async function openFingerprintStore(
  settings: StoreSettings,
  options: OpenStoreOptions = {}
): Promise<FingerprintStore> {
  if (settings.backend === 'redis') {
    return RedisFingerprintStore.open({
      client: options.redisClient ?? createRedisClient(),
      namespace: settings.redisNamespace,
      ownsClient: options.redisClient === undefined,
      logger: options.logger,
    })
  }

  return FileFingerprintStore.open({ path: settings.path, logger: options.logger })
}
