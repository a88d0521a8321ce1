import { Redis, type RedisOptions } from 'ioredis'
import { loggers } from './logger.js'

const log = loggers.redis

// Support REDIS_URL (hosted) or individual HOST/PORT/PASSWORD (local dev)
const redisUrl = process.env.REDIS_URL
const redisHost = process.env.REDIS_HOST || 'localhost'
const redisPort = parseInt(process.env.REDIS_PORT || '6379', 10)
const redisPassword = process.env.REDIS_PASSWORD || undefined

// Never log the password embedded in a URL
const redisLogInfo = redisUrl ? redisUrl.replace(/\/\/:[^@]+@/, '//***@') : `${redisHost}:${redisPort}`

let lastCircuitBreakerLog = 0

const baseOptions: RedisOptions = {
  // Fail commands instead of queueing forever: an unreachable store must
  // surface as StoreUnavailableError at run start
  maxRetriesPerRequest: 3,
  keepAlive: 10000,
  connectTimeout: 10000,
  commandTimeout: 30000,
  enableOfflineQueue: true,
  // Connect on first command
  lazyConnect: true,
  retryStrategy(times: number) {
    if (times > 20) {
      const now = Date.now()
      // Log once per minute during a prolonged outage
      if (now - lastCircuitBreakerLog > 60000) {
        lastCircuitBreakerLog = now
        log.error('Redis circuit breaker: prolonged outage', {
          attempts: times,
          connection: redisLogInfo,
        })
      }
      return 30000
    }

    const delay = Math.min(times * 500, 30000)
    log.info('Reconnecting', { attempt: times, delayMs: delay })
    return delay
  },
}

// URL mode passes the URL separately to the constructor
export const redisConnection: RedisOptions = redisUrl
  ? { ...baseOptions }
  : { ...baseOptions, host: redisHost, port: redisPort, password: redisPassword }

export function createRedisClient(): Redis {
  const client = redisUrl ? new Redis(redisUrl, redisConnection) : new Redis(redisConnection)
  client.on('error', (error: Error) => {
    log.warn('Redis connection error', { connection: redisLogInfo, error: error.message })
  })
  return client
}
