import Redis from 'ioredis'
import { getLogger } from '../lib/logger'

const redisUrl = process.env.REDIS_URL || 'redis://localhost:6379'

const redisOptions: {
  tls?: object
  enableReadyCheck: boolean
  maxRetriesPerRequest: number | null
} = {
  ...(redisUrl.startsWith('rediss://') ? { tls: {} } : {}),
  enableReadyCheck: false,
  maxRetriesPerRequest: null,
}

let redisConnectionLogged = false

/**
 * Redis client for Bull: self-hosted (redis://) or TLS (rediss://). Bull subscriber/bclient connections
 * need enableReadyCheck off and maxRetriesPerRequest null.
 */
export function createRedisClient(type: 'client' | 'subscriber' | 'bclient'): Redis {
  if (!redisConnectionLogged) {
    redisConnectionLogged = true
    getLogger('worker').info(
      { transport: redisUrl.startsWith('rediss://') ? 'tls' : 'tcp', connection: type },
      'redis connection for dubbing queue'
    )
  }
  return new Redis(redisUrl, redisOptions)
}
