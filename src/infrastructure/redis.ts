import Redis, { type RedisOptions } from 'ioredis';
import { config } from '../config/env';
import { logger } from './logger';

let sharedClient: Redis | null = null;
let bullMqClient: Redis | null = null;

function createRedisClient(options: RedisOptions = {}): Redis {
  const client = config.REDIS_URL
    ? new Redis(config.REDIS_URL, options)
    : new Redis({
        host: config.REDIS_HOST || 'localhost',
        port: config.REDIS_PORT || 6379,
        password: config.REDIS_PASSWORD,
        ...options,
      });

  client.on('error', (err) => {
    logger.warn({ event: 'redis.error', error: err.message }, 'Redis connection error');
  });
  return client;
}

/**
 * Shared client for readiness checks and cron locks.
 */
export function getRedisClient(): Redis {
  if (!sharedClient) {
    sharedClient = createRedisClient();
  }
  return sharedClient;
}

/**
 * Dedicated connection for the run queue.
 * BullMQ requires maxRetriesPerRequest=null.
 */
export function getBullMqRedisClient(): Redis {
  if (!bullMqClient) {
    bullMqClient = createRedisClient({ maxRetriesPerRequest: null });
  }
  return bullMqClient;
}

export async function pingWithTimeout(
  client: Redis,
  timeoutMs: number,
  retries: number,
): Promise<{ ok: boolean; error?: string }> {
  let lastErr: unknown;

  for (let attempt = 0; attempt <= retries; attempt += 1) {
    let timer: NodeJS.Timeout | undefined;
    try {
      const result = await Promise.race([
        client.ping(),
        new Promise<string>((_, reject) => {
          timer = setTimeout(() => reject(new Error(`redis ping timeout after ${timeoutMs}ms`)), timeoutMs);
        }),
      ]);

      if (result === 'PONG') return { ok: true };
      return { ok: false, error: `unexpected ping response: ${String(result)}` };
    } catch (e) {
      lastErr = e;
    } finally {
      clearTimeout(timer);
    }
  }

  return { ok: false, error: lastErr instanceof Error ? lastErr.message : String(lastErr) };
}

const RELEASE_LOCK_LUA = `
if redis.call("GET", KEYS[1]) == ARGV[1] then
  return redis.call("DEL", KEYS[1])
else
  return 0
end
`;

export async function acquireLock(params: { key: string; value: string; ttlMs: number; client?: Redis }): Promise<boolean> {
  const client = params.client ?? getRedisClient();
  const res = await client.set(params.key, params.value, 'PX', params.ttlMs, 'NX');
  return res === 'OK';
}

export async function releaseLock(params: { key: string; value: string; client?: Redis }): Promise<boolean> {
  const client = params.client ?? getRedisClient();
  const res = await client.eval(RELEASE_LOCK_LUA, 1, params.key, params.value);
  return Number(res) === 1;
}

export async function closeRedisClients(): Promise<void> {
  const toClose: Redis[] = [];
  if (sharedClient) toClose.push(sharedClient);
  if (bullMqClient && bullMqClient !== sharedClient) toClose.push(bullMqClient);

  sharedClient = null;
  bullMqClient = null;

  await Promise.allSettled(toClose.map((c) => c.quit()));
}
