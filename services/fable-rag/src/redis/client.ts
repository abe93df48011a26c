import Redis from 'ioredis';
import type { Logger } from '../logger';

export type RedisArg = string | number | Buffer;

/**
 * The slice of the client the index needs. Every command goes through `call`,
 * which keeps RediSearch and hash commands on one code path and lets tests
 * substitute an in-process store.
 */
export interface RedisCommander {
  call(command: string, ...args: RedisArg[]): Promise<unknown>;
}

export function createRedis(url: string, logger: Logger): Redis {
  const client = new Redis(url, {
    lazyConnect: false,
    // a dead store must surface as an error, not queue commands forever
    maxRetriesPerRequest: 1,
    enableReadyCheck: true,
    connectTimeout: 5_000,
  });
  client.on('error', (err) => {
    logger.warn({ err }, 'Redis connection error');
  });
  return client;
}

const CONNECTION_FAILURE = /ECONNREFUSED|ECONNRESET|ETIMEDOUT|ENOTFOUND|EHOSTUNREACH|EPIPE|Connection is closed|Stream isn't writeable/i;

export function isConnectionFailure(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  if (err.name === 'MaxRetriesPerRequestError') return true;
  return CONNECTION_FAILURE.test(err.message);
}

export function isMissingIndex(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  return /unknown index name|no such index/i.test(err.message);
}
