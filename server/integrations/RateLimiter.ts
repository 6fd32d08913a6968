import { randomUUID } from 'node:crypto';

import IORedis from 'ioredis';

import { env } from '../env';
import { recordRateLimitDecision } from '../observability/index';
import { getRedisConnectionOptions } from '../queue/index';
import { getErrorMessage } from '../types/common';
import { INTEGRATION_TYPES, type IntegrationType } from './types';

export type RateLimitScope = IntegrationType | 'engine';

export interface RateLimitKey {
  userId: string;
  scope: RateLimitScope;
}

export interface RateWindowConfig {
  maxCount: number;
  windowMs: number;
}

export interface RateWindowDecision {
  allowed: boolean;
  /** Hits inside the window after this call. */
  count: number;
  limit: number;
  /** Milliseconds until the oldest hit leaves the window; 0 when allowed. */
  retryAfterMs: number;
}

/**
 * Shared counter store. `hit` checks and records in one atomic step; `peek`
 * answers the same question without recording anything.
 */
export interface RateWindowStore {
  hit(key: string, config: RateWindowConfig, now: number): Promise<RateWindowDecision>;
  peek(key: string, config: RateWindowConfig, now: number): Promise<RateWindowDecision>;
}

interface MemoryWindow {
  hits: number[];
  windowMs: number;
}

const MEMORY_SWEEP_INTERVAL_MS = 60_000;

/** Sliding log kept in process memory. Idle keys are swept once their window passes. */
export class MemoryRateWindowStore implements RateWindowStore {
  private readonly logs = new Map<string, MemoryWindow>();
  private lastSweepAt = 0;

  /** Number of keys currently holding hits. */
  get size(): number {
    return this.logs.size;
  }

  async hit(key: string, config: RateWindowConfig, now: number): Promise<RateWindowDecision> {
    return this.evaluateSync(key, config, now, true);
  }

  async peek(key: string, config: RateWindowConfig, now: number): Promise<RateWindowDecision> {
    return this.evaluateSync(key, config, now, false);
  }

  private evaluateSync(key: string, config: RateWindowConfig, now: number, record: boolean): RateWindowDecision {
    this.sweep(now);
    const boundary = now - config.windowMs;
    const hits = (this.logs.get(key)?.hits ?? []).filter((timestamp) => timestamp > boundary);

    if (hits.length < config.maxCount) {
      if (record) {
        hits.push(now);
      }
      this.store(key, hits, config.windowMs);
      return { allowed: true, count: record ? hits.length : hits.length + 1, limit: config.maxCount, retryAfterMs: 0 };
    }

    this.store(key, hits, config.windowMs);
    const oldest = hits[0] ?? now;
    return {
      allowed: false,
      count: hits.length,
      limit: config.maxCount,
      retryAfterMs: Math.max(0, oldest + config.windowMs - now),
    };
  }

  private store(key: string, hits: number[], windowMs: number): void {
    if (hits.length === 0) {
      this.logs.delete(key);
      return;
    }
    this.logs.set(key, { hits, windowMs });
  }

  private sweep(now: number): void {
    if (now - this.lastSweepAt < MEMORY_SWEEP_INTERVAL_MS) {
      return;
    }
    this.lastSweepAt = now;
    for (const [key, window] of this.logs) {
      const newest = window.hits[window.hits.length - 1] ?? 0;
      if (newest <= now - window.windowMs) {
        this.logs.delete(key);
      }
    }
  }
}

const SLIDING_LOG_SCRIPT = `
local key = KEYS[1]
local now = tonumber(ARGV[1])
local window = tonumber(ARGV[2])
local limit = tonumber(ARGV[3])
local member = ARGV[4]

redis.call('ZREMRANGEBYSCORE', key, '-inf', now - window)
local count = redis.call('ZCARD', key)

if count < limit then
  redis.call('ZADD', key, now, member)
  redis.call('PEXPIRE', key, window)
  return { 1, count + 1, 0 }
end

local oldest = redis.call('ZRANGE', key, 0, 0, 'WITHSCORES')
local retry_ms = 0
if oldest[2] then
  retry_ms = tonumber(oldest[2]) + window - now
end

return { 0, count, retry_ms }
`;

const SLIDING_LOG_PEEK_SCRIPT = `
local key = KEYS[1]
local now = tonumber(ARGV[1])
local window = tonumber(ARGV[2])
local limit = tonumber(ARGV[3])

redis.call('ZREMRANGEBYSCORE', key, '-inf', now - window)
local count = redis.call('ZCARD', key)

if count < limit then
  return { 1, count + 1, 0 }
end

local oldest = redis.call('ZRANGE', key, 0, 0, 'WITHSCORES')
local retry_ms = 0
if oldest[2] then
  retry_ms = tonumber(oldest[2]) + window - now
end

return { 0, count, retry_ms }
`;

function toNumber(value: unknown): number {
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : 0;
}

function toDecision(response: unknown, config: RateWindowConfig): RateWindowDecision {
  const values = Array.isArray(response) ? response : [];
  const allowed = toNumber(values[0]) === 1;
  return {
    allowed,
    count: toNumber(values[1]),
    limit: config.maxCount,
    retryAfterMs: allowed ? 0 : Math.max(0, toNumber(values[2])),
  };
}

/** Sliding log in a Redis sorted set, evaluated by one Lua script per call. */
export class RedisRateWindowStore implements RateWindowStore {
  private readonly scriptShas = new Map<string, string>();

  constructor(private readonly client: IORedis) {}

  async hit(key: string, config: RateWindowConfig, now: number): Promise<RateWindowDecision> {
    const member = `${now}-${randomUUID()}`;
    const response = await this.evalScript(SLIDING_LOG_SCRIPT, (sha) =>
      this.client.evalsha(sha, 1, key, now, config.windowMs, config.maxCount, member)
    );
    return toDecision(response, config);
  }

  async peek(key: string, config: RateWindowConfig, now: number): Promise<RateWindowDecision> {
    const response = await this.evalScript(SLIDING_LOG_PEEK_SCRIPT, (sha) =>
      this.client.evalsha(sha, 1, key, now, config.windowMs, config.maxCount)
    );
    return toDecision(response, config);
  }

  private async evalScript(script: string, run: (sha: string) => Promise<unknown>): Promise<unknown> {
    const sha = await this.ensureScript(script);
    try {
      return await run(sha);
    } catch (error) {
      if (getErrorMessage(error).includes('NOSCRIPT')) {
        this.scriptShas.delete(script);
        return run(await this.ensureScript(script));
      }
      throw error;
    }
  }

  private async ensureScript(script: string): Promise<string> {
    const cached = this.scriptShas.get(script);
    if (cached) {
      return cached;
    }
    const sha = await this.client.script('LOAD', script);
    if (typeof sha !== 'string') {
      throw new Error('Redis did not return a script SHA');
    }
    this.scriptShas.set(script, sha);
    return sha;
  }
}

/**
 * Reads `RATE_LIMIT_<TYPE>=<max>/<windowMs>` overrides from the environment.
 */
export function loadRateLimitOverrides(
  source: NodeJS.ProcessEnv = process.env
): Partial<Record<RateLimitScope, RateWindowConfig>> {
  const overrides: Partial<Record<RateLimitScope, RateWindowConfig>> = {};
  const scopes: RateLimitScope[] = [...INTEGRATION_TYPES, 'engine'];

  for (const scope of scopes) {
    const raw = source[`RATE_LIMIT_${scope.toUpperCase()}`];
    if (!raw) {
      continue;
    }
    const match = /^\s*(\d+)\s*\/\s*(\d+)\s*$/.exec(raw);
    const maxCount = match ? Number.parseInt(match[1], 10) : Number.NaN;
    const windowMs = match ? Number.parseInt(match[2], 10) : Number.NaN;
    if (!(maxCount > 0) || !(windowMs > 0)) {
      console.warn(`[RateLimiter] Ignoring malformed RATE_LIMIT_${scope.toUpperCase()}="${raw}" (expected <max>/<windowMs>)`);
      continue;
    }
    overrides[scope] = { maxCount, windowMs };
  }

  return overrides;
}

export interface RateLimitDenial {
  key: RateLimitKey;
  decision: RateWindowDecision;
}

const REDIS_RETRY_INTERVAL_MS = 30_000;

export interface RateLimiterOptions {
  store?: RateWindowStore;
  limits?: Partial<Record<RateLimitScope, RateWindowConfig>>;
  defaultLimit?: RateWindowConfig;
  now?: () => number;
}

export class RateLimiter {
  private readonly limits: Partial<Record<RateLimitScope, RateWindowConfig>>;
  private readonly defaultLimit: RateWindowConfig;
  private readonly now: () => number;
  private readonly memoryStore = new MemoryRateWindowStore();
  private readonly fixedStore: RateWindowStore | null;

  private redis: IORedis | null = null;
  private redisStore: RedisRateWindowStore | null = null;
  private connecting: Promise<RedisRateWindowStore | null> | null = null;
  private redisRetryAt = 0;
  private warnedFallback = false;

  constructor(options: RateLimiterOptions = {}) {
    this.fixedStore = options.store ?? null;
    this.limits = { ...loadRateLimitOverrides(), ...options.limits };
    this.defaultLimit = options.defaultLimit ?? {
      maxCount: env.RATE_LIMIT_DEFAULT_MAX,
      windowMs: env.RATE_LIMIT_DEFAULT_WINDOW_MS,
    };
    this.now = options.now ?? Date.now;
  }

  getLimit(scope: RateLimitScope): RateWindowConfig {
    return this.limits[scope] ?? this.defaultLimit;
  }

  async checkAndIncrement(key: RateLimitKey): Promise<boolean> {
    const decision = await this.evaluate(key);
    return decision.allowed;
  }

  async evaluate(key: RateLimitKey): Promise<RateWindowDecision> {
    const decision = await this.runStore(key, 'hit');
    this.report(key, decision);
    return decision;
  }

  /**
   * Admits one call that counts against several scopes. Every window is
   * checked before any hit is recorded, so a denial leaves the other scopes
   * untouched. Resolves to the first denial, or null when all were admitted.
   */
  async admitAll(keys: RateLimitKey[]): Promise<RateLimitDenial | null> {
    for (const key of keys) {
      const decision = await this.runStore(key, 'peek');
      if (!decision.allowed) {
        this.report(key, decision);
        return { key, decision };
      }
    }
    for (const key of keys) {
      const decision = await this.evaluate(key);
      if (!decision.allowed) {
        return { key, decision };
      }
    }
    return null;
  }

  async close(): Promise<void> {
    const client = this.redis;
    this.redis = null;
    this.redisStore = null;
    if (client) {
      await client.quit();
    }
  }

  private async runStore(key: RateLimitKey, operation: 'hit' | 'peek'): Promise<RateWindowDecision> {
    const storeKey = `ratewindow:${key.scope}:${key.userId}`;
    const config = this.getLimit(key.scope);
    const now = this.now();

    const store = await this.resolveStore();
    try {
      return await store[operation](storeKey, config, now);
    } catch (error) {
      if (store === this.fixedStore || store === this.memoryStore) {
        throw error;
      }
      this.dropRedis(`Redis rate window failed: ${getErrorMessage(error)}`);
      return this.memoryStore[operation](storeKey, config, now);
    }
  }

  private report(key: RateLimitKey, decision: RateWindowDecision): void {
    recordRateLimitDecision(key.scope, decision.allowed);
    if (!decision.allowed) {
      console.warn(
        `[RateLimiter] ${key.scope} limit reached for user ${key.userId} (${decision.count}/${decision.limit} in ${this.getLimit(key.scope).windowMs}ms)`
      );
    }
  }

  private async resolveStore(): Promise<RateWindowStore> {
    if (this.fixedStore) {
      return this.fixedStore;
    }
    if (process.env.QUEUE_DRIVER?.toLowerCase() === 'inmemory') {
      return this.memoryStore;
    }
    if (this.redisStore) {
      return this.redisStore;
    }
    // Stay on process memory until the retry interval after a Redis failure has passed.
    if (this.now() < this.redisRetryAt) {
      return this.memoryStore;
    }
    if (!this.connecting) {
      this.connecting = this.connectRedis().finally(() => {
        this.connecting = null;
      });
    }
    const store = await this.connecting;
    return store ?? this.memoryStore;
  }

  private async connectRedis(): Promise<RedisRateWindowStore | null> {
    const client = env.REDIS_URL
      ? new IORedis(env.REDIS_URL, { lazyConnect: true, enableOfflineQueue: false, maxRetriesPerRequest: 2 })
      : new IORedis({
          ...getRedisConnectionOptions(),
          lazyConnect: true,
          enableOfflineQueue: false,
          maxRetriesPerRequest: 2,
        });

    client.on('error', (err: Error) => {
      console.warn('[RateLimiter] Redis error:', err.message);
    });
    client.on('end', () => {
      if (this.redis === client) {
        this.redis = null;
        this.redisStore = null;
        this.redisRetryAt = this.now() + REDIS_RETRY_INTERVAL_MS;
      }
    });

    try {
      await client.connect();
      console.log('[RateLimiter] Connected to Redis for distributed sliding windows');
      this.redis = client;
      this.redisStore = new RedisRateWindowStore(client);
      return this.redisStore;
    } catch (error) {
      client.disconnect();
      this.redisRetryAt = this.now() + REDIS_RETRY_INTERVAL_MS;
      this.warnFallback(`Redis unavailable: ${getErrorMessage(error)}`);
      return null;
    }
  }

  private dropRedis(reason: string): void {
    const client = this.redis;
    this.redis = null;
    this.redisStore = null;
    this.redisRetryAt = this.now() + REDIS_RETRY_INTERVAL_MS;
    client?.disconnect();
    this.warnFallback(reason);
  }

  private warnFallback(reason: string): void {
    if (this.warnedFallback) {
      return;
    }
    this.warnedFallback = true;
    console.warn(`[RateLimiter] ${reason}. Falling back to in-process sliding windows; limits are per process.`);
  }
}
