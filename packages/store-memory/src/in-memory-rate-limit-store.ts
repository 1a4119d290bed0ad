import { performance } from 'node:perf_hooks';
import {
  DEFAULT_RATE_LIMIT,
  bucketStatus,
  createBucketState,
  isUnlimited,
  refillBucket,
  sleep as defaultSleep,
  takeToken,
  waitForToken,
  waitTimeMs,
  type AcquireOptions,
  type RateLimitConfig,
  type RateLimitConfigMap,
  type RateLimitStatus,
  type RateLimitStore,
  type SleepFn,
  type TakeTokenResult,
  type TokenBucketState,
} from '@sandbox-kit/core';
import {
  defaultTokenBucketRegistry,
  type TokenBucketRegistry,
} from './token-bucket-registry.js';

export interface InMemoryRateLimitStoreOptions {
  /** Bucket parameters for resources without their own entry. */
  defaultConfig?: RateLimitConfig;
  resourceConfigs?: RateLimitConfigMap;
  /** Where bucket state lives. Defaults to the process-wide registry. */
  registry?: TokenBucketRegistry;
  /** Monotonic clock in ms. */
  clock?: () => number;
  sleep?: SleepFn;
}

/**
 * Token-bucket limiter held in process memory.
 *
 * `acquire` keeps the resource's lock for the whole wait, so waiters are
 * served in arrival order. `check` refuses while an acquirer is blocked on
 * the resource and otherwise takes a token directly.
 */
export class InMemoryRateLimitStore implements RateLimitStore {
  private readonly defaultConfig: RateLimitConfig;
  private readonly resourceConfigs: RateLimitConfigMap;
  private readonly registry: TokenBucketRegistry;
  private readonly clock: () => number;
  private readonly sleep: SleepFn;

  constructor({
    defaultConfig = DEFAULT_RATE_LIMIT,
    resourceConfigs = new Map<string, RateLimitConfig>(),
    registry = defaultTokenBucketRegistry,
    clock = () => performance.now(),
    sleep = defaultSleep,
  }: InMemoryRateLimitStoreOptions = {}) {
    this.defaultConfig = defaultConfig;
    this.resourceConfigs = new Map(resourceConfigs);
    this.registry = registry;
    this.clock = clock;
    this.sleep = sleep;
  }

  async check(resource: string): Promise<boolean> {
    if (isUnlimited(this.getResourceConfig(resource))) {
      return true;
    }
    if (this.registry.waiting.has(resource)) {
      return false;
    }
    return this.take(resource).consumed;
  }

  async acquire(resource: string, options: AcquireOptions = {}): Promise<void> {
    if (isUnlimited(this.getResourceConfig(resource))) {
      return;
    }
    const { mutex, waiting } = this.registry;
    // Queueing behind a blocked acquirer is waiting too.
    const leave = waiting.has(resource) ? waiting.enter(resource) : undefined;
    try {
      await mutex.runExclusive(
        resource,
        () =>
          waitForToken(
            resource,
            () => this.take(resource),
            options,
            this.sleep,
            waiting,
          ),
        options.signal,
      );
    } finally {
      leave?.();
    }
  }

  async reset(resource: string): Promise<void> {
    this.registry.set(
      resource,
      createBucketState(this.getResourceConfig(resource), this.clock()),
    );
  }

  async getStatus(resource: string): Promise<RateLimitStatus> {
    const config = this.getResourceConfig(resource);
    return bucketStatus(this.currentState(resource, config), config, this.clock());
  }

  async getWaitTime(resource: string): Promise<number> {
    const config = this.getResourceConfig(resource);
    const refilled = refillBucket(
      this.currentState(resource, config),
      config,
      this.clock(),
    );
    return waitTimeMs(refilled, config);
  }

  setResourceConfig(resource: string, config: RateLimitConfig): void {
    this.resourceConfigs.set(resource, config);
  }

  getResourceConfig(resource: string): RateLimitConfig {
    return this.resourceConfigs.get(resource) ?? this.defaultConfig;
  }

  private currentState(
    resource: string,
    config: RateLimitConfig,
  ): TokenBucketState {
    return this.registry.get(resource) ?? createBucketState(config, this.clock());
  }

  private take(resource: string): TakeTokenResult {
    const config = this.getResourceConfig(resource);
    const now = this.clock();
    const result = takeToken(this.currentState(resource, config), config, now);
    this.registry.set(resource, result.state);
    return result;
  }
}
