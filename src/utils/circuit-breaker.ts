import CircuitBreaker from 'opossum';
import { logger } from './logger.js';
import { config } from '../config/index.js';

export interface CircuitBreakerOptions {
  timeout?: number;
  errorThresholdPercentage?: number;
  resetTimeout?: number;
  volumeThreshold?: number;
  /** Errors for which this returns true do not count towards opening the circuit */
  errorFilter?: (error: unknown) => boolean;
}

type Operation = () => Promise<unknown>;

const defaultOptions: CircuitBreakerOptions = {
  timeout: config.circuitBreaker.timeout,
  errorThresholdPercentage: config.circuitBreaker.errorThresholdPercentage,
  resetTimeout: config.circuitBreaker.resetTimeout,
  volumeThreshold: 5, // Minimum requests before calculating error percentage
};

const breakers = new Map<string, CircuitBreaker<[Operation], unknown>>();

function createCircuitBreaker(
  name: string,
  options: CircuitBreakerOptions = {}
): CircuitBreaker<[Operation], unknown> {
  const opts = { ...defaultOptions, ...options };

  // The breaker runs whatever operation it is fired with, so one breaker
  // guards every call made against the same downstream system.
  const breaker = new CircuitBreaker<[Operation], unknown>(
    (operation: Operation) => operation(),
    {
      timeout: opts.timeout,
      errorThresholdPercentage: opts.errorThresholdPercentage,
      resetTimeout: opts.resetTimeout,
      volumeThreshold: opts.volumeThreshold,
      errorFilter: opts.errorFilter,
      name,
    }
  );

  breaker.on('timeout', (latencyMs: Error) => {
    logger.warn({ breaker: name, latencyMs }, 'Circuit breaker timeout');
  });

  breaker.on('reject', () => {
    logger.warn({ breaker: name }, 'Circuit breaker rejected (open)');
  });

  breaker.on('open', () => {
    logger.error({ breaker: name }, 'Circuit breaker opened');
  });

  breaker.on('halfOpen', () => {
    logger.info({ breaker: name }, 'Circuit breaker half-open');
  });

  breaker.on('close', () => {
    logger.info({ breaker: name }, 'Circuit breaker closed');
  });

  breakers.set(name, breaker);
  return breaker;
}

export interface CircuitBreakerStats {
  name: string;
  state: 'open' | 'half-open' | 'closed';
  failures: number;
  successes: number;
  rejects: number;
  timeouts: number;
}

export function getCircuitBreakerStats(name: string): CircuitBreakerStats | undefined {
  const breaker = breakers.get(name);
  if (!breaker) return undefined;

  const stats = breaker.stats;
  return {
    name,
    state: breaker.opened ? 'open' : breaker.halfOpen ? 'half-open' : 'closed',
    failures: stats.failures,
    successes: stats.successes,
    rejects: stats.rejects,
    timeouts: stats.timeouts,
  };
}

export function getAllCircuitBreakerStats(): CircuitBreakerStats[] {
  return Array.from(breakers.keys())
    .map(name => getCircuitBreakerStats(name))
    .filter((stats): stats is CircuitBreakerStats => stats !== undefined);
}

/**
 * Runs `fn` behind the named circuit breaker, creating the breaker on first use.
 * Options only apply when the breaker is created.
 */
export async function withCircuitBreaker<T>(
  name: string,
  fn: () => Promise<T>,
  options?: CircuitBreakerOptions
): Promise<T> {
  const breaker = breakers.get(name) ?? createCircuitBreaker(name, options);
  return breaker.fire(fn) as Promise<T>;
}
