/**
 * Circuit Breaker Pattern Implementation
 *
 * Stops calling a degraded dependency after a run of consecutive failures and
 * fails fast for a cooldown window before letting a single trial call through.
 * One breaker is shared by every pipeline of an engine, so failures are counted
 * across datasets rather than per dataset.
 */

import { logger } from './logger.js';
import { CircuitOpenError } from '../types/errors.js';

export interface CircuitBreakerOptions {
  /**
   * Number of consecutive failures before opening the circuit
   * @default 5
   */
  failureThreshold?: number;

  /**
   * Time in milliseconds the circuit stays open before a trial call is allowed
   * @default 60000 (1 minute)
   */
  cooldownMs?: number;

  /**
   * Decides which errors count as failures. Errors it rejects (e.g. bad
   * credentials) pass through without touching the failure count.
   * @default every error counts
   */
  isFailure?: (error: unknown) => boolean;

  /**
   * Clock, injectable for tests
   */
  now?: () => number;

  /**
   * Name of the circuit breaker (for logging)
   */
  name?: string;
}

export enum CircuitState {
  CLOSED = 'CLOSED',      // Normal operation
  OPEN = 'OPEN',          // Circuit is open, failing fast
  HALF_OPEN = 'HALF_OPEN' // Trial call in flight
}

export interface CircuitBreakerStatus {
  name: string;
  state: CircuitState;
  consecutiveFailures: number;
  openedAt: number | null;
  totalFailures: number;
  totalRejected: number;
}

/**
 * Circuit breaker implementation
 */
export class CircuitBreaker {
  private readonly failureThreshold: number;
  private readonly cooldownMs: number;
  private readonly isFailure: (error: unknown) => boolean;
  private readonly now: () => number;
  private readonly name: string;

  private state: CircuitState = CircuitState.CLOSED;
  private consecutiveFailures = 0;
  private openedAt: number | null = null;
  private trialInFlight = false;
  private totalFailures = 0;
  private totalRejected = 0;

  constructor(options: CircuitBreakerOptions = {}) {
    this.failureThreshold = options.failureThreshold ?? 5;
    this.cooldownMs = options.cooldownMs ?? 60000;
    this.isFailure = options.isFailure ?? (() => true);
    this.now = options.now ?? Date.now;
    this.name = options.name ?? 'CircuitBreaker';
  }

  /**
   * Execute a function with circuit breaker protection
   *
   * @throws CircuitOpenError while the circuit is open or a trial call is in flight
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    this.beforeCall();

    const isTrial = this.state === CircuitState.HALF_OPEN;
    if (isTrial) {
      this.trialInFlight = true;
    }

    try {
      const result = await fn();
      this.onSuccess();
      return result;
    } catch (error) {
      if (this.isFailure(error)) {
        this.onFailure();
      } else if (isTrial) {
        // Neutral outcome: let the next call retry the trial
        this.state = CircuitState.OPEN;
        this.openedAt = this.now() - this.cooldownMs;
      }
      throw error;
    } finally {
      if (isTrial) {
        this.trialInFlight = false;
      }
    }
  }

  private beforeCall(): void {
    if (this.state === CircuitState.CLOSED) {
      return;
    }

    const elapsed = this.now() - (this.openedAt ?? 0);

    if (this.state === CircuitState.OPEN && elapsed >= this.cooldownMs) {
      this.state = CircuitState.HALF_OPEN;
      logger.info({ name: this.name, state: CircuitState.HALF_OPEN }, 'Circuit breaker moving to half-open state');
      return;
    }

    if (this.state === CircuitState.HALF_OPEN && !this.trialInFlight) {
      return;
    }

    this.totalRejected++;
    throw new CircuitOpenError(this.name, Math.max(0, this.cooldownMs - elapsed));
  }

  /**
   * Handle successful execution
   */
  private onSuccess(): void {
    if (this.state === CircuitState.HALF_OPEN) {
      logger.info({ name: this.name, state: CircuitState.CLOSED }, 'Circuit breaker closed after successful recovery');
    }
    this.state = CircuitState.CLOSED;
    this.consecutiveFailures = 0;
    this.openedAt = null;
  }

  /**
   * Handle failed execution
   */
  private onFailure(): void {
    this.consecutiveFailures++;
    this.totalFailures++;

    if (this.state === CircuitState.HALF_OPEN) {
      this.open();
      logger.warn(
        { name: this.name, state: CircuitState.OPEN, consecutiveFailures: this.consecutiveFailures },
        'Circuit breaker opened again after failure in half-open state'
      );
    } else if (this.state === CircuitState.CLOSED && this.consecutiveFailures >= this.failureThreshold) {
      this.open();
      logger.warn(
        {
          name: this.name,
          state: CircuitState.OPEN,
          consecutiveFailures: this.consecutiveFailures,
          threshold: this.failureThreshold,
        },
        'Circuit breaker opened due to failure threshold'
      );
    }
  }

  private open(): void {
    this.state = CircuitState.OPEN;
    this.openedAt = this.now();
  }

  /**
   * Get circuit breaker status
   */
  getStatus(): CircuitBreakerStatus {
    return {
      name: this.name,
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      openedAt: this.openedAt,
      totalFailures: this.totalFailures,
      totalRejected: this.totalRejected,
    };
  }
}
