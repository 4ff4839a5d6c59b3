import { describe, it, expect, vi } from 'vitest';
import { CircuitBreaker, CircuitState } from '../circuitBreaker.js';
import { CircuitOpenError } from '../../types/errors.js';

const fail = async (): Promise<never> => {
  throw new Error('upstream down');
};

function createBreaker(overrides: { isFailure?: (error: unknown) => boolean } = {}) {
  let now = 0;
  const breaker = new CircuitBreaker({
    name: 'test',
    failureThreshold: 3,
    cooldownMs: 1000,
    now: () => now,
    ...overrides,
  });
  return {
    breaker,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe('CircuitBreaker', () => {
  it('opens after consecutive failures and then fails fast', async () => {
    const { breaker } = createBreaker();
    for (let i = 0; i < 3; i++) {
      await expect(breaker.execute(fail)).rejects.toThrow('upstream down');
    }
    expect(breaker.getStatus().state).toBe(CircuitState.OPEN);

    const fn = vi.fn(async () => 'ok');
    const rejected = breaker.execute(fn);
    await expect(rejected).rejects.toBeInstanceOf(CircuitOpenError);
    await expect(rejected).rejects.toMatchObject({ breakerName: 'test', retryAfterMs: 1000 });
    expect(fn).not.toHaveBeenCalled();
    expect(breaker.getStatus().totalRejected).toBe(1);
  });

  it('resets the failure count on success', async () => {
    const { breaker } = createBreaker();
    await expect(breaker.execute(fail)).rejects.toThrow();
    await expect(breaker.execute(fail)).rejects.toThrow();
    await breaker.execute(async () => 'ok');
    await expect(breaker.execute(fail)).rejects.toThrow();
    await expect(breaker.execute(fail)).rejects.toThrow();

    expect(breaker.getStatus().state).toBe(CircuitState.CLOSED);
    expect(breaker.getStatus().consecutiveFailures).toBe(2);
  });

  it('closes again after a successful trial call', async () => {
    const { breaker, advance } = createBreaker();
    for (let i = 0; i < 3; i++) {
      await expect(breaker.execute(fail)).rejects.toThrow();
    }

    advance(1000);
    await expect(breaker.execute(async () => 'recovered')).resolves.toBe('recovered');
    expect(breaker.getStatus().state).toBe(CircuitState.CLOSED);
    expect(breaker.getStatus().consecutiveFailures).toBe(0);
  });

  it('re-opens when the trial call fails', async () => {
    const { breaker, advance } = createBreaker();
    for (let i = 0; i < 3; i++) {
      await expect(breaker.execute(fail)).rejects.toThrow();
    }

    advance(1500);
    await expect(breaker.execute(fail)).rejects.toThrow('upstream down');
    expect(breaker.getStatus().state).toBe(CircuitState.OPEN);
    expect(breaker.getStatus().openedAt).toBe(1500);
    await expect(breaker.execute(async () => 'ok')).rejects.toBeInstanceOf(CircuitOpenError);
  });

  it('lets only one trial call through while half-open', async () => {
    const { breaker, advance } = createBreaker();
    for (let i = 0; i < 3; i++) {
      await expect(breaker.execute(fail)).rejects.toThrow();
    }
    advance(1000);

    let finishTrial: (value: string) => void = () => undefined;
    const trial = breaker.execute(
      () =>
        new Promise<string>((resolve) => {
          finishTrial = resolve;
        })
    );
    expect(breaker.getStatus().state).toBe(CircuitState.HALF_OPEN);
    await expect(breaker.execute(async () => 'second')).rejects.toBeInstanceOf(CircuitOpenError);

    finishTrial('first');
    await expect(trial).resolves.toBe('first');
    expect(breaker.getStatus().state).toBe(CircuitState.CLOSED);
  });

  it('ignores errors that isFailure rejects', async () => {
    const { breaker } = createBreaker({ isFailure: (error) => !(error instanceof TypeError) });
    for (let i = 0; i < 5; i++) {
      await expect(
        breaker.execute(async () => {
          throw new TypeError('bad credentials');
        })
      ).rejects.toThrow('bad credentials');
    }

    expect(breaker.getStatus().state).toBe(CircuitState.CLOSED);
    expect(breaker.getStatus().totalFailures).toBe(0);
  });
});
