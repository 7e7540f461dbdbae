// src/lib/inFlight.test.ts
import { describe, it, expect } from 'vitest';
import { InFlightRegistry, SupersededError } from './inFlight.js';

describe('InFlightRegistry', () => {
  it('aborts the previous event for the same user', () => {
    const registry = new InFlightRegistry();

    const first = registry.begin('tg-100');
    const second = registry.begin('tg-100');

    expect(first.signal.aborted).toBe(true);
    expect(first.signal.reason).toBeInstanceOf(SupersededError);
    expect(second.signal.aborted).toBe(false);
  });

  it('leaves other users alone', () => {
    const registry = new InFlightRegistry();

    const first = registry.begin('tg-100');
    registry.begin('tg-200');

    expect(first.signal.aborted).toBe(false);
    expect(registry.size).toBe(2);
  });

  it('a stale release does not drop the newer event', () => {
    const registry = new InFlightRegistry();

    const first = registry.begin('tg-100');
    const second = registry.begin('tg-100');
    first.release();
    expect(registry.size).toBe(1);

    second.release();
    expect(registry.size).toBe(0);
  });
});
