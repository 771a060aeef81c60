import { describe, expect, it, vi } from 'vitest';
import { MinIntervalGate } from '../../../src/utils/rateLimit.js';

describe('MinIntervalGate', () => {
  it('lets the first call through without waiting', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const gate = new MinIntervalGate(200, () => 1000, sleep);

    expect(gate.remainingMs()).toBe(0);
    await gate.waitTurn();
    expect(sleep).not.toHaveBeenCalled();
  });

  it('waits out the rest of the interval since the last call', async () => {
    let now = 1000;
    const sleep = vi.fn(async (_ms: number) => {});
    const gate = new MinIntervalGate(200, () => now, sleep);

    gate.markCall();
    now = 1050;
    expect(gate.remainingMs()).toBe(150);

    await gate.waitTurn();
    expect(sleep).toHaveBeenCalledWith(150);
  });

  it('does not wait once the interval has passed', async () => {
    let now = 1000;
    const sleep = vi.fn(async (_ms: number) => {});
    const gate = new MinIntervalGate(200, () => now, sleep);

    gate.markCall();
    now = 1300;
    await gate.waitTurn();

    expect(gate.remainingMs()).toBe(0);
    expect(sleep).not.toHaveBeenCalled();
  });
});
