import { describe, expect, it } from 'vitest';
import { PolitenessGate } from '../src/utils/politeness';

describe('PolitenessGate', () => {
  it('spaces requests per identity', async () => {
    let now = 10_000;
    const gate = new PolitenessGate({ delayMs: 1000, jitterMs: 0, now: () => now });

    expect(await gate.wait('proxy-a')).toBe(true);
    expect(gate.nextAvailableAt('proxy-a')).toBe(11_000);
    expect(gate.nextAvailableAt('proxy-b')).toBe(10_000);

    now = 11_000;
    expect(await gate.wait('proxy-a')).toBe(true);
    expect(gate.nextAvailableAt('proxy-a')).toBe(12_000);
  });

  it('gives up when aborted while waiting', async () => {
    const gate = new PolitenessGate({ delayMs: 60_000, jitterMs: 500, now: () => 0, random: () => 250 });
    await gate.wait('proxy-a');
    const controller = new AbortController();
    controller.abort();

    expect(await gate.wait('proxy-a', controller.signal)).toBe(false);
    expect(gate.nextAvailableAt('proxy-a')).toBe(120_500);
  });
});
