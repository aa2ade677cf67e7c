import { describe, it, expect } from 'vitest';
import { setTimeout as sleep } from 'node:timers/promises';
import { runBounded } from '../../src/services/worker-pool.js';

describe('runBounded', () => {
  it('should keep results aligned with inputs whatever the completion order', async () => {
    const slots = await runBounded([30, 5, 15], 3, async (ms) => {
      await sleep(ms);
      return ms * 2;
    });

    expect(slots).toEqual([
      { status: 'fulfilled', value: 60 },
      { status: 'fulfilled', value: 10 },
      { status: 'fulfilled', value: 30 },
    ]);
  });

  it('should never run more than the limit at once', async () => {
    let inFlight = 0;
    let peak = 0;
    await runBounded([1, 2, 3, 4, 5, 6, 7], 3, async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await sleep(5);
      inFlight--;
    });

    expect(peak).toBe(3);
  });

  it('should record a throwing worker without stopping the others', async () => {
    const slots = await runBounded(['a', 'b', 'c'], 2, async (item) => {
      if (item === 'b') throw new Error('boom');
      return item.toUpperCase();
    });

    expect(slots[0]).toEqual({ status: 'fulfilled', value: 'A' });
    expect(slots[1].status).toBe('rejected');
    expect(slots[2]).toEqual({ status: 'fulfilled', value: 'C' });
  });

  it('should skip items not yet started once the signal aborts', async () => {
    const controller = new AbortController();
    const started: number[] = [];
    const slots = await runBounded([0, 1, 2, 3], 1, async (item) => {
      started.push(item);
      if (item === 1) controller.abort();
      return item;
    }, controller.signal);

    expect(started).toEqual([0, 1]);
    expect(slots.map((slot) => slot.status)).toEqual(['fulfilled', 'fulfilled', 'skipped', 'skipped']);
  });

  it('should return an empty list for no items', async () => {
    expect(await runBounded([], 2, async () => 1)).toEqual([]);
  });

  it('should reject an invalid limit', async () => {
    await expect(runBounded([1], 0, async () => 1)).rejects.toThrow(
      'Concurrency limit must be a positive integer, got 0',
    );
  });
});
