import { runBounded } from './worker-pool';

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('runBounded', () => {
  it('returns results in input order', async () => {
    const results = await runBounded([30, 10, 20], 2, async (n, i) => {
      await tick();
      return `${i}:${n}`;
    });
    expect(results).toEqual(['0:30', '1:10', '2:20']);
  });

  it('never runs more than `limit` workers at once', async () => {
    let active = 0;
    let peak = 0;

    await runBounded([1, 2, 3, 4, 5], 2, async () => {
      active++;
      peak = Math.max(peak, active);
      await tick();
      active--;
    });

    expect(peak).toBe(2);
  });

  it('rethrows the first failure once its wave settles', async () => {
    const finished: number[] = [];

    await expect(
      runBounded([1, 2, 3], 3, async (n) => {
        await tick();
        if (n === 2) throw new Error('boom');
        finished.push(n);
      }),
    ).rejects.toThrow('boom');

    expect(finished).toEqual([1, 3]);
  });

  it('stops between waves once the signal aborts', async () => {
    const controller = new AbortController();
    const seen: number[] = [];

    await expect(
      runBounded(
        [1, 2, 3],
        1,
        async (n) => {
          seen.push(n);
          controller.abort();
        },
        { signal: controller.signal, cancelError: () => new Error('cancelled') },
      ),
    ).rejects.toThrow('cancelled');

    expect(seen).toEqual([1]);
  });
});
