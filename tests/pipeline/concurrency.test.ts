import { mapBounded } from '../../src/pipeline/concurrency';

describe('mapBounded', () => {
  it('keeps input order and bounds in-flight tasks', async () => {
    let inFlight = 0;
    let peak = 0;
    const delays = [30, 5, 20, 1, 10];

    const results = await mapBounded(delays, 2, async (delay, index) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, delay));
      inFlight--;
      return `${index}:${delay}`;
    });

    expect(results).toEqual(['0:30', '1:5', '2:20', '3:1', '4:10']);
    expect(peak).toBe(2);
  });

  it('returns an empty list without calling the task', async () => {
    const task = jest.fn(async (n: number) => n);
    expect(await mapBounded([], 3, task)).toEqual([]);
    expect(task).not.toHaveBeenCalled();
  });

  it('runs at least one task at a time for a non-positive limit', async () => {
    expect(await mapBounded([1, 2, 3], 0, async (n) => n * 2)).toEqual([2, 4, 6]);
  });

  it('rejects when a task fails', async () => {
    await expect(
      mapBounded([1, 2], 2, async (n) => {
        if (n === 2) throw new Error('task 2 failed');
        return n;
      }),
    ).rejects.toThrow('task 2 failed');
  });

  it('starts nothing new after a failure and waits for tasks in flight', async () => {
    const started: number[] = [];
    const finished: number[] = [];

    const outcome = mapBounded([1, 2, 3, 4], 2, async (n) => {
      started.push(n);
      if (n === 1) throw new Error('task 1 failed');
      await new Promise((resolve) => setTimeout(resolve, 20));
      finished.push(n);
      return n;
    });

    await expect(outcome).rejects.toThrow('task 1 failed');
    expect(started).toEqual([1, 2]);
    expect(finished).toEqual([2]);
  });

  it('treats a limit that is not a number as one', async () => {
    let inFlight = 0;
    let peak = 0;
    const results = await mapBounded(['a', 'b', 'c'], Number.NaN, async (letter) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await Promise.resolve();
      inFlight--;
      return letter.toUpperCase();
    });
    expect(results).toEqual(['A', 'B', 'C']);
    expect(peak).toBe(1);
  });
});
