/**
 * =============================================================================
 * REQUEST SPACER - Unit Tests
 * =============================================================================
 */

import { RequestSpacer } from '../shared/resilience/request-spacer';

describe('RequestSpacer', () => {
  let now: number;
  let sleep: jest.Mock<Promise<void>, [number]>;

  beforeEach(() => {
    now = 0;
    sleep = jest.fn(async (ms: number) => {
      now += ms;
    });
  });

  const createSpacer = (minIntervalMs: number) =>
    new RequestSpacer({ minIntervalMs, now: () => now, sleep });

  it('lets the first caller through immediately', async () => {
    const spacer = createSpacer(1000);
    await spacer.wait();
    expect(sleep).not.toHaveBeenCalled();
  });

  it('spaces concurrent callers by the minimum interval, in arrival order', async () => {
    const spacer = createSpacer(1000);
    const released: number[] = [];

    await Promise.all(
      [1, 2, 3].map(id => spacer.wait().then(() => { released.push(id); }))
    );

    expect(sleep.mock.calls).toEqual([[1000], [1000]]);
    expect(released).toEqual([1, 2, 3]);
    expect(now).toBe(2000);
  });

  it('only waits for the remainder of the interval', async () => {
    const spacer = createSpacer(1000);
    await spacer.wait();

    now += 400;
    await spacer.wait();

    expect(sleep.mock.calls).toEqual([[600]]);
  });

  it('does not wait once the interval has already passed', async () => {
    const spacer = createSpacer(1000);
    await spacer.wait();

    now += 1500;
    await spacer.wait();

    expect(sleep).not.toHaveBeenCalled();
  });

  it('never waits with a zero interval', async () => {
    const spacer = createSpacer(0);
    await Promise.all([spacer.wait(), spacer.wait(), spacer.wait()]);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('keeps serving later callers after one wait fails', async () => {
    const spacer = createSpacer(1000);
    sleep.mockImplementationOnce(() => Promise.reject(new Error('interrupted')));

    const [first, second, third] = await Promise.allSettled([
      spacer.wait(),
      spacer.wait(),
      spacer.wait(),
    ]);

    expect(first.status).toBe('fulfilled');
    expect(second).toEqual({ status: 'rejected', reason: new Error('interrupted') });
    expect(third.status).toBe('fulfilled');
    expect(sleep.mock.calls).toEqual([[1000], [1000]]);
  });
});
