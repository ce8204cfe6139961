import { vi, describe, it, expect, afterEach } from 'vitest';
import { ReplyRouter } from '../src/correlation';
import { buildRequest, buildResponse } from '../src/protocol';

describe('ReplyRouter', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should hand each reply to the call it answers, in any order', async () => {
    const router = new ReplyRouter();
    const first = buildRequest('gateway', 'users', 'a');
    const second = buildRequest('gateway', 'users', 'b');
    const firstReply = router.expect(first, 1000);
    const secondReply = router.expect(second, 1000);

    expect(router.deliver(buildResponse(second, { n: 2 }))).toBe(true);
    expect(router.deliver(buildResponse(first, { n: 1 }))).toBe(true);

    expect((await firstReply)?.payload).toEqual({ n: 1 });
    expect((await secondReply)?.payload).toEqual({ n: 2 });
    expect(router.outstanding).toBe(0);
  });

  it('should discard a reply that comes from the wrong service', async () => {
    vi.useFakeTimers();
    const router = new ReplyRouter();
    const request = buildRequest('gateway', 'users', 'a');
    const reply = router.expect(request, 100);
    const forged = { ...buildResponse(request), sourceService: 'orders' };

    expect(router.deliver(forged)).toBe(false);
    expect(router.discarded).toBe(1);

    await vi.advanceTimersByTimeAsync(100);
    await expect(reply).resolves.toBeUndefined();
  });

  it('should discard replies that arrive after the timeout', async () => {
    vi.useFakeTimers();
    const router = new ReplyRouter();
    const request = buildRequest('gateway', 'users', 'a');
    const reply = router.expect(request, 50);

    await vi.advanceTimersByTimeAsync(50);

    await expect(reply).resolves.toBeUndefined();
    expect(router.deliver(buildResponse(request))).toBe(false);
    expect(router.discarded).toBe(1);
  });

  it('should refuse a second expectation on the same correlation id', async () => {
    const router = new ReplyRouter();
    const request = buildRequest('gateway', 'users', 'a');
    const reply = router.expect(request, 1000);

    await expect(router.expect(request, 1000)).rejects.toThrow(
      `Correlation id ${request.correlationId} is already awaiting a reply`,
    );

    router.retireAll();
    await expect(reply).resolves.toBeUndefined();
  });
});
