import { defineService } from '../src/service';
import type { ServiceInstance } from '../src/service';
import type { ServiceMain } from '../src/entrypoint';
import type { ExecutionUnit } from '../src/units';
import type { Supervisor, SupervisorOptions } from '../src/supervisor';

/**
 * Lets plain service functions run on the test's own event loop.
 */
export const EMBEDDED: Partial<SupervisorOptions> = { isolation: 'in-process' };

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Resolve with whatever `promise` rejects with; fail if it resolves.
 */
export const captureError = (promise: Promise<unknown>): Promise<unknown> =>
  promise.then(
    (value) => {
      throw new Error(`Expected a rejection, got ${JSON.stringify(value)}`);
    },
    (error: unknown) => error,
  );

export const pingService = (): ServiceInstance =>
  defineService({
    heartbeatIntervalMs: 20,
    actions: {
      ping: async () => ({ pong: true }),
      echo: async (payload) => payload,
      fail: async () => {
        throw new Error('boom');
      },
      slow: async (payload) => {
        await sleep(Number(payload.delayMs));
        return { tag: payload.tag };
      },
    },
  });

const untilRevoked = (signal: AbortSignal): Promise<void> =>
  new Promise((resolve) => {
    if (signal.aborted) return resolve();
    signal.addEventListener('abort', () => resolve(), { once: true });
  });

/**
 * Heartbeats once, then never touches its inbox again.
 */
export const stuckService: ServiceMain = async (context) => {
  await context.heartbeat();
  await untilRevoked(context.signal);
};

/**
 * Keeps receiving and heartbeating, never replies.
 */
export const blackHoleService: ServiceMain = async (context) => {
  await context.heartbeat();
  while (!context.stopping && !context.signal.aborted) {
    await context.receive(20);
    await context.heartbeat();
  }
};

export const handleOf = (supervisor: Supervisor, name: string): ExecutionUnit => {
  const handle = supervisor.registry.get(name)?.executionHandle;
  if (!handle) {
    throw new Error(`${name} has no execution handle`);
  }
  return handle;
};
