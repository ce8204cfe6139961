import { vi, describe, it, expect, afterEach } from 'vitest';
import { Supervisor } from '../src/supervisor';
import type { SupervisorOptions } from '../src/supervisor';
import { defineService } from '../src/service';
import type { ServiceMain } from '../src/entrypoint';
import {
  ConfigError,
  DuplicateServiceError,
  QueueOverflowError,
  RestartLimitExceededError,
  ServiceCallError,
  ServiceNotFoundError,
  ServiceTimeoutError,
  StartupError,
} from '../src/errors';
import { EMBEDDED, blackHoleService, captureError, handleOf, pingService, sleep, stuckService } from './helpers';

describe('Supervisor', () => {
  let supervisor: Supervisor;

  const create = (options: Partial<SupervisorOptions> = {}, deps: ConstructorParameters<typeof Supervisor>[1] = {}) => {
    supervisor = new Supervisor({ ...EMBEDDED, ...options }, deps);
    return supervisor;
  };

  afterEach(async () => {
    await supervisor.stopAll(false);
  });

  describe('startService()', () => {
    it('should bring a service to RUNNING and route calls to it', async () => {
      create({ startupGraceMs: 500 });

      const descriptor = await supervisor.startService('ping', pingService());

      expect(descriptor.status).toBe('RUNNING');
      expect(descriptor.executionHandle?.isAlive()).toBe(true);
      await expect(supervisor.dispatchCall('gateway', 'ping', 'ping')).resolves.toEqual({ pong: true });
    });

    it('should refuse a second service under a live name', async () => {
      create();
      await supervisor.startService('ping', pingService());

      await expect(supervisor.startService('ping', pingService())).rejects.toThrow(DuplicateServiceError);
      expect(supervisor.registry.get('ping')?.status).toBe('RUNNING');
    });

    it('should fail and unregister a service that never heartbeats', async () => {
      create({ startupGraceMs: 100 });
      const silent: ServiceMain = (context) =>
        new Promise((resolve) => context.signal.addEventListener('abort', () => resolve(), { once: true }));

      const error = await captureError(supervisor.startService('silent', silent));

      expect(error).toBeInstanceOf(StartupError);
      expect(error).toHaveProperty('message', 'Service silent failed to start: no heartbeat within 100ms');
      expect(supervisor.registry.has('silent')).toBe(false);
    });

    it('should only take worker entrypoints under worker isolation', async () => {
      create({ isolation: 'worker' });

      const error = await captureError(supervisor.startService('ping', pingService()));

      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toHaveProperty('message', 'Service ping needs a worker entrypoint under worker isolation');
      expect(supervisor.registry.has('ping')).toBe(false);
    });

    it('should fail a service that crashes while starting', async () => {
      create({ startupGraceMs: 500 });
      const broken: ServiceMain = async () => {
        throw new Error('bad config');
      };

      await expect(supervisor.startService('broken', broken)).rejects.toThrow(
        'Service broken failed to start: unit exited during startup (crashed: bad config)',
      );
      expect(supervisor.registry.has('broken')).toBe(false);
    });
  });

  describe('dispatchCall()', () => {
    it('should surface UNKNOWN_ACTION as a ServiceCallError', async () => {
      create();
      await supervisor.startService('ping', pingService());

      const error = await captureError(supervisor.dispatchCall('gateway', 'ping', 'nope'));

      expect(error).toBeInstanceOf(ServiceCallError);
      expect(error).toMatchObject({ reason: 'UNKNOWN_ACTION', message: 'Unknown action nope', serviceName: 'ping' });
    });

    it('should surface a throwing handler as HANDLER_FAILED', async () => {
      create();
      await supervisor.startService('ping', pingService());

      const error = await captureError(supervisor.dispatchCall('gateway', 'ping', 'fail'));

      expect(error).toMatchObject({ reason: 'HANDLER_FAILED', message: 'boom' });
      await expect(supervisor.dispatchCall('gateway', 'ping', 'ping')).resolves.toEqual({ pong: true });
    });

    it('should reject calls to unknown services', async () => {
      create();

      await expect(supervisor.dispatchCall('gateway', 'ghost', 'ping')).rejects.toThrow(ServiceNotFoundError);
    });

    it('should time out when the target never replies', async () => {
      create();
      await supervisor.startService('hole', blackHoleService);

      const error = await captureError(supervisor.dispatchCall('gateway', 'hole', 'ping', {}, 50));

      expect(error).toBeInstanceOf(ServiceTimeoutError);
      expect(error).toHaveProperty('message', 'Call to hole.ping timed out after 50ms');
      expect(supervisor.replies.outstanding).toBe(0);
    });

    it('should drop a reply that arrives after its call timed out', async () => {
      create();
      await supervisor.startService('ping', pingService());

      const late = captureError(supervisor.dispatchCall('gateway', 'ping', 'slow', { delayMs: 150, tag: 'first' }, 50));
      const next = supervisor.dispatchCall('gateway', 'ping', 'slow', { delayMs: 0, tag: 'second' });

      expect(await late).toBeInstanceOf(ServiceTimeoutError);
      await expect(next).resolves.toEqual({ tag: 'second' });
      expect(supervisor.replies.discarded).toBe(1);
    });

    it('should signal backpressure when the inbox is full', async () => {
      create({ inboxCapacity: 2 });
      await supervisor.startService('stuck', stuckService);

      const first = captureError(supervisor.dispatchCall('gateway', 'stuck', 'ping', {}, 1000));
      const second = captureError(supervisor.dispatchCall('gateway', 'stuck', 'ping', {}, 1000));

      await expect(supervisor.dispatchCall('gateway', 'stuck', 'ping')).rejects.toThrow(QueueOverflowError);
      expect(supervisor.registry.get('stuck')?.inbox?.size).toBe(2);

      await supervisor.stopService('stuck', false);

      expect(await first).toMatchObject({ reason: 'SERVICE_STOPPED', message: 'Service stuck stopped' });
      expect(await second).toMatchObject({ reason: 'SERVICE_STOPPED' });
    });

    it('should refuse calls to a stopped service', async () => {
      create();
      await supervisor.startService('ping', pingService());
      await supervisor.stopService('ping');

      const error = await captureError(supervisor.dispatchCall('gateway', 'ping', 'ping'));

      expect(error).toMatchObject({ reason: 'SERVICE_UNAVAILABLE', message: 'Service ping is STOPPED' });
    });

    it('should let one service call another', async () => {
      create();
      await supervisor.startService('ping', pingService());
      await supervisor.startService(
        'relay',
        defineService({
          heartbeatIntervalMs: 20,
          actions: {
            forward: async (payload, _request, context) => context.call(String(payload.to), 'ping'),
          },
        }),
      );

      await expect(supervisor.dispatchCall('gateway', 'relay', 'forward', { to: 'ping' })).resolves.toEqual({
        pong: true,
      });
    });
  });

  describe('stopService()', () => {
    it('should let the service drain and exit on its own when graceful', async () => {
      create({ drainTimeoutMs: 1000 });
      const onShutdown = vi.fn(async () => undefined);
      await supervisor.startService(
        'ping',
        defineService({ heartbeatIntervalMs: 20, actions: { ping: async () => ({ pong: true }) }, onShutdown }),
      );
      const unit = handleOf(supervisor, 'ping');

      const stopped = await supervisor.stopService('ping');

      expect(stopped.status).toBe('STOPPED');
      expect(stopped.inbox).toBeNull();
      await expect(unit.exited).resolves.toEqual({ reason: 'returned', code: 0 });
      expect(onShutdown).toHaveBeenCalledOnce();
    });

    it('should answer every request queued behind a slow handler before exiting', async () => {
      create({ drainTimeoutMs: 2000 });
      await supervisor.startService(
        'worker',
        defineService({
          heartbeatIntervalMs: 20,
          actions: {
            work: async (payload) => {
              await sleep(50);
              return { n: payload.n };
            },
          },
        }),
      );
      const unit = handleOf(supervisor, 'worker');
      const answers = Promise.all([1, 2, 3].map((n) => supervisor.dispatchCall('gateway', 'worker', 'work', { n })));

      await supervisor.stopService('worker');

      await expect(answers).resolves.toEqual([{ n: 1 }, { n: 2 }, { n: 3 }]);
      await expect(unit.exited).resolves.toEqual({ reason: 'returned', code: 0 });
    });

    it('should terminate a service that does not drain in time', async () => {
      create({ drainTimeoutMs: 100 });
      await supervisor.startService('stuck', stuckService);
      const unit = handleOf(supervisor, 'stuck');

      await supervisor.stopService('stuck');

      await expect(unit.exited).resolves.toEqual({ reason: 'terminated', code: null });
      expect(unit.isAlive()).toBe(false);
    });

    it('should emit service:stopped', async () => {
      create();
      const onStopped = vi.fn();
      supervisor.on('service:stopped', onStopped);
      await supervisor.startService('ping', pingService());

      await supervisor.stopService('ping', false);

      expect(onStopped).toHaveBeenCalledWith('ping');
    });
  });

  describe('restartService()', () => {
    it('should relaunch under the same registration', async () => {
      create();
      await supervisor.startService('ping', pingService());
      const firstUnit = handleOf(supervisor, 'ping');

      const restarted = await supervisor.restartService('ping');

      expect(restarted.status).toBe('RUNNING');
      expect(restarted.restartCount).toBe(1);
      expect(restarted.executionHandle?.id).not.toBe(firstUnit.id);
      expect(firstUnit.isAlive()).toBe(false);
      await expect(supervisor.dispatchCall('gateway', 'ping', 'ping')).resolves.toEqual({ pong: true });
    });

    it('should refuse once the restart limit is reached and leave the service DEAD', async () => {
      create({ maxRestarts: 2 });
      await supervisor.startService('ping', pingService());
      await supervisor.restartService('ping');
      await supervisor.restartService('ping');

      await handleOf(supervisor, 'ping').terminate();
      await supervisor.markDead('ping', 'killed');

      const error = await captureError(supervisor.restartService('ping'));

      expect(error).toBeInstanceOf(RestartLimitExceededError);
      expect(supervisor.registry.get('ping')).toMatchObject({
        status: 'DEAD',
        restartCount: 2,
        lastError: 'Service ping exceeded its restart limit of 2',
      });
    });

    it('should only count restarts inside the restart window', async () => {
      let now = 10_000;
      create({ maxRestarts: 1, restartWindowMs: 1000 }, { clock: () => now });
      await supervisor.startService('ping', pingService());

      await supervisor.restartService('ping');
      await expect(supervisor.restartService('ping')).rejects.toThrow(RestartLimitExceededError);

      now = 11_500;
      const restarted = await supervisor.restartService('ping');

      expect(restarted.restartCount).toBe(2);
      expect(restarted.restartHistory).toEqual([10_000, 11_500]);
    });
  });

  describe('markDead()', () => {
    it('should leave the service alone when the unit it names was already replaced', async () => {
      create();
      await supervisor.startService('ping', pingService());
      const replaced = handleOf(supervisor, 'ping');
      await supervisor.restartService('ping');
      const current = handleOf(supervisor, 'ping');

      const afterDead = await supervisor.markDead('ping', 'no heartbeat for 20000ms', replaced.id);
      const afterRestart = await supervisor.restartService('ping', replaced.id);

      expect(afterDead.status).toBe('RUNNING');
      expect(afterRestart.executionHandle?.id).toBe(current.id);
      expect(current.isAlive()).toBe(true);
      expect(supervisor.registry.get('ping')).toMatchObject({ status: 'RUNNING', restartCount: 1, lastError: null });
    });

    it('should bury the unit it names while that unit is current', async () => {
      create();
      await supervisor.startService('ping', pingService());
      const unit = handleOf(supervisor, 'ping');

      const dead = await supervisor.markDead('ping', 'no heartbeat for 20000ms', unit.id);

      expect(dead).toMatchObject({ status: 'DEAD', lastError: 'no heartbeat for 20000ms' });
      expect(unit.isAlive()).toBe(false);
    });
  });

  describe('removeService()', () => {
    it('should stop a live service and forget it', async () => {
      create();
      await supervisor.startService('ping', pingService());
      const unit = handleOf(supervisor, 'ping');

      await expect(supervisor.removeService('ping')).resolves.toBe(true);

      expect(unit.isAlive()).toBe(false);
      expect(supervisor.registry.has('ping')).toBe(false);
      expect(await supervisor.stats.get('ping')).toBeUndefined();
      await expect(supervisor.removeService('ping')).resolves.toBe(false);
    });
  });

  describe('isolation', () => {
    it('should keep other services running when one crashes', async () => {
      create();
      const crashy: ServiceMain = async (context) => {
        await context.heartbeat();
        await context.receive();
        throw new Error('kaboom');
      };
      await supervisor.startService('crashy', crashy);
      await supervisor.startService('ping', pingService());
      const unit = handleOf(supervisor, 'crashy');

      await expect(supervisor.dispatchCall('gateway', 'crashy', 'anything', {}, 100)).rejects.toThrow(
        ServiceTimeoutError,
      );

      const exit = await unit.exited;
      expect(exit.reason).toBe('crashed');
      expect(exit.error?.message).toBe('kaboom');
      await expect(supervisor.dispatchCall('gateway', 'ping', 'ping')).resolves.toEqual({ pong: true });
    });
  });

  describe('introspection', () => {
    it('should describe services with their statistics', async () => {
      create({ maxRestarts: 3 });
      await supervisor.startService('ping', pingService());
      await supervisor.dispatchCall('gateway', 'ping', 'ping');
      await supervisor.dispatchCall('gateway', 'ping', 'echo', { value: 1 });

      const health = await supervisor.describeService('ping');

      expect(health).toMatchObject({
        name: 'ping',
        status: 'RUNNING',
        restartCount: 0,
        lastError: null,
        alive: true,
        inboxSize: 0,
        restartsRemaining: 3,
        restartLimitReached: false,
      });
      expect(health.stats.requestCount).toBe(2);
      expect(health.unitId).toMatch(/^task:ping#\d+$/);

      const summaries = await supervisor.listServices();
      expect(summaries.map((summary) => summary.name)).toEqual(['ping']);
    });

    it('should throw for unknown services', async () => {
      create();

      await expect(supervisor.describeService('ghost')).rejects.toThrow('Service ghost is not registered');
    });
  });
});
