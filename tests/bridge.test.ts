import path from 'node:path';
import { MessageChannel, threadId } from 'node:worker_threads';
import type { MessagePort } from 'node:worker_threads';
import { vi, describe, it, expect, afterEach } from 'vitest';
import { connectContext, serveContext } from '../src/bridge';
import type { PortContext } from '../src/bridge';
import { HostContext } from '../src/context';
import type { HostBindings } from '../src/context';
import { Channel } from '../src/channel';
import { StatisticsStore } from '../src/stats';
import { Supervisor } from '../src/supervisor';
import type { SupervisorOptions } from '../src/supervisor';
import { HealthMonitor } from '../src/monitor';
import { workerEntrypoint } from '../src/entrypoint';
import { ServiceCallError } from '../src/errors';
import { buildRequest, buildResponse } from '../src/protocol';
import type { Message } from '../src/protocol';
import { captureError, handleOf } from './helpers';

const worker = workerEntrypoint(path.join(__dirname, 'fixtures', 'service-worker.cjs'));

describe('context bridge', () => {
  let ports: MessagePort[] = [];
  let host: HostContext;
  let remote: PortContext;
  let dispose: () => void;

  const open = (overrides: Partial<HostBindings> = {}) => {
    const { port1, port2 } = new MessageChannel();
    ports = [port1, port2];
    const bindings: HostBindings = {
      inbox: new Channel<Message>(10),
      stats: new StatisticsStore(),
      heartbeatIntervalMs: 20,
      deliver: vi.fn(() => true),
      call: vi.fn(async () => ({ ok: true })),
      ...overrides,
    };
    host = new HostContext('users', bindings);
    dispose = serveContext(port2, host);
    remote = connectContext(port1, 'users');
    return bindings;
  };

  afterEach(() => {
    host.revoke();
    dispose();
    remote.close();
    ports.forEach((port) => port.close());
  });

  it('should receive inbox messages through the port', async () => {
    const { inbox } = open();
    const request = buildRequest('gateway', 'users', 'ping', { nested: { deep: [1, 2] } });
    inbox.send(request);

    await expect(remote.receive(1000)).resolves.toEqual(request);
    await expect(remote.receive(10)).resolves.toBeUndefined();
  });

  it('should deliver replies to the host', async () => {
    const { deliver } = open();
    const reply = buildResponse(buildRequest('gateway', 'users', 'ping'), { pong: true });

    await expect(remote.respond(reply)).resolves.toBe(true);
    expect(deliver).toHaveBeenCalledWith(reply);
  });

  it('should record heartbeats and counters in the host store', async () => {
    const { stats } = open();

    await remote.heartbeat();
    await expect(remote.recordRequest()).resolves.toBe(1);
    await expect(remote.increment('created', 2)).resolves.toBe(2);

    const record = await stats.get('users');
    expect(record?.lastBeatAt).not.toBeNull();
    expect(record?.counters).toEqual({ created: 2 });
  });

  it('should relay calls and rebuild their errors on the worker side', async () => {
    const call = vi
      .fn<Parameters<HostBindings['call']>, ReturnType<HostBindings['call']>>()
      .mockResolvedValueOnce({ total: 3 })
      .mockRejectedValueOnce(new ServiceCallError('orders', 'UNKNOWN_ACTION', 'Unknown action sum'));
    open({ call });

    await expect(remote.call('orders', 'count', { since: 0 })).resolves.toEqual({ total: 3 });
    expect(call).toHaveBeenCalledWith('users', 'orders', 'count', { since: 0 }, undefined);

    const error = await captureError(remote.call('orders', 'sum'));
    expect(error).toBeInstanceOf(ServiceCallError);
    expect(error).toMatchObject({ serviceName: 'orders', reason: 'UNKNOWN_ACTION', message: 'Unknown action sum' });
  });

  it('should pass a stop request on to the worker side', async () => {
    open();

    host.requestStop();
    await vi.waitFor(() => expect(remote.stopping).toBe(true), { timeout: 500, interval: 5 });
  });

  it('should fail in-flight calls when closed', async () => {
    open();
    const pending = remote.receive(10_000);

    remote.close();

    await expect(pending).rejects.toThrow('Bridge for users closed');
    await expect(remote.heartbeat()).rejects.toThrow('Bridge for users closed');
  });
});

describe('worker units', () => {
  let supervisor: Supervisor;
  let monitor: HealthMonitor | undefined;

  const start = async (options: Partial<SupervisorOptions> = {}) => {
    supervisor = new Supervisor({ startupGraceMs: 8000, heartbeatIntervalMs: 20, ...options });
    await supervisor.startService('echo', worker);
    return handleOf(supervisor, 'echo');
  };

  afterEach(async () => {
    await monitor?.stop();
    monitor = undefined;
    await supervisor.stopAll(false);
  });

  it('should run a service in its own thread and route calls to it', async () => {
    const unit = await start();

    const reply = await supervisor.dispatchCall('gateway', 'echo', 'ping');
    const settings = await supervisor.dispatchCall('gateway', 'echo', 'settings');

    expect(unit.id).toMatch(/^worker:echo#\d+$/);
    expect(reply.pong).toBe(true);
    expect(reply.threadId).not.toBe(threadId);
    expect(settings).toEqual({ heartbeatIntervalMs: 20 });
    expect((await supervisor.stats.get('echo'))?.requestCount).toBe(2);
  });

  it('should report a worker that exits with a failure code as crashed', async () => {
    const unit = await start();

    await expect(supervisor.dispatchCall('gateway', 'echo', 'exit', { code: 3 }, 500)).rejects.toThrow(
      'Call to echo.exit timed out after 500ms',
    );

    await expect(unit.exited).resolves.toMatchObject({ reason: 'crashed', code: 3 });
    expect(unit.isAlive()).toBe(false);
  });

  it('should answer every queued request before a graceful stop completes', async () => {
    const unit = await start({ drainTimeoutMs: 2000 });
    const answers = Promise.all(
      [1, 2, 3].map((n) => supervisor.dispatchCall('gateway', 'echo', 'work', { n, delayMs: 50 })),
    );

    await supervisor.stopService('echo');

    await expect(answers).resolves.toEqual([{ n: 1 }, { n: 2 }, { n: 3 }]);
    await expect(unit.exited).resolves.toEqual({ reason: 'returned', code: 0 });
  });

  it('should terminate a worker on a forced stop', async () => {
    const unit = await start();

    await supervisor.stopService('echo', false);

    await expect(unit.exited).resolves.toMatchObject({ reason: 'terminated' });
  });

  it('should contain an error that escapes a handler and restart the worker', async () => {
    const escaped = vi.fn();
    process.on('uncaughtException', escaped);
    try {
      const unit = await start();
      monitor = new HealthMonitor(supervisor, { autoRestart: true });

      const reply = supervisor.dispatchCall('gateway', 'echo', 'escape', {}, 500).catch((error: unknown) => error);
      const exit = await unit.exited;
      await reply;

      expect(exit).toMatchObject({ reason: 'crashed', code: 1 });
      expect(exit.error?.message).toBe('escaped from handler');

      const [result] = await monitor.checkAll();

      expect(result).toMatchObject({ name: 'echo', verdict: 'dead', reason: 'execution unit is not alive', status: 'RUNNING' });
      expect(supervisor.registry.get('echo')).toMatchObject({ status: 'RUNNING', restartCount: 1 });
      expect(handleOf(supervisor, 'echo').id).not.toBe(unit.id);
      await expect(supervisor.dispatchCall('gateway', 'echo', 'ping')).resolves.toMatchObject({ pong: true });
      expect(escaped).not.toHaveBeenCalled();
    } finally {
      process.off('uncaughtException', escaped);
    }
  }, 20_000);
});
