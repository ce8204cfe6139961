import { EventEmitter } from 'node:events';
import logger from './logger';
import { Channel } from './channel';
import { HostContext } from './context';
import { ReplyRouter } from './correlation';
import { isWorkerEntrypoint } from './entrypoint';
import type { Entrypoint } from './entrypoint';
import {
  ConfigError,
  RestartLimitExceededError,
  ServiceCallError,
  ServiceNotFoundError,
  ServiceTimeoutError,
  StartupError,
} from './errors';
import { KeyedMutex } from './mutex';
import { ErrorReasons, buildError, buildRequest, buildShutdown, errorDetail } from './protocol';
import type { Message, Payload } from './protocol';
import { ServiceRegistry, isLive } from './registry';
import type { ServiceDescriptor, ServiceStatus } from './registry';
import { StatisticsStore } from './stats';
import type { ServiceStats } from './stats';
import { launchUnit } from './units';
import type { ExecutionUnit, UnitKind } from './units';

export interface SupervisorOptions {
  maxRestarts: number;
  /** Only restarts inside this window count against the ceiling. 0 means the lifetime of the registration. */
  restartWindowMs: number;
  callTimeoutMs: number;
  heartbeatIntervalMs: number;
  inboxCapacity: number;
  startupGraceMs: number;
  drainTimeoutMs: number;
  /**
   * `worker` only accepts worker entrypoints, each in its own thread.
   * `in-process` also runs plain service functions on the supervisor's own
   * event loop, where an escaped error or a blocking handler reaches the
   * supervisor. Meant for tests and embedding.
   */
  isolation: UnitKind;
}

export const DEFAULT_SUPERVISOR_OPTIONS: SupervisorOptions = {
  maxRestarts: 3,
  restartWindowMs: 0,
  callTimeoutMs: 5000,
  heartbeatIntervalMs: 1000,
  inboxCapacity: 1000,
  startupGraceMs: 5000,
  drainTimeoutMs: 5000,
  isolation: 'worker',
};

/**
 * Introspection view of one service.
 */
export interface ServiceSummary {
  name: string;
  status: ServiceStatus;
  unitId: string | null;
  startedAt: number;
  restartCount: number;
  lastError: string | null;
  stats: ServiceStats;
}

export interface ServiceHealth extends ServiceSummary {
  alive: boolean;
  uptimeMs: number;
  inboxSize: number;
  restartsRemaining: number;
  restartLimitReached: boolean;
}

interface ManagedUnit {
  entrypoint: Entrypoint;
  unit: ExecutionUnit | null;
}

const log = logger.child({ component: 'supervisor' });

const timeout = (ms: number): { promise: Promise<'timeout'>; cancel: () => void } => {
  let timer: NodeJS.Timeout | undefined;
  const promise = new Promise<'timeout'>((resolve) => {
    timer = setTimeout(() => resolve('timeout'), ms);
  });
  return { promise, cancel: () => clearTimeout(timer) };
};

/**
 * Owns the lifecycle of every service unit: the one path for starting,
 * stopping and restarting them, and for calls between them.
 *
 * Lifecycle operations on the same name are serialized; operations on
 * different names run concurrently.
 *
 * Events: `service:running`, `service:stopped`, `service:dead`,
 * `service:restarted`, `service:exit` (name, UnitExit).
 */
export class Supervisor extends EventEmitter {
  readonly registry: ServiceRegistry;
  readonly stats: StatisticsStore;
  readonly replies = new ReplyRouter();
  readonly options: SupervisorOptions;
  private readonly units = new Map<string, ManagedUnit>();
  private readonly operations = new KeyedMutex();
  private readonly clock: () => number;

  constructor(
    options: Partial<SupervisorOptions> = {},
    deps: { registry?: ServiceRegistry; stats?: StatisticsStore; clock?: () => number } = {},
  ) {
    super();
    this.options = { ...DEFAULT_SUPERVISOR_OPTIONS, ...options };
    this.clock = deps.clock ?? Date.now;
    this.registry = deps.registry ?? new ServiceRegistry(this.clock);
    this.stats = deps.stats ?? new StatisticsStore(this.clock);
  }

  /**
   * Launch `entrypoint` under `name` and wait for its first heartbeat.
   * @throws ConfigError for a plain service function unless isolation is `in-process`
   * @throws StartupError when the unit exits or stays silent past the grace period
   */
  startService(name: string, entrypoint: Entrypoint): Promise<ServiceDescriptor> {
    return this.operations.runExclusive(name, async () => {
      if (this.options.isolation === 'worker' && !isWorkerEntrypoint(entrypoint)) {
        throw new ConfigError(`Service ${name} needs a worker entrypoint under worker isolation`);
      }
      this.registry.register(name, { executionHandle: null, inbox: null });
      this.units.set(name, { entrypoint, unit: null });

      try {
        return await this.launch(name);
      } catch (error) {
        this.units.delete(name);
        this.registry.deregister(name);
        await this.stats.remove(name);
        throw error;
      }
    });
  }

  /**
   * Stop `name`. A graceful stop queues a shutdown message behind the pending
   * requests, so they are all answered, and waits up to `drainTimeoutMs` for
   * the unit to exit before terminating it. Always ends STOPPED.
   */
  stopService(name: string, graceful = true): Promise<ServiceDescriptor> {
    return this.operations.runExclusive(name, async () => {
      const descriptor = this.require(name);
      if (descriptor.status === 'STOPPED') {
        return descriptor;
      }

      await this.halt(name, graceful);
      const stopped = this.registry.updateStatus(name, 'STOPPED');
      this.emit('service:stopped', name);
      return stopped;
    });
  }

  /**
   * Terminate and relaunch `name` under the same registration.
   *
   * With `unitId`, the restart only happens while that unit is still the
   * current one; otherwise the current descriptor is returned untouched.
   *
   * @throws RestartLimitExceededError once the restart budget is spent; the service is left as it was
   */
  restartService(name: string, unitId?: string): Promise<ServiceDescriptor> {
    return this.operations.runExclusive(name, async () => {
      const descriptor = this.require(name);
      if (this.superseded(descriptor, unitId)) {
        log.info({ service: name, unit: unitId }, 'Skipping restart, unit already replaced');
        return descriptor;
      }

      if (this.restartsRemaining(descriptor) <= 0) {
        const error = new RestartLimitExceededError(name, this.options.maxRestarts);
        this.registry.recordError(name, error.message);
        log.error({ service: name, restartCount: descriptor.restartCount }, 'Restart refused, limit reached');
        throw error;
      }

      await this.halt(name, false);
      if (descriptor.status !== 'DEAD') {
        this.registry.updateStatus(name, 'DEAD');
      }
      this.registry.beginRestart(name);

      try {
        const restarted = await this.launch(name);
        this.emit('service:restarted', name, restarted.restartCount);
        return restarted;
      } catch (error) {
        this.registry.updateStatus(name, 'DEAD');
        this.registry.recordError(name, error instanceof Error ? error.message : String(error));
        this.emit('service:dead', name);
        throw error;
      }
    });
  }

  /**
   * Remove a DEAD or STOPPED service from the registry altogether.
   */
  removeService(name: string): Promise<boolean> {
    return this.operations.runExclusive(name, async () => {
      const descriptor = this.registry.get(name);
      if (!descriptor) return false;
      if (isLive(descriptor.status)) {
        await this.halt(name, false);
        this.registry.updateStatus(name, 'STOPPED');
      }
      this.units.delete(name);
      await this.stats.remove(name);
      return this.registry.deregister(name);
    });
  }

  /**
   * Stop every live service concurrently.
   */
  async stopAll(graceful = true): Promise<void> {
    const live = this.registry.list().filter((descriptor) => descriptor.status !== 'STOPPED');
    const results = await Promise.allSettled(live.map((descriptor) => this.stopService(descriptor.name, graceful)));

    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        log.error({ err: result.reason, service: live[index].name }, 'Failed to stop service');
      }
    });
    this.replies.retireAll();
  }

  /**
   * Call `action` on `target` on behalf of `source` and wait for the reply.
   *
   * @returns the payload of the RESPONSE
   * @throws ServiceCallError when the target answers with an ERROR or cannot take requests
   * @throws ServiceTimeoutError when no reply arrives within `timeoutMs`
   */
  async dispatchCall(
    source: string,
    target: string,
    action: string,
    payload: Payload = {},
    timeoutMs = this.options.callTimeoutMs,
  ): Promise<Payload> {
    const descriptor = this.require(target);
    if (!descriptor.inbox || (descriptor.status !== 'RUNNING' && descriptor.status !== 'DEGRADED')) {
      throw new ServiceCallError(target, ErrorReasons.SERVICE_UNAVAILABLE, `Service ${target} is ${descriptor.status}`);
    }

    const request = buildRequest(source, target, action, payload);
    const reply = this.replies.expect(request, timeoutMs);

    try {
      descriptor.inbox.send(request);
    } catch (error) {
      this.replies.retire(request.correlationId);
      throw error;
    }

    const message = await reply;
    if (!message) {
      log.warn({ source, target, action, timeoutMs, correlationId: request.correlationId }, 'Call timed out');
      throw new ServiceTimeoutError(target, action, timeoutMs);
    }
    if (message.kind === 'ERROR') {
      const { reason, message: text } = errorDetail(message);
      throw new ServiceCallError(target, reason, text);
    }

    return { ...message.payload };
  }

  /**
   * Monitor-facing status change. Goes through the registry state machine.
   */
  markStatus(name: string, status: Extract<ServiceStatus, 'RUNNING' | 'DEGRADED'>): ServiceDescriptor {
    return this.registry.updateStatus(name, status);
  }

  /**
   * Record that `name` is no longer alive. The unit is terminated if it is
   * somehow still running.
   *
   * `unitId` names the unit the verdict was made about. If the service has
   * moved on to another unit since, nothing happens.
   */
  markDead(name: string, reason: string, unitId?: string): Promise<ServiceDescriptor> {
    return this.operations.runExclusive(name, async () => {
      const descriptor = this.require(name);
      if (!isLive(descriptor.status) || this.superseded(descriptor, unitId)) {
        return descriptor;
      }

      await this.halt(name, false);
      this.registry.updateStatus(name, 'DEAD');
      this.registry.recordError(name, reason);
      log.error({ service: name, reason }, 'Service marked dead');
      this.emit('service:dead', name);
      return this.require(name);
    });
  }

  restartsRemaining(descriptor: ServiceDescriptor): number {
    const { maxRestarts, restartWindowMs } = this.options;
    const since = this.clock() - restartWindowMs;
    const counted =
      restartWindowMs > 0
        ? descriptor.restartHistory.filter((at) => at >= since).length
        : descriptor.restartCount;
    return Math.max(0, maxRestarts - counted);
  }

  async listServices(): Promise<ServiceSummary[]> {
    return Promise.all(this.registry.list().map((descriptor) => this.summarize(descriptor)));
  }

  async describeService(name: string): Promise<ServiceHealth> {
    const descriptor = this.require(name);
    const summary = await this.summarize(descriptor);
    const restartsRemaining = this.restartsRemaining(descriptor);

    return {
      ...summary,
      alive: descriptor.executionHandle?.isAlive() ?? false,
      uptimeMs: isLive(descriptor.status) ? this.clock() - descriptor.startedAt : 0,
      inboxSize: descriptor.inbox?.size ?? 0,
      restartsRemaining,
      restartLimitReached: restartsRemaining === 0,
    };
  }

  private async summarize(descriptor: ServiceDescriptor): Promise<ServiceSummary> {
    return {
      name: descriptor.name,
      status: descriptor.status,
      unitId: descriptor.executionHandle?.id ?? null,
      startedAt: descriptor.startedAt,
      restartCount: descriptor.restartCount,
      lastError: descriptor.lastError,
      stats: await this.stats.describe(descriptor.name),
    };
  }

  /**
   * Allocate an inbox, launch the unit and wait for it to reach RUNNING.
   * The registration must be STARTING.
   */
  private async launch(name: string): Promise<ServiceDescriptor> {
    const managed = this.units.get(name);
    if (!managed) {
      throw new ServiceNotFoundError(name);
    }

    const inbox = new Channel<Message>(this.options.inboxCapacity, `${name} inbox`);
    const context = new HostContext(name, {
      inbox,
      stats: this.stats,
      heartbeatIntervalMs: this.options.heartbeatIntervalMs,
      deliver: (reply) => this.replies.deliver(reply),
      call: (source, target, action, payload, timeoutMs) =>
        this.dispatchCall(source, target, action, payload, timeoutMs),
    });

    await this.stats.initialize(name);
    const launchedAt = this.clock();
    const unit = launchUnit(managed.entrypoint, context);
    managed.unit = unit;
    this.registry.attach(name, unit, inbox);

    void unit.exited.then((exit) => {
      log.info({ service: name, unit: unit.id, reason: exit.reason, code: exit.code }, 'Execution unit exited');
      this.emit('service:exit', name, exit);
    });

    const outcome = await this.awaitReadiness(name, unit, launchedAt);
    if (outcome !== 'ready') {
      await unit.terminate();
      this.release(name, inbox);
      throw new StartupError(name, outcome);
    }

    const running = this.registry.updateStatus(name, 'RUNNING');
    this.registry.recordError(name, null);
    log.info({ service: name, unit: unit.id, restartCount: running.restartCount }, 'Service running');
    this.emit('service:running', name);
    return running;
  }

  private awaitReadiness(name: string, unit: ExecutionUnit, launchedAt: number): Promise<string> {
    return new Promise<string>((resolve) => {
      let settled = false;
      const done = (outcome: string) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        this.stats.off('heartbeat', onHeartbeat);
        resolve(outcome);
      };

      const onHeartbeat = (serviceName: string, beatAt: number) => {
        if (serviceName === name && beatAt >= launchedAt && unit.isAlive()) {
          done('ready');
        }
      };

      const timer = setTimeout(
        () => done(`no heartbeat within ${this.options.startupGraceMs}ms`),
        this.options.startupGraceMs,
      );
      this.stats.on('heartbeat', onHeartbeat);

      void unit.exited.then((exit) =>
        done(`unit exited during startup (${exit.reason}${exit.error ? `: ${exit.error.message}` : ''})`),
      );
    });
  }

  /**
   * Bring the current unit of `name` down and release its inbox.
   */
  private async halt(name: string, graceful: boolean): Promise<void> {
    const managed = this.units.get(name);
    const unit = managed?.unit;
    const descriptor = this.registry.get(name);

    if (unit?.isAlive()) {
      if (graceful && descriptor?.inbox && !descriptor.inbox.closed) {
        await this.drain(name, unit, descriptor.inbox);
      }
      if (unit.isAlive()) {
        log.warn({ service: name, unit: unit.id, graceful }, 'Terminating execution unit');
        await unit.terminate();
      }
    }

    if (descriptor?.inbox) {
      this.release(name, descriptor.inbox);
    }
  }

  /**
   * The shutdown message queues behind every request already in the inbox,
   * so the service answers those before it exits. Only a full inbox falls
   * back to the out-of-band stop request.
   */
  private async drain(name: string, unit: ExecutionUnit, inbox: Channel<Message>): Promise<void> {
    try {
      inbox.send(buildShutdown(name));
    } catch (err) {
      log.warn({ err, service: name }, 'Could not queue shutdown message, requesting stop');
      unit.requestStop();
    }

    const deadline = timeout(this.options.drainTimeoutMs);
    const outcome = await Promise.race([unit.exited.then(() => 'exited' as const), deadline.promise]);
    deadline.cancel();

    if (outcome === 'timeout') {
      log.warn({ service: name, drainTimeoutMs: this.options.drainTimeoutMs }, 'Drain timeout elapsed');
    }
  }

  /**
   * Close an inbox and answer every request still queued in it, so no caller
   * waits on a message nobody will read.
   */
  private release(name: string, inbox: Channel<Message>): void {
    for (const message of inbox.close()) {
      if (message.kind === 'REQUEST' && message.sourceService !== 'supervisor') {
        this.replies.deliver(buildError(message, ErrorReasons.SERVICE_STOPPED, `Service ${name} stopped`));
      }
    }
    this.registry.detachInbox(name);
  }

  private superseded(descriptor: ServiceDescriptor, unitId: string | undefined): boolean {
    return unitId !== undefined && descriptor.executionHandle?.id !== unitId;
  }

  private require(name: string): ServiceDescriptor {
    const descriptor = this.registry.get(name);
    if (!descriptor) {
      throw new ServiceNotFoundError(name);
    }
    return descriptor;
  }
}
