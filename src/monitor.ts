import { EventEmitter } from 'node:events';
import logger from './logger';
import type { ServiceDescriptor, ServiceStatus } from './registry';
import type { HeartbeatRecord } from './stats';
import type { Supervisor } from './supervisor';

export interface MonitorOptions {
  checkIntervalMs: number;
  /** Heartbeat age past which a service is DEGRADED. */
  heartbeatSlowMs: number;
  /** Heartbeat age past which a service is DEAD. */
  heartbeatDeadMs: number;
  autoRestart: boolean;
}

export const DEFAULT_MONITOR_OPTIONS: MonitorOptions = {
  checkIntervalMs: 5000,
  heartbeatSlowMs: 5000,
  heartbeatDeadMs: 15000,
  autoRestart: true,
};

export type HealthVerdict = 'healthy' | 'slow' | 'dead';

export interface HealthCheckResult {
  name: string;
  verdict: HealthVerdict;
  heartbeatAgeMs: number | null;
  reason?: string;
  status: ServiceStatus;
}

const log = logger.child({ component: 'monitor' });

const isWatched = (status: ServiceStatus): boolean => status === 'RUNNING' || status === 'DEGRADED';

/**
 * Background loop that checks every RUNNING or DEGRADED service: is its unit
 * alive, and how old is its last heartbeat. Every resulting state change
 * goes through the supervisor.
 *
 * Events: `dead` (name, reason), `degraded` (name), `recovered` (name),
 * `restarted` (name, restartCount), `restart-failed` (name, error),
 * `check` (results).
 */
export class HealthMonitor extends EventEmitter {
  readonly options: MonitorOptions;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<HealthCheckResult[]> | null = null;
  private active = false;

  constructor(
    private readonly supervisor: Supervisor,
    options: Partial<MonitorOptions> = {},
    private readonly clock: () => number = Date.now,
  ) {
    super();
    this.options = { ...DEFAULT_MONITOR_OPTIONS, ...options };

    if (this.options.heartbeatSlowMs >= this.options.heartbeatDeadMs) {
      throw new RangeError(
        `heartbeatSlowMs (${this.options.heartbeatSlowMs}) must be lower than heartbeatDeadMs (${this.options.heartbeatDeadMs})`,
      );
    }
  }

  get running(): boolean {
    return this.active;
  }

  start(): void {
    if (this.active) return;
    this.active = true;
    this.schedule();
    log.info({ checkIntervalMs: this.options.checkIntervalMs }, 'Health monitor started');
  }

  async stop(): Promise<void> {
    this.active = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    log.info('Health monitor stopped');
  }

  /**
   * Run one check cycle. A call made while a cycle is in flight joins it.
   */
  checkAll(): Promise<HealthCheckResult[]> {
    if (!this.inFlight) {
      this.inFlight = this.runChecks().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  /**
   * Verdict for one service, without acting on it.
   */
  classify(descriptor: ServiceDescriptor, record: HeartbeatRecord | undefined): Omit<HealthCheckResult, 'name' | 'status'> {
    const lastBeatAt = record?.lastBeatAt ?? null;
    const heartbeatAgeMs = this.clock() - (lastBeatAt ?? descriptor.startedAt);

    if (!descriptor.executionHandle?.isAlive()) {
      return { verdict: 'dead', heartbeatAgeMs, reason: 'execution unit is not alive' };
    }
    if (heartbeatAgeMs > this.options.heartbeatDeadMs) {
      return { verdict: 'dead', heartbeatAgeMs, reason: `no heartbeat for ${heartbeatAgeMs}ms` };
    }
    if (heartbeatAgeMs > this.options.heartbeatSlowMs) {
      return { verdict: 'slow', heartbeatAgeMs, reason: `last heartbeat ${heartbeatAgeMs}ms ago` };
    }
    return { verdict: 'healthy', heartbeatAgeMs };
  }

  private schedule(): void {
    this.timer = setTimeout(() => {
      void this.checkAll().finally(() => {
        if (this.active) this.schedule();
      });
    }, this.options.checkIntervalMs);
  }

  private async runChecks(): Promise<HealthCheckResult[]> {
    const watched = this.supervisor.registry
      .list()
      .filter((descriptor) => isWatched(descriptor.status))
      .map((descriptor) => descriptor.name);

    const results: HealthCheckResult[] = [];
    for (const name of watched) {
      try {
        const result = await this.checkService(name);
        if (result) results.push(result);
      } catch (err) {
        log.error({ err, service: name }, 'Health check failed');
      }
    }

    this.emit('check', results);
    return results;
  }

  /**
   * Check `name` as it is now. Earlier checks in the cycle may have taken a
   * while, so the descriptor is read here rather than from the cycle's list.
   */
  private async checkService(name: string): Promise<HealthCheckResult | undefined> {
    const record = await this.supervisor.stats.get(name);
    const descriptor = this.supervisor.registry.get(name);
    if (!descriptor || !isWatched(descriptor.status)) {
      return undefined;
    }

    const verdict = this.classify(descriptor, record);
    const unitId = descriptor.executionHandle?.id;

    switch (verdict.verdict) {
      case 'dead':
        return { name, ...verdict, status: await this.handleDeath(name, verdict.reason ?? 'dead', unitId) };
      case 'slow':
        if (descriptor.status === 'RUNNING') {
          log.warn({ service: name, heartbeatAgeMs: verdict.heartbeatAgeMs }, 'Service degraded');
          this.supervisor.markStatus(name, 'DEGRADED');
          this.emit('degraded', name);
        }
        return { name, ...verdict, status: 'DEGRADED' };
      case 'healthy':
        if (descriptor.status === 'DEGRADED') {
          log.info({ service: name }, 'Service recovered');
          this.supervisor.markStatus(name, 'RUNNING');
          this.emit('recovered', name);
        }
        return { name, ...verdict, status: 'RUNNING' };
    }
  }

  private async handleDeath(name: string, reason: string, unitId: string | undefined): Promise<ServiceStatus> {
    const dead = await this.supervisor.markDead(name, reason, unitId);
    if (dead.status !== 'DEAD' || dead.executionHandle?.id !== unitId) {
      log.info({ service: name, unit: unitId }, 'Unit replaced before it could be marked dead');
      return dead.status;
    }
    this.emit('dead', name, reason);

    if (!this.options.autoRestart) {
      return 'DEAD';
    }

    try {
      const restarted = await this.supervisor.restartService(name, unitId);
      if (restarted.restartCount > dead.restartCount) {
        this.emit('restarted', name, restarted.restartCount);
      }
      return restarted.status;
    } catch (err) {
      log.error({ err, service: name }, 'Automatic restart failed');
      this.emit('restart-failed', name, err);
      return 'DEAD';
    }
  }
}
