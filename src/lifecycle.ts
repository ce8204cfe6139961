import { EventEmitter } from 'node:events';
import logger from './logger';
import { loadConfig } from './config';
import type { SupervisorConfig } from './config';
import type { Entrypoint } from './entrypoint';
import { ConfigError } from './errors';
import { setupShutdownHandlers } from './shutdown';
import { startHealthCheckServer } from './healthcheck';
import type { HealthCheckService, HealthState } from './healthcheck';
import { HealthMonitor } from './monitor';
import type { Payload } from './protocol';
import type { ServiceDescriptor } from './registry';
import { Supervisor } from './supervisor';
import type { ServiceHealth, ServiceSummary } from './supervisor';

/**
 * Name calls made through the orchestrator are sent from.
 */
export const GATEWAY_SOURCE = 'gateway';

/**
 * Configuration for defineOrchestrator.
 *
 * settings: Overrides on top of the environment (see loadConfig).
 * env: Environment to read settings from. Defaults to process.env.
 * services: Services started, in order, during init.
 * handleSignals: Install SIGTERM/SIGINT handlers. Defaults to true.
 * onInit: Called before any service starts.
 * onFailure: Called when init fails.
 * onShutdown: Called after every service has stopped.
 * clock: Time source for the registry, store and monitor.
 */
export interface OrchestratorConfig {
  settings?: Partial<SupervisorConfig>;
  env?: Record<string, string | undefined>;
  services?: Record<string, Entrypoint>;
  handleSignals?: boolean;
  onInit?: () => Promise<void>;
  onFailure?: (error: Error) => Promise<void>;
  onShutdown?: () => Promise<void>;
  clock?: () => number;
}

/**
 * Orchestrator instance returned by defineOrchestrator: lifecycle control,
 * the generic call entry point and introspection, for whatever sits in front
 * of it (an HTTP gateway, a CLI, tests).
 */
export interface OrchestratorInstance {
  readonly settings: SupervisorConfig;
  readonly supervisor: Supervisor;
  readonly monitor: HealthMonitor;
  init(): Promise<void>;
  shutdown(): Promise<void>;
  getHealthState(): Promise<HealthState>;
  startService(name: string, entrypoint: Entrypoint): Promise<ServiceDescriptor>;
  stopService(name: string, graceful?: boolean): Promise<ServiceDescriptor>;
  restartService(name: string): Promise<ServiceDescriptor>;
  call(target: string, action: string, payload?: Payload, timeoutMs?: number): Promise<Payload>;
  listServices(): Promise<ServiceSummary[]>;
  getServiceHealth(name: string): Promise<ServiceHealth>;
  on(event: string, listener: (...args: unknown[]) => void): OrchestratorInstance;
  emit(event: string, ...args: unknown[]): boolean;
}

const FORWARDED_MONITOR_EVENTS = ['dead', 'degraded', 'recovered', 'restarted', 'restart-failed'] as const;

/**
 * Define the orchestrator: supervisor, health monitor, health check server and
 * signal handling, wired together.
 *
 * Emits init, ready, failure, done, plus the monitor's dead, degraded,
 * recovered, restarted and restart-failed.
 *
 * @example
 * const orchestrator = defineOrchestrator({
 *   services: {
 *     users: workerEntrypoint(path.join(__dirname, 'services/users.js')),
 *     orders: workerEntrypoint(path.join(__dirname, 'services/orders.js')),
 *   },
 * });
 *
 * await orchestrator.init();
 * await orchestrator.call('users', 'ping');
 */
export const defineOrchestrator = (config: OrchestratorConfig = {}): OrchestratorInstance => {
  const emitter = new EventEmitter();
  const settings: SupervisorConfig = { ...loadConfig(config.env), ...config.settings };
  if (settings.heartbeatIntervalMs >= settings.heartbeatSlowMs) {
    throw new ConfigError(
      `heartbeatIntervalMs (${settings.heartbeatIntervalMs}) must be lower than heartbeatSlowMs (${settings.heartbeatSlowMs})`,
    );
  }
  const clock = config.clock ?? Date.now;

  const supervisor = new Supervisor(
    {
      maxRestarts: settings.maxRestarts,
      restartWindowMs: settings.restartWindowMs,
      callTimeoutMs: settings.callTimeoutMs,
      heartbeatIntervalMs: settings.heartbeatIntervalMs,
      inboxCapacity: settings.inboxCapacity,
      startupGraceMs: settings.startupGraceMs,
      drainTimeoutMs: settings.drainTimeoutMs,
      isolation: settings.isolation,
    },
    { clock },
  );

  const monitor = new HealthMonitor(
    supervisor,
    {
      checkIntervalMs: settings.checkIntervalMs,
      heartbeatSlowMs: settings.heartbeatSlowMs,
      heartbeatDeadMs: settings.heartbeatDeadMs,
      autoRestart: settings.autoRestart,
    },
    clock,
  );

  for (const event of FORWARDED_MONITOR_EVENTS) {
    monitor.on(event, (...args: unknown[]) => emitter.emit(event, ...args));
  }

  let healthCheckService: HealthCheckService | null = null;
  let removeSignalHandlers: (() => void) | null = null;

  /**
   * Healthy when every registered service is RUNNING (STOPPED ones are ignored).
   */
  const getHealthState = async (): Promise<HealthState> => {
    const descriptors = supervisor.registry.list();
    const services = Object.fromEntries(descriptors.map((descriptor) => [descriptor.name, descriptor.status]));
    const healthy = descriptors.every((descriptor) => descriptor.status === 'RUNNING' || descriptor.status === 'STOPPED');

    return {
      healthy,
      timestamp: clock(),
      services,
      monitoring: monitor.running,
      outstandingCalls: supervisor.replies.outstanding,
    };
  };

  const getServiceHealth = (name: string): Promise<ServiceHealth> => supervisor.describeService(name);

  const teardown = async (): Promise<void> => {
    await monitor.stop();
    await supervisor.stopAll();

    if (healthCheckService) {
      await healthCheckService.close();
      healthCheckService = null;
    }
    if (removeSignalHandlers) {
      removeSignalHandlers();
      removeSignalHandlers = null;
    }
  };

  /**
   * Stop monitoring, drain every service, close the health check server.
   */
  const shutdown = async (): Promise<void> => {
    logger.info('Initiating graceful shutdown...');

    await teardown();

    if (config.onShutdown) {
      await config.onShutdown();
    }

    emitter.emit('done');
  };

  /**
   * Start the health check server, signal handlers, configured services and
   * the monitor, in that order.
   */
  const init = async (): Promise<void> => {
    try {
      emitter.emit('init');

      if (config.onInit) {
        await config.onInit();
      }

      if (settings.healthPort !== null) {
        healthCheckService = startHealthCheckServer({ getHealthState, getServiceHealth }, settings.healthPort);
      }

      if (config.handleSignals ?? true) {
        removeSignalHandlers = setupShutdownHandlers(shutdown);
      }

      for (const [name, entrypoint] of Object.entries(config.services ?? {})) {
        await supervisor.startService(name, entrypoint);
      }

      monitor.start();
      emitter.emit('ready');
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      emitter.emit('failure', err);
      await teardown();
      if (config.onFailure) {
        await config.onFailure(err);
      }
      throw err;
    }
  };

  const instance: OrchestratorInstance = {
    settings,
    supervisor,
    monitor,
    init,
    shutdown,
    getHealthState,
    startService: (name, entrypoint) => supervisor.startService(name, entrypoint),
    stopService: (name, graceful = true) => supervisor.stopService(name, graceful),
    restartService: (name) => supervisor.restartService(name),
    call: (target, action, payload = {}, timeoutMs) =>
      supervisor.dispatchCall(GATEWAY_SOURCE, target, action, payload, timeoutMs),
    listServices: () => supervisor.listServices(),
    getServiceHealth,
    on: (event, listener) => {
      emitter.on(event, listener);
      return instance;
    },
    emit: (event, ...args) => emitter.emit(event, ...args),
  };

  return instance;
};
