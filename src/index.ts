// Logger
export { default as logger } from './logger';

// Configuration
export { loadConfig } from './config';
export type { SupervisorConfig } from './config';

// Errors
export {
  SupervisorError,
  DuplicateServiceError,
  InvalidTransitionError,
  ServiceNotFoundError,
  StartupError,
  RestartLimitExceededError,
  ServiceTimeoutError,
  ServiceCallError,
  QueueOverflowError,
  ChannelClosedError,
  InvalidPayloadError,
  ConfigError,
} from './errors';

// Message protocol
export {
  buildRequest,
  buildResponse,
  buildError,
  parseMessage,
  isMessage,
  errorDetail,
  ErrorReasons,
  SHUTDOWN_ACTION,
} from './protocol';
export type { Message, MessageKind, Payload, ErrorReason } from './protocol';

// Channels and shared state
export { Channel } from './channel';
export { Mutex, KeyedMutex } from './mutex';
export { StatisticsStore } from './stats';
export type { HeartbeatRecord, ServiceStats } from './stats';
export { ServiceRegistry } from './registry';
export type { ServiceDescriptor, ServiceStatus } from './registry';

// Supervision
export { Supervisor } from './supervisor';
export type { SupervisorOptions, ServiceSummary, ServiceHealth } from './supervisor';
export { HealthMonitor } from './monitor';
export type { MonitorOptions, HealthVerdict, HealthCheckResult } from './monitor';
export { workerEntrypoint } from './entrypoint';
export type { Entrypoint, ServiceMain, Runnable, WorkerEntrypoint } from './entrypoint';
export type { ExecutionUnit, UnitExit, UnitKind } from './units';

// Services
export { defineService, action } from './service';
export type { ServiceConfig, ServiceInstance, ActionHandler } from './service';
export type { ServiceContext } from './context';
export { runInWorker } from './bridge';

// Orchestrator lifecycle
export { defineOrchestrator, GATEWAY_SOURCE } from './lifecycle';
export type { OrchestratorConfig, OrchestratorInstance } from './lifecycle';

// Health checks
export { startHealthCheckServer } from './healthcheck';
export type { HealthCheckService, HealthCheckStatus, HealthState, HealthReporter } from './healthcheck';

// Shutdown management
export { setupShutdownHandlers, SIGTERM, SIGINT } from './shutdown';
export type { ShutdownSignal, OnShutdownCallback } from './shutdown';
