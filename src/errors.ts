import type { ServiceStatus } from './registry';
import type { ErrorReason } from './protocol';

/**
 * Base class for every error the supervisor raises.
 * `code` is stable and safe to branch on; messages are for humans.
 */
export class SupervisorError extends Error {
  readonly code: string = 'E_SUPERVISOR';

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class DuplicateServiceError extends SupervisorError {
  override readonly code = 'E_DUPLICATE_SERVICE';

  constructor(readonly serviceName: string, readonly status: ServiceStatus) {
    super(`Service ${serviceName} is already registered (${status})`);
  }
}

export class InvalidTransitionError extends SupervisorError {
  override readonly code = 'E_INVALID_TRANSITION';

  constructor(readonly serviceName: string, readonly from: ServiceStatus, readonly to: ServiceStatus) {
    super(`Service ${serviceName} cannot move from ${from} to ${to}`);
  }
}

export class ServiceNotFoundError extends SupervisorError {
  override readonly code = 'E_SERVICE_NOT_FOUND';

  constructor(readonly serviceName: string) {
    super(`Service ${serviceName} is not registered`);
  }
}

export class StartupError extends SupervisorError {
  override readonly code = 'E_STARTUP';

  constructor(readonly serviceName: string, detail: string) {
    super(`Service ${serviceName} failed to start: ${detail}`);
  }
}

export class RestartLimitExceededError extends SupervisorError {
  override readonly code = 'E_RESTART_LIMIT';

  constructor(readonly serviceName: string, readonly maxRestarts: number) {
    super(`Service ${serviceName} exceeded its restart limit of ${maxRestarts}`);
  }
}

export class ServiceTimeoutError extends SupervisorError {
  override readonly code = 'E_SERVICE_TIMEOUT';

  constructor(readonly serviceName: string, readonly action: string, readonly timeoutMs: number) {
    super(`Call to ${serviceName}.${action} timed out after ${timeoutMs}ms`);
  }
}

/**
 * Raised on the caller side when the callee answered with an ERROR message.
 * Handlers may also throw it to pick the reason code of their reply.
 */
export class ServiceCallError extends SupervisorError {
  override readonly code = 'E_SERVICE_CALL';

  constructor(readonly serviceName: string, readonly reason: ErrorReason | string, message: string) {
    super(message);
  }
}

export class QueueOverflowError extends SupervisorError {
  override readonly code = 'E_QUEUE_OVERFLOW';

  constructor(readonly capacity: number, readonly label = 'channel') {
    super(`${label} is full (capacity ${capacity})`);
  }
}

export class ChannelClosedError extends SupervisorError {
  override readonly code = 'E_CHANNEL_CLOSED';

  constructor(readonly label = 'channel') {
    super(`${label} is closed`);
  }
}

export class InvalidPayloadError extends SupervisorError {
  override readonly code = 'E_INVALID_PAYLOAD';

  constructor(readonly action: string, readonly issues: string[]) {
    super(`Invalid payload for ${action}: ${issues.join('; ')}`);
  }
}

export class ConfigError extends SupervisorError {
  override readonly code = 'E_CONFIG';
}

/**
 * Plain-object form of an error, safe to post across a MessagePort.
 */
export interface WireError {
  name: string;
  code: string;
  message: string;
  serviceName?: string;
  reason?: string;
  action?: string;
  timeoutMs?: number;
  capacity?: number;
}

export const toWireError = (error: unknown): WireError => {
  if (error instanceof ServiceCallError) {
    return { name: error.name, code: error.code, message: error.message, serviceName: error.serviceName, reason: error.reason };
  }
  if (error instanceof ServiceTimeoutError) {
    return {
      name: error.name,
      code: error.code,
      message: error.message,
      serviceName: error.serviceName,
      action: error.action,
      timeoutMs: error.timeoutMs,
    };
  }
  if (error instanceof ServiceNotFoundError) {
    return { name: error.name, code: error.code, message: error.message, serviceName: error.serviceName };
  }
  if (error instanceof QueueOverflowError) {
    return { name: error.name, code: error.code, message: error.message, capacity: error.capacity };
  }
  if (error instanceof SupervisorError) {
    return { name: error.name, code: error.code, message: error.message };
  }
  if (error instanceof Error) {
    return { name: error.name, code: 'E_UNKNOWN', message: error.message };
  }
  return { name: 'Error', code: 'E_UNKNOWN', message: String(error) };
};

/**
 * Rebuild the error class a {@link WireError} was made from.
 * Unknown codes come back as a generic SupervisorError-shaped Error.
 */
export const fromWireError = (wire: WireError): Error => {
  switch (wire.code) {
    case 'E_SERVICE_CALL':
      return new ServiceCallError(wire.serviceName ?? 'unknown', wire.reason ?? 'HANDLER_FAILED', wire.message);
    case 'E_SERVICE_TIMEOUT':
      return new ServiceTimeoutError(wire.serviceName ?? 'unknown', wire.action ?? 'unknown', wire.timeoutMs ?? 0);
    case 'E_SERVICE_NOT_FOUND':
      return new ServiceNotFoundError(wire.serviceName ?? 'unknown');
    case 'E_QUEUE_OVERFLOW':
      return new QueueOverflowError(wire.capacity ?? 0);
    default: {
      const error = new Error(wire.message);
      error.name = wire.name;
      return error;
    }
  }
};
