import logger from './logger';
import type { Channel } from './channel';
import type { Message } from './protocol';
import type { ExecutionUnit } from './units';
import { DuplicateServiceError, InvalidTransitionError, ServiceNotFoundError } from './errors';

export type ServiceStatus = 'STARTING' | 'RUNNING' | 'DEGRADED' | 'DEAD' | 'STOPPED';

/**
 * Identity record of one registered service.
 * Callers only ever see copies; the registry owns the originals.
 */
export interface ServiceDescriptor {
  name: string;
  executionHandle: ExecutionUnit | null;
  inbox: Channel<Message> | null;
  status: ServiceStatus;
  startedAt: number;
  restartCount: number;
  restartHistory: number[];
  lastError: string | null;
}

export type NewServiceDescriptor = Pick<ServiceDescriptor, 'executionHandle' | 'inbox'> &
  Partial<Pick<ServiceDescriptor, 'startedAt'>>;

const TRANSITIONS: Record<ServiceStatus, readonly ServiceStatus[]> = {
  STARTING: ['RUNNING', 'DEAD', 'STOPPED'],
  RUNNING: ['DEGRADED', 'DEAD', 'STOPPED'],
  DEGRADED: ['RUNNING', 'DEAD', 'STOPPED'],
  DEAD: ['STARTING', 'STOPPED'],
  STOPPED: [],
};

const LIVE: readonly ServiceStatus[] = ['STARTING', 'RUNNING', 'DEGRADED'];

export const isLive = (status: ServiceStatus): boolean => LIVE.includes(status);

export const canTransition = (from: ServiceStatus, to: ServiceStatus): boolean =>
  from === to || TRANSITIONS[from].includes(to);

const copy = (descriptor: ServiceDescriptor): ServiceDescriptor => ({
  ...descriptor,
  restartHistory: [...descriptor.restartHistory],
});

const log = logger.child({ component: 'registry' });

/**
 * Bookkeeping of every service: identity, inbox, execution handle and status.
 *
 * Every method runs to completion synchronously, so mutations are serialized
 * by the event loop and no caller can observe a half-applied change.
 */
export class ServiceRegistry {
  private readonly services = new Map<string, ServiceDescriptor>();

  constructor(private readonly clock: () => number = Date.now) {}

  /**
   * Register `name` as STARTING. A DEAD or STOPPED entry under the same name
   * is replaced by a fresh registration.
   */
  register(name: string, descriptor: NewServiceDescriptor): ServiceDescriptor {
    const existing = this.services.get(name);
    if (existing && isLive(existing.status)) {
      throw new DuplicateServiceError(name, existing.status);
    }

    const entry: ServiceDescriptor = {
      name,
      executionHandle: descriptor.executionHandle,
      inbox: descriptor.inbox,
      status: 'STARTING',
      startedAt: descriptor.startedAt ?? this.clock(),
      restartCount: 0,
      restartHistory: [],
      lastError: null,
    };
    this.services.set(name, entry);
    log.info({ service: name, replaced: existing?.status }, 'Service registered');

    return copy(entry);
  }

  deregister(name: string): boolean {
    const removed = this.services.delete(name);
    if (removed) {
      log.info({ service: name }, 'Service deregistered');
    }
    return removed;
  }

  get(name: string): ServiceDescriptor | undefined {
    const entry = this.services.get(name);
    return entry ? copy(entry) : undefined;
  }

  has(name: string): boolean {
    return this.services.has(name);
  }

  /**
   * Snapshot of every descriptor; it does not track later changes.
   */
  list(): ServiceDescriptor[] {
    return Array.from(this.services.values(), copy);
  }

  updateStatus(name: string, status: ServiceStatus): ServiceDescriptor {
    const entry = this.require(name);
    if (entry.status === status) {
      return copy(entry);
    }
    if (!canTransition(entry.status, status)) {
      throw new InvalidTransitionError(name, entry.status, status);
    }
    if (status === 'RUNNING' && !entry.executionHandle?.isAlive()) {
      throw new InvalidTransitionError(name, entry.status, status);
    }

    const from = entry.status;
    entry.status = status;
    log.info({ service: name, from, to: status }, 'Service status updated');

    return copy(entry);
  }

  /**
   * Bind a freshly launched unit and inbox. Only a STARTING registration can
   * change its execution handle.
   */
  attach(name: string, executionHandle: ExecutionUnit, inbox: Channel<Message>): ServiceDescriptor {
    const entry = this.require(name);
    if (entry.status !== 'STARTING') {
      throw new InvalidTransitionError(name, entry.status, 'STARTING');
    }

    entry.executionHandle = executionHandle;
    entry.inbox = inbox;
    entry.startedAt = this.clock();

    return copy(entry);
  }

  /**
   * Drop the inbox reference once the supervisor has released it.
   */
  detachInbox(name: string): void {
    const entry = this.services.get(name);
    if (entry) {
      entry.inbox = null;
    }
  }

  /**
   * DEAD -> STARTING for a restart of the same registration.
   */
  beginRestart(name: string): ServiceDescriptor {
    const entry = this.require(name);
    if (entry.status !== 'DEAD') {
      throw new InvalidTransitionError(name, entry.status, 'STARTING');
    }

    entry.status = 'STARTING';
    entry.restartCount += 1;
    entry.restartHistory.push(this.clock());
    log.info({ service: name, restartCount: entry.restartCount }, 'Service restart begun');

    return copy(entry);
  }

  recordError(name: string, message: string | null): void {
    const entry = this.services.get(name);
    if (entry) {
      entry.lastError = message;
    }
  }

  private require(name: string): ServiceDescriptor {
    const entry = this.services.get(name);
    if (!entry) {
      throw new ServiceNotFoundError(name);
    }
    return entry;
  }
}
