import type { Logger } from 'pino';
import logger from './logger';
import type { Channel } from './channel';
import type { StatisticsStore } from './stats';
import type { Message, Payload } from './protocol';

/**
 * Everything a running service can do. The supervisor hands one to each unit
 * it launches; worker units get a port-backed proxy of the same shape.
 */
export interface ServiceContext {
  readonly serviceName: string;
  /** Aborted once the unit has been terminated. */
  readonly signal: AbortSignal;
  /** True once a graceful stop has been requested. */
  readonly stopping: boolean;
  readonly logger: Logger;
  /** Longest a service should go without a heartbeat while idle. */
  readonly heartbeatIntervalMs: number;
  receive(timeoutMs?: number): Promise<Message | undefined>;
  respond(reply: Message): Promise<boolean>;
  heartbeat(): Promise<void>;
  recordRequest(): Promise<number>;
  increment(counter: string, by?: number): Promise<number>;
  call(target: string, action: string, payload?: Payload, timeoutMs?: number): Promise<Payload>;
}

/**
 * What the supervisor lends a context.
 */
export interface HostBindings {
  inbox: Channel<Message>;
  stats: StatisticsStore;
  heartbeatIntervalMs: number;
  deliver: (reply: Message) => boolean;
  call: (source: string, target: string, action: string, payload: Payload, timeoutMs?: number) => Promise<Payload>;
}

/**
 * Context backed by the supervisor's own inbox, store and reply router.
 *
 * Revoking it (forced termination) cuts the unit off: receives return nothing,
 * replies and heartbeats are dropped, so a unit that kept running after being
 * replaced cannot pass itself off as the new instance.
 */
export class HostContext implements ServiceContext {
  readonly logger: Logger;
  private readonly controller = new AbortController();
  private readonly stopListeners = new Set<() => void>();
  private stopRequested = false;

  constructor(
    readonly serviceName: string,
    private readonly bindings: HostBindings,
  ) {
    this.logger = logger.child({ service: serviceName });
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get stopping(): boolean {
    return this.stopRequested;
  }

  get heartbeatIntervalMs(): number {
    return this.bindings.heartbeatIntervalMs;
  }

  get revoked(): boolean {
    return this.controller.signal.aborted;
  }

  requestStop(): void {
    if (this.stopRequested) return;
    this.stopRequested = true;
    for (const listener of this.stopListeners) {
      listener();
    }
  }

  onStop(listener: () => void): () => void {
    this.stopListeners.add(listener);
    return () => this.stopListeners.delete(listener);
  }

  revoke(): void {
    this.controller.abort();
  }

  receive(timeoutMs?: number): Promise<Message | undefined> {
    if (this.revoked) {
      return Promise.resolve(undefined);
    }
    return this.bindings.inbox.receive(timeoutMs, this.controller.signal);
  }

  async respond(reply: Message): Promise<boolean> {
    if (this.revoked) {
      this.logger.debug({ correlationId: reply.correlationId }, 'Dropping reply from terminated unit');
      return false;
    }
    return this.bindings.deliver(reply);
  }

  async heartbeat(): Promise<void> {
    if (this.revoked) return;
    await this.bindings.stats.recordHeartbeat(this.serviceName);
  }

  recordRequest(): Promise<number> {
    return this.bindings.stats.recordRequest(this.serviceName);
  }

  increment(counter: string, by = 1): Promise<number> {
    return this.bindings.stats.increment(this.serviceName, counter, by);
  }

  call(target: string, action: string, payload: Payload = {}, timeoutMs?: number): Promise<Payload> {
    return this.bindings.call(this.serviceName, target, action, payload, timeoutMs);
  }
}
