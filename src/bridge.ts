import { parentPort, workerData } from 'node:worker_threads';
import type { Logger } from 'pino';
import { z } from 'zod';
import logger from './logger';
import { fromWireError, toWireError } from './errors';
import type { WireError } from './errors';
import { messageSchema, parseMessage } from './protocol';
import type { Message, Payload } from './protocol';
import type { HostContext, ServiceContext } from './context';
import { runEntrypoint } from './entrypoint';
import type { Runnable, ServiceMain } from './entrypoint';

/**
 * The part of a Worker or MessagePort the bridge needs.
 */
export interface BridgePort {
  postMessage(value: unknown): void;
  on(event: 'message', listener: (value: unknown) => void): unknown;
  off(event: 'message', listener: (value: unknown) => void): unknown;
}

const rpcBase = { type: z.literal('rpc'), id: z.number().int() };

const rpcRequestSchema = z.discriminatedUnion('op', [
  z.object({ ...rpcBase, op: z.literal('receive'), timeoutMs: z.number().nonnegative().optional() }),
  z.object({ ...rpcBase, op: z.literal('respond'), reply: messageSchema }),
  z.object({ ...rpcBase, op: z.literal('heartbeat') }),
  z.object({ ...rpcBase, op: z.literal('recordRequest') }),
  z.object({ ...rpcBase, op: z.literal('increment'), counter: z.string().min(1), by: z.number() }),
  z.object({
    ...rpcBase,
    op: z.literal('call'),
    target: z.string().min(1),
    action: z.string().min(1),
    payload: z.record(z.unknown()),
    timeoutMs: z.number().positive().optional(),
  }),
]);

export type RpcRequest = z.infer<typeof rpcRequestSchema>;

const wireErrorSchema = z.object({
  name: z.string(),
  code: z.string(),
  message: z.string(),
  serviceName: z.string().optional(),
  reason: z.string().optional(),
  action: z.string().optional(),
  timeoutMs: z.number().optional(),
  capacity: z.number().optional(),
});

const hostFrameSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('rpc-result'), id: z.number().int(), ok: z.literal(true), value: z.unknown() }),
  z.object({ type: z.literal('rpc-error'), id: z.number().int(), error: wireErrorSchema }),
  z.object({ type: z.literal('stop') }),
]);

const workerDataSchema = z.object({
  serviceName: z.string().min(1),
  heartbeatIntervalMs: z.number().positive().default(1000),
});

const log = logger.child({ component: 'bridge' });

const execute = async (context: HostContext, request: RpcRequest): Promise<unknown> => {
  switch (request.op) {
    case 'receive':
      return (await context.receive(request.timeoutMs)) ?? null;
    case 'respond': {
      const reply = parseMessage(request.reply);
      return reply ? context.respond(reply) : false;
    }
    case 'heartbeat':
      await context.heartbeat();
      return null;
    case 'recordRequest':
      return context.recordRequest();
    case 'increment':
      return context.increment(request.counter, request.by);
    case 'call':
      return context.call(request.target, request.action, request.payload, request.timeoutMs);
  }
};

/**
 * Host side: answer the RPC frames a worker posts with `context`, and tell the
 * worker when a graceful stop is requested. Returns a disposer.
 */
export const serveContext = (port: BridgePort, context: HostContext): (() => void) => {
  const post = (frame: Record<string, unknown>) => {
    if (!context.revoked) port.postMessage(frame);
  };

  const onMessage = (value: unknown) => {
    const parsed = rpcRequestSchema.safeParse(value);
    if (!parsed.success) {
      log.warn({ service: context.serviceName, issues: parsed.error.issues }, 'Ignoring malformed frame from worker');
      return;
    }

    const request = parsed.data;
    void execute(context, request)
      .then((result) => post({ type: 'rpc-result', id: request.id, ok: true, value: result }))
      .catch((error: unknown) => post({ type: 'rpc-error', id: request.id, error: toWireError(error) }));
  };

  port.on('message', onMessage);
  const offStop = context.onStop(() => post({ type: 'stop' }));

  return () => {
    port.off('message', onMessage);
    offStop();
  };
};

interface PendingRpc {
  resolve: (value: unknown) => void;
  reject: (error: Error) => void;
}

/**
 * Worker side: a {@link ServiceContext} whose every operation is an RPC to the
 * host that launched the worker.
 */
export class PortContext implements ServiceContext {
  readonly logger: Logger;
  private readonly controller = new AbortController();
  private readonly pending = new Map<number, PendingRpc>();
  private nextId = 1;
  private stopRequested = false;

  constructor(
    readonly serviceName: string,
    private readonly port: BridgePort,
    readonly heartbeatIntervalMs = 1000,
  ) {
    this.logger = logger.child({ service: serviceName, thread: 'worker' });
    this.port.on('message', this.onMessage);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get stopping(): boolean {
    return this.stopRequested;
  }

  async receive(timeoutMs?: number): Promise<Message | undefined> {
    const value = await this.request({ op: 'receive', timeoutMs });
    return value === null ? undefined : parseMessage(value);
  }

  async respond(reply: Message): Promise<boolean> {
    return (await this.request({ op: 'respond', reply })) === true;
  }

  async heartbeat(): Promise<void> {
    await this.request({ op: 'heartbeat' });
  }

  recordRequest(): Promise<number> {
    return this.request({ op: 'recordRequest' }).then(Number);
  }

  increment(counter: string, by = 1): Promise<number> {
    return this.request({ op: 'increment', counter, by }).then(Number);
  }

  async call(target: string, action: string, payload: Payload = {}, timeoutMs?: number): Promise<Payload> {
    const value = await this.request({ op: 'call', target, action, payload, timeoutMs });
    return z.record(z.unknown()).parse(value);
  }

  /**
   * Stop listening and fail whatever is still in flight.
   */
  close(): void {
    this.port.off('message', this.onMessage);
    this.controller.abort();
    for (const [id, pending] of this.pending) {
      this.pending.delete(id);
      pending.reject(new Error(`Bridge for ${this.serviceName} closed`));
    }
  }

  private request(body: Record<string, unknown> & { op: RpcRequest['op'] }): Promise<unknown> {
    if (this.controller.signal.aborted) {
      return Promise.reject(new Error(`Bridge for ${this.serviceName} closed`));
    }

    const id = this.nextId++;
    return new Promise<unknown>((resolve, reject) => {
      this.pending.set(id, { resolve, reject });
      this.port.postMessage({ type: 'rpc', id, ...body });
    });
  }

  private readonly onMessage = (value: unknown): void => {
    const parsed = hostFrameSchema.safeParse(value);
    if (!parsed.success) {
      this.logger.warn({ issues: parsed.error.issues }, 'Ignoring malformed frame from host');
      return;
    }

    const frame = parsed.data;
    if (frame.type === 'stop') {
      this.stopRequested = true;
      return;
    }

    const pending = this.pending.get(frame.id);
    if (!pending) return;
    this.pending.delete(frame.id);

    if (frame.type === 'rpc-result') {
      pending.resolve(frame.value);
    } else {
      const wire: WireError = frame.error;
      pending.reject(fromWireError(wire));
    }
  };
}

export const connectContext = (port: BridgePort, serviceName: string, heartbeatIntervalMs?: number): PortContext =>
  new PortContext(serviceName, port, heartbeatIntervalMs);

/**
 * Run `entrypoint` as the body of the current worker thread. Exits the
 * worker with code 1 if the service crashes.
 */
export const runInWorker = async (entrypoint: ServiceMain | Runnable): Promise<void> => {
  const port = parentPort;
  if (!port) {
    throw new Error('runInWorker must be called from inside a worker thread');
  }

  const { serviceName, heartbeatIntervalMs } = workerDataSchema.parse(workerData);
  const context = connectContext(port, serviceName, heartbeatIntervalMs);

  try {
    await runEntrypoint(entrypoint, context);
  } catch (err) {
    context.logger.error({ err }, 'Service crashed');
    process.exitCode = 1;
  } finally {
    context.close();
  }
};
