import { EventEmitter } from 'node:events';
import type { z } from 'zod';
import type { ServiceContext } from './context';
import { InvalidPayloadError, ServiceCallError } from './errors';
import { ErrorReasons, buildError, buildResponse, isShutdown } from './protocol';
import type { Message, Payload } from './protocol';

/**
 * Handler for one action. `request` is the full envelope, for handlers that
 * need the caller's name or correlation id.
 */
export type ActionHandler = (payload: Payload, request: Message, context: ServiceContext) => Payload | Promise<Payload>;

/**
 * Configuration for defineService.
 *
 * actions: Handlers keyed by action name. Anything else gets an UNKNOWN_ACTION error reply.
 * heartbeatIntervalMs: Upper bound between two heartbeats while idle. Defaults to the supervisor's setting.
 * onInit: Called before the first heartbeat. Throwing fails the startup.
 * onShutdown: Called after the loop exits, whether stopped gracefully or revoked.
 * onFailure: Called when onInit or the loop itself fails.
 */
export interface ServiceConfig {
  actions: Record<string, ActionHandler>;
  heartbeatIntervalMs?: number;
  onInit?: (context: ServiceContext) => Promise<void>;
  onShutdown?: (context: ServiceContext) => Promise<void>;
  onFailure?: (error: Error, context: ServiceContext) => Promise<void>;
}

export interface ServiceInstance {
  readonly actions: string[];
  run(context: ServiceContext): Promise<void>;
  on(event: string, listener: (...args: unknown[]) => void): ServiceInstance;
  emit(event: string, ...args: unknown[]): boolean;
}

/**
 * Wrap a handler so its payload is checked against `schema` first. A payload
 * that does not match is answered with INVALID_PAYLOAD.
 *
 * @example
 * const createUser = action(z.object({ username: z.string(), email: z.string().email() }), async (user) => ({
 *   id: await users.insert(user),
 * }));
 */
export const action =
  <S extends z.ZodTypeAny>(
    schema: S,
    handle: (payload: z.infer<S>, request: Message, context: ServiceContext) => Payload | Promise<Payload>,
  ): ActionHandler =>
  (payload, request, context) => {
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new InvalidPayloadError(
        request.action,
        parsed.error.issues.map((issue) => `${issue.path.join('.') || 'payload'}: ${issue.message}`),
      );
    }
    return handle(parsed.data, request, context);
  };

const toError = (value: unknown): Error => (value instanceof Error ? value : new Error(String(value)));

/**
 * Define a service with the processing loop every unit runs.
 *
 * The loop:
 * - Calls onInit, then heartbeats once (the supervisor's readiness signal)
 * - Receives from the inbox with the heartbeat interval as timeout
 * - Heartbeats after every receive, message or not
 * - Answers each REQUEST with exactly one RESPONSE or ERROR
 * - Exits on a shutdown message, a stop request, or revocation
 * - Emits init, ready, request, failure, done
 *
 * @example
 * const pinger = defineService({
 *   actions: {
 *     ping: async () => ({ pong: true }),
 *   },
 * });
 *
 * await supervisor.startService('pinger', pinger);
 */
export const defineService = (config: ServiceConfig): ServiceInstance => {
  const emitter = new EventEmitter();

  const handle = async (request: Message, context: ServiceContext): Promise<Message> => {
    const handler = Object.hasOwn(config.actions, request.action) ? config.actions[request.action] : undefined;
    if (!handler) {
      return buildError(request, ErrorReasons.UNKNOWN_ACTION, `Unknown action ${request.action}`);
    }

    try {
      return buildResponse(request, await handler({ ...request.payload }, request, context));
    } catch (error) {
      if (error instanceof InvalidPayloadError) {
        return buildError(request, ErrorReasons.INVALID_PAYLOAD, error.message);
      }
      if (error instanceof ServiceCallError) {
        return buildError(request, error.reason, error.message);
      }
      context.logger.error({ err: error, action: request.action }, 'Action handler failed');
      return buildError(request, ErrorReasons.HANDLER_FAILED, toError(error).message);
    }
  };

  const loop = async (context: ServiceContext): Promise<void> => {
    const heartbeatIntervalMs = config.heartbeatIntervalMs ?? context.heartbeatIntervalMs;
    while (!context.stopping && !context.signal.aborted) {
      const message = await context.receive(heartbeatIntervalMs);
      await context.heartbeat();

      if (!message) continue;
      if (isShutdown(message)) break;
      if (message.kind !== 'REQUEST') {
        context.logger.warn({ correlationId: message.correlationId, kind: message.kind }, 'Ignoring non-request in inbox');
        continue;
      }

      await context.recordRequest();
      emitter.emit('request', message);
      await context.respond(await handle(message, context));
    }
  };

  const run = async (context: ServiceContext): Promise<void> => {
    try {
      emitter.emit('init');
      if (config.onInit) {
        await config.onInit(context);
      }

      await context.heartbeat();
      emitter.emit('ready');
      context.logger.info({ actions: Object.keys(config.actions) }, 'Service ready');

      await loop(context);
    } catch (error) {
      const err = toError(error);
      emitter.emit('failure', err);
      if (config.onFailure) {
        await config.onFailure(err, context);
      }
      throw err;
    } finally {
      if (config.onShutdown) {
        await config.onShutdown(context);
      }
      emitter.emit('done');
    }
  };

  const instance: ServiceInstance = {
    actions: Object.keys(config.actions),
    run,
    on: (event, listener) => {
      emitter.on(event, listener);
      return instance;
    },
    emit: (event, ...args) => emitter.emit(event, ...args),
  };

  return instance;
};
