import { randomUUID } from 'node:crypto';
import { z } from 'zod';

export type MessageKind = 'REQUEST' | 'RESPONSE' | 'ERROR';

/**
 * Structured key/value data carried by a message.
 */
export type Payload = Record<string, unknown>;

/**
 * Machine-readable reasons carried in the payload of an ERROR message.
 */
export const ErrorReasons = {
  UNKNOWN_ACTION: 'UNKNOWN_ACTION',
  INVALID_PAYLOAD: 'INVALID_PAYLOAD',
  HANDLER_FAILED: 'HANDLER_FAILED',
  SERVICE_STOPPED: 'SERVICE_STOPPED',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
} as const;

export type ErrorReason = (typeof ErrorReasons)[keyof typeof ErrorReasons];

/**
 * Control action asking a service loop to finish queued work and exit.
 */
export const SHUTDOWN_ACTION = 'system.shutdown';

/**
 * Unit of inter-service communication. Frozen once built.
 */
export interface Message {
  readonly correlationId: string;
  readonly sourceService: string;
  readonly targetService: string;
  readonly action: string;
  readonly payload: Readonly<Payload>;
  readonly kind: MessageKind;
  readonly timestamp: number;
}

export const messageSchema = z.object({
  correlationId: z.string().min(1),
  sourceService: z.string().min(1),
  targetService: z.string().min(1),
  action: z.string().min(1),
  payload: z.record(z.unknown()),
  kind: z.enum(['REQUEST', 'RESPONSE', 'ERROR']),
  timestamp: z.number(),
});

const freeze = (message: Message): Message => {
  Object.freeze(message.payload);
  return Object.freeze(message);
};

export const buildRequest = (source: string, target: string, action: string, payload: Payload = {}): Message =>
  freeze({
    correlationId: randomUUID(),
    sourceService: source,
    targetService: target,
    action,
    payload: { ...payload },
    kind: 'REQUEST',
    timestamp: Date.now(),
  });

/**
 * Build the reply to `request`. The correlation id is copied verbatim so the
 * caller can match replies that arrive out of order.
 */
export const buildResponse = (request: Message, payload: Payload = {}, ok = true): Message =>
  freeze({
    correlationId: request.correlationId,
    sourceService: request.targetService,
    targetService: request.sourceService,
    action: request.action,
    payload: { ...payload },
    kind: ok ? 'RESPONSE' : 'ERROR',
    timestamp: Date.now(),
  });

export const buildError = (request: Message, reason: ErrorReason | string, message: string): Message =>
  buildResponse(request, { reason, message }, false);

export const buildShutdown = (target: string): Message => buildRequest('supervisor', target, SHUTDOWN_ACTION);

export const isShutdown = (message: Message): boolean =>
  message.kind === 'REQUEST' && message.action === SHUTDOWN_ACTION;

/**
 * Validate the envelope of a value that crossed an execution-unit boundary.
 * Payload contents are the receiving handler's business.
 */
export const parseMessage = (value: unknown): Message | undefined => {
  const result = messageSchema.safeParse(value);
  return result.success ? freeze(result.data) : undefined;
};

export const isMessage = (value: unknown): value is Message => messageSchema.safeParse(value).success;

/**
 * Read `{ reason, message }` out of an ERROR message.
 */
export const errorDetail = (message: Message): { reason: string; message: string } => {
  const { reason, message: text } = message.payload;
  return {
    reason: typeof reason === 'string' ? reason : ErrorReasons.HANDLER_FAILED,
    message: typeof text === 'string' ? text : `${message.sourceService}.${message.action} failed`,
  };
};
