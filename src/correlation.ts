import logger from './logger';
import type { Message } from './protocol';

interface PendingReply {
  caller: string;
  target: string;
  resolve: (message: Message | undefined) => void;
  timer: NodeJS.Timeout;
  startTime: number;
}

const log = logger.child({ component: 'replies' });

/**
 * Shared reply path, multiplexed by correlation id.
 *
 * Each outstanding call registers an expectation; a reply is handed only to
 * the expectation with its correlation id, and only if it comes back from the
 * service the call went to and is addressed to the caller. Expectations are
 * retired on delivery or timeout, so a late reply is dropped.
 */
export class ReplyRouter {
  private readonly pending = new Map<string, PendingReply>();
  private discardedCount = 0;

  get outstanding(): number {
    return this.pending.size;
  }

  get discarded(): number {
    return this.discardedCount;
  }

  /**
   * Wait for the reply to `request`. Resolves `undefined` after `timeoutMs`.
   */
  expect(request: Message, timeoutMs: number): Promise<Message | undefined> {
    const { correlationId } = request;
    if (this.pending.has(correlationId)) {
      return Promise.reject(new Error(`Correlation id ${correlationId} is already awaiting a reply`));
    }

    return new Promise<Message | undefined>((resolve) => {
      const timer = setTimeout(() => {
        this.retire(correlationId);
        resolve(undefined);
      }, timeoutMs);

      this.pending.set(correlationId, {
        caller: request.sourceService,
        target: request.targetService,
        resolve,
        timer,
        startTime: Date.now(),
      });
    });
  }

  /**
   * Hand a RESPONSE or ERROR to its waiting caller. Returns false when nobody
   * is waiting for it any more.
   */
  deliver(reply: Message): boolean {
    const pending = this.pending.get(reply.correlationId);
    if (
      reply.kind === 'REQUEST' ||
      !pending ||
      pending.caller !== reply.targetService ||
      pending.target !== reply.sourceService
    ) {
      this.discardedCount += 1;
      log.debug(
        { correlationId: reply.correlationId, from: reply.sourceService, action: reply.action },
        'Discarding reply with no matching call',
      );
      return false;
    }

    this.pending.delete(reply.correlationId);
    clearTimeout(pending.timer);
    log.trace({ correlationId: reply.correlationId, elapsedMs: Date.now() - pending.startTime }, 'Reply delivered');
    pending.resolve(reply);
    return true;
  }

  retire(correlationId: string): void {
    const pending = this.pending.get(correlationId);
    if (pending) {
      clearTimeout(pending.timer);
      this.pending.delete(correlationId);
    }
  }

  /**
   * Resolve every outstanding call as timed out.
   */
  retireAll(): void {
    for (const [correlationId, pending] of this.pending) {
      clearTimeout(pending.timer);
      this.pending.delete(correlationId);
      pending.resolve(undefined);
    }
  }
}
