import { Worker } from 'node:worker_threads';
import logger from './logger';
import { serveContext } from './bridge';
import type { HostContext } from './context';
import { isWorkerEntrypoint, runEntrypoint } from './entrypoint';
import type { Entrypoint, Runnable, ServiceMain, WorkerEntrypoint } from './entrypoint';

export type UnitKind = 'in-process' | 'worker';

export interface UnitExit {
  reason: 'returned' | 'crashed' | 'terminated';
  code: number | null;
  error?: Error;
}

/**
 * Opaque handle to the thing actually running a service.
 */
export interface ExecutionUnit {
  readonly id: string;
  readonly kind: UnitKind;
  /** Settles once, when the unit stops running for any reason. */
  readonly exited: Promise<UnitExit>;
  isAlive(): boolean;
  /** Ask the service to drain and exit on its own. */
  requestStop(): void;
  /** Stop the unit now, without waiting for the service. */
  terminate(): Promise<void>;
}

const log = logger.child({ component: 'units' });

let sequence = 0;

const toError = (value: unknown): Error => (value instanceof Error ? value : new Error(String(value)));

/**
 * Runs the service as its own async task on the supervisor's event loop.
 * Only a rejection of that task counts as its crash: errors thrown from the
 * service's own timers, `process.exit` or a blocking handler hit the whole
 * process. Terminating revokes the context so the task can no longer
 * receive, reply or heartbeat.
 *
 * Only launched under `isolation: 'in-process'`.
 */
class InProcessUnit implements ExecutionUnit {
  readonly kind = 'in-process';
  readonly id: string;
  readonly exited: Promise<UnitExit>;
  private alive = true;
  private settle: (exit: UnitExit) => void = () => undefined;

  constructor(entrypoint: ServiceMain | Runnable, private readonly context: HostContext) {
    sequence += 1;
    this.id = `task:${context.serviceName}#${sequence}`;
    this.exited = new Promise<UnitExit>((resolve) => {
      this.settle = resolve;
    });

    void Promise.resolve()
      .then(() => runEntrypoint(entrypoint, context))
      .then(
        () => this.finish({ reason: 'returned', code: 0 }),
        (error: unknown) => {
          const err = toError(error);
          log.error({ err, unit: this.id }, 'Service task crashed');
          this.finish({ reason: 'crashed', code: 1, error: err });
        },
      );
  }

  isAlive(): boolean {
    return this.alive;
  }

  requestStop(): void {
    this.context.requestStop();
  }

  async terminate(): Promise<void> {
    this.context.revoke();
    this.finish({ reason: 'terminated', code: null });
  }

  private finish(exit: UnitExit): void {
    if (!this.alive) return;
    this.alive = false;
    this.settle(exit);
  }
}

/**
 * Runs the service module in its own worker thread; the context is served to
 * it over the worker's message port. Uncaught errors and exits end the
 * thread, never the supervisor.
 */
class WorkerUnit implements ExecutionUnit {
  readonly kind = 'worker';
  readonly id: string;
  readonly exited: Promise<UnitExit>;
  private readonly worker: Worker;
  private alive = true;
  private terminating = false;
  private lastError: Error | undefined;

  constructor(entrypoint: WorkerEntrypoint, private readonly context: HostContext) {
    this.worker = new Worker(entrypoint.filename, {
      workerData: { serviceName: context.serviceName, heartbeatIntervalMs: context.heartbeatIntervalMs },
      execArgv: entrypoint.execArgv,
      resourceLimits: entrypoint.resourceLimits,
    });
    this.id = `worker:${context.serviceName}#${this.worker.threadId}`;

    const dispose = serveContext(this.worker, context);

    this.worker.on('error', (err) => {
      this.lastError = err;
      log.error({ err, unit: this.id }, 'Worker raised an uncaught error');
    });

    this.exited = new Promise<UnitExit>((resolve) => {
      this.worker.once('exit', (code) => {
        this.alive = false;
        dispose();
        context.revoke();

        if (this.terminating) {
          resolve({ reason: 'terminated', code });
        } else if (code === 0 && !this.lastError) {
          resolve({ reason: 'returned', code });
        } else {
          resolve({ reason: 'crashed', code, error: this.lastError ?? new Error(`Worker exited with code ${code}`) });
        }
      });
    });
  }

  isAlive(): boolean {
    return this.alive;
  }

  requestStop(): void {
    this.context.requestStop();
  }

  async terminate(): Promise<void> {
    if (!this.alive) return;
    this.terminating = true;
    this.context.revoke();
    await this.worker.terminate();
    await this.exited;
  }
}

/**
 * Start an execution unit for `entrypoint` bound to `context`.
 */
export const launchUnit = (entrypoint: Entrypoint, context: HostContext): ExecutionUnit =>
  isWorkerEntrypoint(entrypoint) ? new WorkerUnit(entrypoint, context) : new InProcessUnit(entrypoint, context);
