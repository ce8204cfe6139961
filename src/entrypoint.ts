import type { ServiceContext } from './context';

/**
 * Body of a service. Resolving means the unit exited on its own; rejecting
 * means it crashed.
 */
export type ServiceMain = (context: ServiceContext) => Promise<void>;

export interface Runnable {
  run: ServiceMain;
}

/**
 * A module run in its own worker thread. The module is expected to call
 * `runInWorker` with its service.
 */
export interface WorkerEntrypoint {
  kind: 'worker';
  filename: string;
  execArgv?: string[];
  resourceLimits?: {
    maxOldGenerationSizeMb?: number;
    maxYoungGenerationSizeMb?: number;
    stackSizeMb?: number;
  };
}

export type Entrypoint = ServiceMain | Runnable | WorkerEntrypoint;

export const workerEntrypoint = (
  filename: string,
  options: Omit<WorkerEntrypoint, 'kind' | 'filename'> = {},
): WorkerEntrypoint => ({ kind: 'worker', filename, ...options });

export const isWorkerEntrypoint = (entrypoint: Entrypoint): entrypoint is WorkerEntrypoint =>
  typeof entrypoint === 'object' && 'kind' in entrypoint && entrypoint.kind === 'worker';

export const runEntrypoint = (entrypoint: ServiceMain | Runnable, context: ServiceContext): Promise<void> =>
  typeof entrypoint === 'function' ? entrypoint(context) : entrypoint.run(context);
