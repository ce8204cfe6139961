import logger from './logger';

/**
 * Signal constants for graceful shutdown.
 */
export const SIGTERM = Symbol('SIGTERM');
export const SIGINT = Symbol('SIGINT');

/**
 * Type representing a graceful shutdown signal.
 */
export type ShutdownSignal = typeof SIGTERM | typeof SIGINT;

/**
 * Cleanup run before the orchestrator process exits, with the signal received.
 */
export type OnShutdownCallback = (signal: ShutdownSignal) => Promise<void>;

export interface ShutdownHandlerOptions {
  /** Defaults to process.exit. */
  exit?: (code: number) => void;
}

/**
 * Register SIGTERM and SIGINT handlers for the orchestrator process.
 *
 * On the first signal:
 * 1. Logs the signal received
 * 2. Calls onShutdown (stop the monitor, drain every service)
 * 3. Exits with 0, or 1 if onShutdown threw
 *
 * A second signal while shutting down exits immediately with 1.
 * Returns a function that removes the handlers.
 */
export const setupShutdownHandlers = (
  onShutdown?: OnShutdownCallback,
  { exit = (code) => process.exit(code) }: ShutdownHandlerOptions = {},
): (() => void) => {
  let shuttingDown = false;

  const handleSignal = (nodeSignal: NodeJS.Signals, shutdownSignal: ShutdownSignal) => {
    return async () => {
      if (shuttingDown) {
        logger.warn({ signal: nodeSignal }, 'Signal received during shutdown, exiting now');
        exit(1);
        return;
      }
      shuttingDown = true;
      logger.info({ signal: nodeSignal }, 'Signal received, initiating graceful shutdown');

      let code = 0;
      try {
        if (onShutdown) await onShutdown(shutdownSignal);
      } catch (error) {
        logger.error({ err: error, signal: nodeSignal }, 'Error during shutdown');
        code = 1;
      }

      exit(code);
    };
  };

  const onTerm = handleSignal('SIGTERM', SIGTERM);
  const onInt = handleSignal('SIGINT', SIGINT);
  process.on('SIGTERM', onTerm);
  process.on('SIGINT', onInt);

  return () => {
    process.off('SIGTERM', onTerm);
    process.off('SIGINT', onInt);
  };
};
