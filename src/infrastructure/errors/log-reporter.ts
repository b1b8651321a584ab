import type { Logger } from 'pino';
import type { ErrorReporter } from '../../domain/index.js';

/** Caller-supplied hook invoked for every reported error. */
export type ErrorHandler = (error: Error, fatal: boolean) => void;

/**
 * Error sink backed by the client logger.
 *
 * Fatal reports (the event was not sent) log at error level, non-fatal ones
 * at warn. The optional `onError` hook is invoked after logging; a throwing
 * hook is logged and never propagated.
 */
export function createLogReporter(log: Logger, onError?: ErrorHandler): ErrorReporter {
  return {
    report(error: Error, fatal: boolean): void {
      if (fatal) {
        log.error({ err: error, fatal }, 'Analytics event not sent');
      } else {
        log.warn({ err: error, fatal }, 'Analytics event degraded');
      }

      if (!onError) return;
      try {
        onError(error, fatal);
      } catch (err: unknown) {
        log.warn({ err }, 'Error handler threw');
      }
    },
  };
}
