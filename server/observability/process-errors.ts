import { logger } from './logger.js';

type ExitFn = (code: number) => void;

export function handleUnhandledRejection(reason: unknown): void {
  logger.error('Unhandled promise rejection', { error: reason instanceof Error ? reason.message : String(reason) });
}

/**
 * The process state is unknown after an uncaught exception, so log it and exit
 */
export function handleUncaughtException(err: Error, exit: ExitFn = (code) => process.exit(code)): void {
  logger.error('Uncaught exception', { error: err.message, stack: err.stack });
  exit(1);
}
