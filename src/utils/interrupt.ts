import { logger } from './logger.js';

/** Exit code of a process ended by SIGINT */
export const INTERRUPTED_EXIT_CODE = 130;

/**
 * First signal aborts `controller` so the run stops after the current target.
 * A second signal while that is pending exits at once.
 */
export function onInterrupt(
  controller: AbortController,
  exit: (code: number) => void = (code) => process.exit(code),
): (signal: string) => void {
  return (signal) => {
    if (controller.signal.aborted) {
      logger.warn(`Received ${signal} again, exiting now`);
      exit(INTERRUPTED_EXIT_CODE);
      return;
    }
    logger.info(`Received ${signal}, stopping after the current target...`);
    controller.abort();
  };
}
