/**
 * Scoped operation timing
 *
 * A named start/stop timer wrapped once around each public service
 * operation. The default timer reports durations through pino at debug.
 */

import type { Logger } from 'pino';

export interface OperationTimer {
  start(name: string): void;
  stop(name: string): void;
}

/**
 * Timer that logs `{ operation, durationMs }` when an operation stops.
 * Concurrent runs of the same operation are matched last-in first-out.
 */
export function createLoggingTimer(logger: Logger): OperationTimer {
  const started = new Map<string, number[]>();

  return {
    start(name: string): void {
      const stack = started.get(name) ?? [];
      stack.push(performance.now());
      started.set(name, stack);
    },
    stop(name: string): void {
      const startedAt = started.get(name)?.pop();
      if (startedAt === undefined) {
        logger.warn({ operation: name }, 'Timer stopped without a matching start');
        return;
      }
      logger.debug({ operation: name, durationMs: Math.round(performance.now() - startedAt) }, `${name} finished`);
    },
  };
}

/**
 * Run `operation` between start and stop of `name`, whatever its outcome
 */
export async function timed<T>(
  timer: OperationTimer | undefined,
  name: string,
  operation: () => Promise<T>
): Promise<T> {
  if (!timer) {
    return operation();
  }
  timer.start(name);
  try {
    return await operation();
  } finally {
    timer.stop(name);
  }
}
