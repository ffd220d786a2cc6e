/**
 * Phase timing for allocation runs
 */

import { EngineLogger } from './logger';

export interface PhaseTiming {
  phase: string;
  durationMs: number;
}

/**
 * Monitoring interface the engine depends on
 */
export interface EngineMonitor {
  /** Runs `fn`, records how long it took under `phase`, and returns its result */
  time: <T>(phase: string, fn: () => T) => T;
  /** Timings recorded so far, oldest first */
  getTimings: () => PhaseTiming[];
  reset: () => void;
}

/**
 * Monitor that keeps every timing and reports each one at debug level
 */
export function createMonitor(logger: EngineLogger, now: () => number = () => performance.now()): EngineMonitor {
  let timings: PhaseTiming[] = [];

  return {
    time: (phase, fn) => {
      const start = now();
      try {
        return fn();
      } finally {
        const durationMs = now() - start;
        timings.push({ phase, durationMs });
        logger.debug(`${phase} took ${durationMs.toFixed(2)}ms`);
      }
    },
    getTimings: () => [...timings],
    reset: () => {
      timings = [];
    }
  };
}

/**
 * Monitor that only runs the phases
 */
export const noopMonitor: EngineMonitor = {
  time: (_phase, fn) => fn(),
  getTimings: () => [],
  reset: () => undefined
};
