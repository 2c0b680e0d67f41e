import type { CycleResult } from '../pipeline/monitor-cycle.js';
import { getLogger } from '../lib/logger.js';

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface SchedulerOptions {
  intervalMs: number;
  runCycle: () => Promise<CycleResult>;
  /** Called after each cycle, e.g. to commit the result files. */
  afterCycle?: (result: CycleResult) => Promise<void>;
}

export interface SchedulerState {
  isRunning: boolean;
  cycleActive: boolean;
  lastCycleEnd: Date | null;
  lastResult: CycleResult | null;
  cyclesCompleted: number;
}

const STOP_MAX_WAIT_MS = 60_000;

export function createScheduler(options: SchedulerOptions) {
  const logger = getLogger();

  const state: SchedulerState = {
    isRunning: false,
    cycleActive: false,
    lastCycleEnd: null,
    lastResult: null,
    cyclesCompleted: 0,
  };

  let loop: Promise<void> | null = null;
  let idle: { timer: NodeJS.Timeout; wake: () => void } | null = null;

  /** Interval wait that stop() can cut short. */
  function waitInterval(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const wake = () => {
        idle = null;
        resolve();
      };
      idle = { timer: setTimeout(wake, ms), wake };
    });
  }

  /**
   * Non-overlapping: waits the interval AFTER completion before the next cycle.
   */
  async function runLoop(): Promise<void> {
    while (state.isRunning) {
      state.cycleActive = true;
      try {
        const result = await options.runCycle();
        state.lastResult = result;
        if (options.afterCycle) await options.afterCycle(result);
        logger.info({ status: result.status }, 'Monitor cycle completed');
      } catch (err) {
        logger.error({ err }, `Monitor cycle failed: ${err instanceof Error ? err.message : String(err)}`);
      } finally {
        state.cycleActive = false;
        state.lastCycleEnd = new Date();
        state.cyclesCompleted += 1;
      }

      if (state.isRunning) {
        logger.debug({ intervalMs: options.intervalMs }, 'Waiting before next cycle');
        await waitInterval(options.intervalMs);
      }
    }
  }

  return {
    start(): void {
      if (state.isRunning) return;
      state.isRunning = true;
      loop = runLoop();
    },

    async stop(): Promise<void> {
      state.isRunning = false;
      logger.info('Scheduler stopping, waiting for the active cycle to complete');

      if (idle) {
        clearTimeout(idle.timer);
        idle.wake();
      }

      const start = Date.now();
      while (state.cycleActive && Date.now() - start < STOP_MAX_WAIT_MS) {
        await sleep(100);
      }

      logger.info('Scheduler stopped');
    },

    /** Settles when the loop exits; used for shutdown and tests. */
    done(): Promise<void> {
      return loop ?? Promise.resolve();
    },

    getState(): SchedulerState {
      return { ...state };
    },
  };
}

export type Scheduler = ReturnType<typeof createScheduler>;
