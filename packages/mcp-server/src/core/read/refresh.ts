/**
 * Background refresh worker
 *
 * Waits for the startup delay, runs a full cache refresh, sleeps for the
 * interval and repeats. Each cycle gets an AbortSignal combining the stop
 * signal with the per-cycle deadline; only one cycle runs at a time.
 */

import {
  DEFAULT_REFRESH_INTERVAL_MS,
  DEFAULT_REFRESH_TIMEOUT_MS,
  DEFAULT_STARTUP_DELAY_MS,
  describeCause,
} from '@groundwave/zk-core';
import { serverLog } from '../shared/serverLog.js';
import type { ZettelCache } from './cache.js';

export interface RefreshWorkerOptions {
  intervalMs?: number;
  startupDelayMs?: number;
  /** Deadline for a single cycle */
  timeoutMs?: number;
}

export interface RefreshWorker {
  /** Stop scheduling, cancel the running cycle and wait for it to return */
  stop(): Promise<void>;
  /** Completed cycles, failed ones included */
  readonly cycles: number;
}

/**
 * Start the periodic refresh loop. Timers are unref'd so the worker never
 * keeps the process alive on its own.
 */
export function startRefreshWorker(
  cache: Pick<ZettelCache, 'refresh'>,
  options: RefreshWorkerOptions = {}
): RefreshWorker {
  const intervalMs = options.intervalMs ?? DEFAULT_REFRESH_INTERVAL_MS;
  const startupDelayMs = options.startupDelayMs ?? DEFAULT_STARTUP_DELAY_MS;
  const timeoutMs = options.timeoutMs ?? DEFAULT_REFRESH_TIMEOUT_MS;

  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | null = null;
  let running: Promise<void> | null = null;
  let cycles = 0;

  const runCycle = async (): Promise<void> => {
    const signal = AbortSignal.any([controller.signal, AbortSignal.timeout(timeoutMs)]);
    try {
      const result = await cache.refresh(signal);
      const failed = (['links', 'journal', 'timeline'] as const).filter((name) => result[name].status === 'failed');
      if (failed.length > 0) {
        serverLog('refresh', `Refresh cycle finished with failed builds: ${failed.join(', ')}`, 'warn');
      }
    } catch (err) {
      serverLog('refresh', `Refresh cycle failed: ${describeCause(err)}`, 'error');
    } finally {
      cycles++;
    }
  };

  const schedule = (delayMs: number): void => {
    timer = setTimeout(() => {
      timer = null;
      running = runCycle().finally(() => {
        running = null;
        if (!controller.signal.aborted) {
          schedule(intervalMs);
        }
      });
    }, delayMs);
    timer.unref();
  };

  serverLog('refresh', `Refresh worker started (first run in ${startupDelayMs}ms, then every ${intervalMs}ms)`);
  schedule(startupDelayMs);

  return {
    async stop() {
      if (controller.signal.aborted) return;
      controller.abort(new Error('refresh worker stopped'));
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
      if (running) {
        await running;
      }
      serverLog('refresh', 'Refresh worker stopped');
    },
    get cycles() {
      return cycles;
    },
  };
}
