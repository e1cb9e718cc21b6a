import { delay } from "./core/async.js";
import { StartupFailure, isTelemetryUnavailable, safeErrorMessage } from "./core/errors.js";
import type { Logger } from "./core/logger.js";
import type { Dashboard } from "./render/dashboard.js";
import type { TelemetryProvider } from "./telemetry/provider.js";
import type { GpuSnapshot } from "./types.js";

/**
 * Poll once before anything is drawn.
 * @param provider - Telemetry source.
 * @returns The first snapshots, at least one GPU.
 */
export const startup = async (provider: TelemetryProvider): Promise<GpuSnapshot[]> => {
  let snapshots: GpuSnapshot[];
  try {
    snapshots = await provider.poll();
  } catch (error) {
    throw new StartupFailure(`cannot read GPU telemetry from ${provider.name}: ${safeErrorMessage(error)}`, {
      cause: error,
    });
  }
  if (snapshots.length === 0) {
    throw new StartupFailure(`${provider.name} reported no GPUs`);
  }
  return snapshots;
};

export interface MonitorOptions {
  provider: TelemetryProvider;
  dashboard: Dashboard;
  intervalMs: number;
  signal: AbortSignal;
  logger: Logger;
}

/**
 * Outcome counters of a finished loop.
 */
export interface MonitorStats {
  ticks: number;
  failures: number;
}

/**
 * Run one poll and hand the result to the dashboard. Never rejects on telemetry errors;
 * nothing is drawn once the signal has aborted.
 * @param options - Monitor options.
 * @returns True when the poll succeeded.
 */
export const tick = async ({ provider, dashboard, logger, signal }: MonitorOptions): Promise<boolean> => {
  try {
    const snapshots = await provider.poll(signal);
    if (signal.aborted) {
      return false;
    }
    dashboard.update(snapshots);
    return true;
  } catch (error) {
    if (signal.aborted) {
      return false;
    }
    if (isTelemetryUnavailable(error)) {
      logger.warn("Telemetry poll failed", { reason: error.reason, detail: error.detail });
    } else {
      logger.error("Unexpected poll failure", { error: safeErrorMessage(error) });
    }
    dashboard.markUnavailable(error);
    return false;
  }
};

/**
 * Sleep, poll, render, until the signal aborts. Polls never overlap.
 * @param options - Monitor options; the dashboard must already be started.
 * @returns Counters for the ticks that ran.
 */
export const runMonitor = async (options: MonitorOptions): Promise<MonitorStats> => {
  const stats: MonitorStats = { ticks: 0, failures: 0 };
  const { signal, intervalMs, logger } = options;

  logger.info("Monitor loop started", { intervalMs });
  while (!signal.aborted) {
    await delay(intervalMs, signal);
    if (signal.aborted) {
      break;
    }
    const ok = await tick(options);
    if (signal.aborted) {
      break;
    }
    stats.ticks += 1;
    if (!ok) {
      stats.failures += 1;
    }
  }
  logger.info("Monitor loop stopped", { ...stats });
  return stats;
};
