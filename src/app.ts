import type { Config } from "./config/env.js";
import { createLogger, createStderrSink, silentSink, type Logger } from "./core/logger.js";
import { setupInput, type KeyStream } from "./input.js";
import { runMonitor, startup, type MonitorStats } from "./monitor.js";
import { Dashboard } from "./render/dashboard.js";
import { TerminalSurface, type TerminalStream } from "./render/surface.js";
import { NvidiaSmiProvider } from "./telemetry/nvidia-smi.js";
import type { ProbingProvider, TelemetryProvider } from "./telemetry/provider.js";

/**
 * Process-level collaborators of the dashboard, replaceable in tests.
 */
export interface AppIo {
  stdout: TerminalStream;
  stdin: KeyStream;
  signals: {
    once: (event: NodeJS.Signals, listener: () => void) => unknown;
    off: (event: NodeJS.Signals, listener: () => void) => unknown;
  };
  logger: Logger;
  provider?: TelemetryProvider;
}

/**
 * Default collaborators. Log lines only go out when stderr is redirected,
 * since an interactive stderr shares the screen with the dashboard.
 * @param config - Runtime configuration.
 * @returns Real process streams and logger.
 */
export const processIo = (config: Config): AppIo => ({
  stdout: process.stdout,
  stdin: process.stdin,
  signals: process,
  logger: createLogger(config.log_level, process.stderr.isTTY ? silentSink : createStderrSink()),
});

export type ProviderFactory = (config: Config, logger: Logger) => ProbingProvider;

/**
 * Create the telemetry provider described by the configuration.
 * @param config - Runtime configuration.
 * @param logger - Logger for per-field diagnostics.
 * @returns nvidia-smi backed provider.
 */
export const createProvider: ProviderFactory = (config, logger) =>
  new NvidiaSmiProvider({
    executable: config.nvidia_smi,
    timeoutMs: config.timeout_ms,
    processes: config.processes,
    logger,
  });

/**
 * Run the interactive dashboard until interrupted.
 * Telemetry is read before the terminal is touched, so a missing provider
 * fails with StartupFailure and leaves the screen alone.
 * @param config - Runtime configuration.
 * @param io - Process collaborators.
 * @returns Loop counters.
 */
export const runDashboard = async (config: Config, io: AppIo): Promise<MonitorStats> => {
  const { logger } = io;
  const provider = io.provider ?? createProvider(config, logger);
  const first = await startup(provider);
  const surface = new TerminalSurface(io.stdout);

  const controller = new AbortController();
  const stop = (): void => controller.abort();
  const dashboard = new Dashboard(surface, {
    historySize: config.history_size,
    intervalMs: config.interval_ms,
  });

  let cleanupInput = (): void => undefined;
  io.signals.once("SIGINT", stop);
  io.signals.once("SIGTERM", stop);
  try {
    cleanupInput = setupInput((key) => {
      if (key === "q" || key === "ctrl-c") {
        stop();
      } else if (key === "r" && dashboard.state === "running") {
        dashboard.redraw();
      }
    }, io.stdin);
    surface.open();
    dashboard.start(first, { source: provider.name, driverVersion: first[0]?.driver_version ?? null });
    logger.info("Dashboard started", { gpus: first.length, intervalMs: config.interval_ms });
    return await runMonitor({
      provider,
      dashboard,
      intervalMs: config.interval_ms,
      signal: controller.signal,
      logger,
    });
  } finally {
    cleanupInput();
    surface.close();
    io.signals.off("SIGINT", stop);
    io.signals.off("SIGTERM", stop);
  }
};
