import { describe, it, expect, vi } from "vitest";
import { colors, enterAltScreen, hideCursor, leaveAltScreen, showCursor } from "./ansi.js";
import { runDashboard, type AppIo } from "./app.js";
import type { Config } from "./config/env.js";
import { DisplaySurfaceError, StartupFailure, TelemetryUnavailable } from "./core/errors.js";
import type { Logger } from "./core/logger.js";
import type { KeyStream } from "./input.js";
import type { TerminalStream } from "./render/surface.js";
import type { TelemetryProvider } from "./telemetry/provider.js";
import { emptySnapshot } from "./telemetry/query.js";
import type { GpuSnapshot } from "./types.js";

const CONFIG: Config = {
  nvidia_smi: "nvidia-smi",
  log_level: "error",
  interval_ms: 100,
  history_size: 60,
  timeout_ms: 2000,
  processes: true,
};

/**
 * Logger whose methods are spies.
 */
const createTestLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

/**
 * Collaborators backed by fakes; keys typed by the test go to the registered data listener.
 */
const createIo = (
  provider: TelemetryProvider,
  stdout: Partial<TerminalStream> = {},
): AppIo & { chunks: string[]; press: (key: string) => void; stdin: KeyStream } => {
  const chunks: string[] = [];
  let listener: ((data: string) => void) | undefined;
  const stdin: KeyStream = {
    isTTY: true,
    setRawMode: vi.fn(),
    setEncoding: vi.fn(),
    resume: vi.fn(),
    pause: vi.fn(),
    on: (_event, fn) => {
      listener = fn;
    },
    off: () => {
      listener = undefined;
    },
  };
  return {
    chunks,
    press: (key) => listener?.(key),
    stdout: {
      isTTY: true,
      columns: 100,
      rows: 40,
      write: (chunk) => {
        chunks.push(chunk);
        return true;
      },
      ...stdout,
    },
    stdin,
    signals: { once: vi.fn(), off: vi.fn() },
    logger: createTestLogger(),
    provider,
  };
};

const GPUS: GpuSnapshot[] = [{ ...emptySnapshot(0), name: "RTX 4090", utilization: 12, temperature: 41 }];

describe("runDashboard", () => {
  it("fails with StartupFailure before touching the terminal", async () => {
    const io = createIo({
      name: "nvidia-smi",
      poll: async () => {
        throw new TelemetryUnavailable("missing", "nvidia-smi not found or not executable");
      },
    });

    await expect(runDashboard(CONFIG, io)).rejects.toBeInstanceOf(StartupFailure);
    expect(io.chunks).toEqual([]);
    expect(io.signals.once).not.toHaveBeenCalled();
  });

  it("fails with DisplaySurfaceError when stdout is not a terminal", async () => {
    const io = createIo({ name: "fake", poll: async () => GPUS }, { isTTY: false });

    await expect(runDashboard(CONFIG, io)).rejects.toBeInstanceOf(DisplaySurfaceError);
    expect(io.chunks).toEqual([]);
  });

  it("runs until q is pressed and restores the terminal", async () => {
    let calls = 0;
    let press = (_key: string): void => undefined;
    const io = createIo({
      name: "fake",
      poll: async () => {
        calls += 1;
        if (calls === 3) {
          press("q");
        }
        return GPUS;
      },
    });
    press = io.press;

    const stats = await runDashboard(CONFIG, io);

    expect(stats).toEqual({ ticks: 1, failures: 0 });
    expect(io.chunks[0]).toBe(enterAltScreen + hideCursor);
    expect(io.chunks[io.chunks.length - 1]).toBe(colors.reset + showCursor + leaveAltScreen);
    expect(io.stdin.setRawMode).toHaveBeenLastCalledWith(false);
    expect(io.signals.once).toHaveBeenCalledWith("SIGINT", expect.any(Function));
    expect(io.signals.off).toHaveBeenCalledWith("SIGTERM", expect.any(Function));
  });
});
