import type { GpuSnapshot } from "../types.js";

/**
 * Source of GPU snapshots. Implementations reject with TelemetryUnavailable
 * when a poll yields nothing usable.
 */
export interface TelemetryProvider {
  /** Short label shown in the dashboard header. */
  readonly name: string;
  /** The signal cancels an in-flight poll. */
  poll: (signal?: AbortSignal) => Promise<GpuSnapshot[]>;
}

/**
 * Outcome of one diagnostic step.
 */
export interface ProbeStep {
  label: string;
  ok: boolean;
  detail: string;
}

/**
 * Provider that can also diagnose its own access, for the `check` command.
 */
export interface ProbingProvider extends TelemetryProvider {
  probe: () => Promise<ProbeStep[]>;
}
