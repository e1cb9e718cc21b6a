/** A numeric reading, or null when the provider could not report it. */
export type Reading = number | null;

export interface GpuProcess {
  pid: number;
  name: string;
  /** MiB, null when the driver hides per-process usage. */
  memory_used: Reading;
}

/** One GPU at one poll. Memory is in MiB, power in W, clocks in MHz. */
export interface GpuSnapshot {
  index: number;
  uuid: string | null;
  name: string;
  driver_version: string | null;
  utilization: Reading;
  memory_utilization: Reading;
  memory_used: Reading;
  memory_total: Reading;
  temperature: Reading;
  power_draw: Reading;
  power_limit: Reading;
  clock_graphics: Reading;
  clock_memory: Reading;
  fan_speed: Reading;
  processes: GpuProcess[];
}

export type TrackedMetric = 'utilization' | 'memory' | 'temperature' | 'power';

export const TRACKED_METRICS: readonly TrackedMetric[] = ['utilization', 'memory', 'temperature', 'power'];

export type Tier = 'low' | 'medium' | 'high' | 'unknown';

export interface TierThresholds {
  medium: number;
  high: number;
}

export interface TerminalSize {
  columns: number;
  rows: number;
}

export type DashboardState = 'uninitialized' | 'running';

/** Header facts that do not change between polls. */
export interface DashboardMeta {
  source: string;
  driverVersion: string | null;
}
