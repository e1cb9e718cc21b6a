import { memoryPercent } from './telemetry/query.js';
import { TRACKED_METRICS, type GpuSnapshot, type Reading, type TrackedMetric } from './types.js';

/**
 * Fixed-capacity rolling window of samples. Storage is allocated once;
 * pushing past capacity overwrites the oldest slot.
 */
export class MetricHistory {
  public readonly capacity: number;
  private readonly slots: Float64Array;
  private start = 0;
  private count = 0;

  public constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`history capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.slots = new Float64Array(capacity);
  }

  get length(): number {
    return this.count;
  }

  push(value: number): void {
    if (this.count < this.capacity) {
      this.slots[(this.start + this.count) % this.capacity] = value;
      this.count += 1;
      return;
    }
    this.slots[this.start] = value;
    this.start = (this.start + 1) % this.capacity;
  }

  /** Samples oldest first. */
  values(): number[] {
    const out: number[] = [];
    for (let i = 0; i < this.count; i += 1) {
      out.push(this.slots[(this.start + i) % this.capacity] ?? 0);
    }
    return out;
  }

  latest(): number | undefined {
    if (this.count === 0) return undefined;
    return this.slots[(this.start + this.count - 1) % this.capacity];
  }

  min(): number | undefined {
    return this.count === 0 ? undefined : Math.min(...this.values());
  }

  max(): number | undefined {
    return this.count === 0 ? undefined : Math.max(...this.values());
  }
}

/** Per-GPU rolling windows for the metrics drawn as sparklines. */
export type GpuHistory = Record<TrackedMetric, MetricHistory>;

export function createGpuHistory(capacity: number): GpuHistory {
  return {
    utilization: new MetricHistory(capacity),
    memory: new MetricHistory(capacity),
    temperature: new MetricHistory(capacity),
    power: new MetricHistory(capacity),
  };
}

export function trackedReadings(gpu: GpuSnapshot): Record<TrackedMetric, Reading> {
  return {
    utilization: gpu.utilization,
    memory: memoryPercent(gpu),
    temperature: gpu.temperature,
    power: gpu.power_draw,
  };
}

/** Push every known reading; unknown readings leave their window untouched. */
export function recordSnapshot(history: GpuHistory, gpu: GpuSnapshot): void {
  const readings = trackedReadings(gpu);
  for (const metric of TRACKED_METRICS) {
    const value = readings[metric];
    if (value !== null) history[metric].push(value);
  }
}
