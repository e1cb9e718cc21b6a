import { c, formatMiB, pad, stripAnsi, truncate, visibleLength } from '../ansi.js';
import { safeErrorMessage } from '../core/errors.js';
import { createGpuHistory, recordSnapshot, type GpuHistory } from '../history.js';
import { memoryPercent, powerPercent } from '../telemetry/query.js';
import {
  TRACKED_METRICS,
  type DashboardMeta,
  type DashboardState,
  type GpuSnapshot,
  type Reading,
  type TierThresholds,
  type TrackedMetric,
} from '../types.js';
import { computeLayout, processLine, type GpuPanelLayout, type PanelLayout, type Slot } from './layout.js';
import type { DisplaySurface } from './surface.js';
import { THRESHOLDS, colorTier, renderBar, renderSparkline, tint } from './widgets.js';

export interface DashboardOptions {
  historySize: number;
  intervalMs: number;
  maxProcessRows?: number;
  /** Consecutive failed polls before the status turns into a persistent error. */
  staleAfter?: number;
  now?: () => Date;
}

const SPARK_THRESHOLDS: Record<TrackedMetric, TierThresholds | undefined> = {
  utilization: THRESHOLDS.utilization,
  memory: THRESHOLDS.memory,
  temperature: THRESHOLDS.temperature,
  // history holds watts, tiers are defined on percent of limit
  power: undefined,
};

const NA = 'N/A';

function fit(text: string, width: number): string {
  if (visibleLength(text) <= width) return pad(text, width);
  return truncate(stripAnsi(text), width);
}

function percentText(value: Reading): string {
  return value === null ? NA : `${Math.round(value)}%`;
}

function clockText(date: Date): string {
  const two = (n: number): string => String(n).padStart(2, '0');
  return `${two(date.getHours())}:${two(date.getMinutes())}:${two(date.getSeconds())}`;
}

function memoryText(gpu: GpuSnapshot): string {
  if (gpu.memory_used === null) return NA;
  const gib = (mib: number): string => (mib / 1024).toFixed(1);
  if (gpu.memory_total === null) return `${gib(gpu.memory_used)} GiB`;
  return `${gib(gpu.memory_used)}/${gib(gpu.memory_total)} GiB (${percentText(memoryPercent(gpu))})`;
}

function powerText(gpu: GpuSnapshot): string {
  if (gpu.power_draw === null) return NA;
  if (gpu.power_limit === null) return `${gpu.power_draw.toFixed(1)} W`;
  return `${gpu.power_draw.toFixed(1)}/${Math.round(gpu.power_limit)} W`;
}

function mhz(value: Reading): string {
  return value === null ? NA : `${Math.round(value)} MHz`;
}

/**
 * Owns the layout, the rolling histories and the display cache of one screen.
 * After the first frame only slots whose text changed are written.
 */
export class Dashboard {
  private readonly surface: DisplaySurface;
  private readonly options: DashboardOptions;
  private readonly now: () => Date;
  private readonly cache = new Map<string, string>();
  private readonly histories = new Map<number, GpuHistory>();
  private readonly latest = new Map<number, GpuSnapshot>();
  private current: DashboardState = 'uninitialized';
  private layout: PanelLayout | null = null;
  private meta: DashboardMeta = { source: '', driverVersion: null };
  private gpuOrder: number[] = [];
  private failures = 0;
  private updatedAt: Date | null = null;
  private lastFailure = '';

  constructor(surface: DisplaySurface, options: DashboardOptions) {
    this.surface = surface;
    this.options = options;
    this.now = options.now ?? (() => new Date());
  }

  get state(): DashboardState {
    return this.current;
  }

  get consecutiveFailures(): number {
    return this.failures;
  }

  history(gpuIndex: number): GpuHistory | undefined {
    return this.histories.get(gpuIndex);
  }

  /** Lay out the screen for the first snapshot's GPUs and draw the static frame once. */
  start(snapshots: GpuSnapshot[], meta: DashboardMeta): void {
    if (this.current !== 'uninitialized') {
      throw new Error('dashboard already started');
    }
    this.layout = computeLayout(this.surface.size(), snapshots.length, {
      historySize: this.options.historySize,
      maxProcessRows: this.options.maxProcessRows,
    });
    this.meta = meta;
    this.gpuOrder = snapshots.map((gpu) => gpu.index);
    for (const index of this.gpuOrder) {
      this.histories.set(index, createGpuHistory(this.options.historySize));
    }
    this.current = 'running';
    this.drawFrame(this.layout);
    this.update(snapshots);
  }

  /** Record a successful poll and rewrite whatever changed. */
  update(snapshots: GpuSnapshot[]): void {
    const layout = this.requireLayout();
    this.failures = 0;
    for (const gpu of snapshots) {
      const history = this.histories.get(gpu.index);
      if (!history) continue;
      recordSnapshot(history, gpu);
      this.latest.set(gpu.index, gpu);
    }
    this.updatedAt = this.now();
    this.renderReadings(layout);
    this.surface.flush();
  }

  /** Record a failed poll. Histories and displayed values stay as they were. */
  markUnavailable(error: unknown): void {
    const layout = this.requireLayout();
    this.failures += 1;
    this.lastFailure = safeErrorMessage(error);
    this.renderStatus(layout);
    this.surface.flush();
  }

  /** Forget what is on screen and paint everything again. */
  redraw(): void {
    const layout = this.requireLayout();
    this.cache.clear();
    this.drawFrame(layout);
    this.renderReadings(layout);
    this.surface.flush();
  }

  private requireLayout(): PanelLayout {
    if (this.current !== 'running' || !this.layout) {
      throw new Error('dashboard not started');
    }
    return this.layout;
  }

  private put(slot: Slot, key: string, text: string): void {
    const fitted = fit(text, slot.width);
    if (this.cache.get(key) === fitted) return;
    this.cache.set(key, fitted);
    this.surface.write(slot.row, slot.col, fitted);
  }

  private drawFrame(layout: PanelLayout): void {
    this.surface.clear();
    for (const item of layout.frame) this.surface.write(item.row, item.col, item.text);

    const gpus = `${this.gpuOrder.length} GPU${this.gpuOrder.length === 1 ? '' : 's'}`;
    const driver = this.meta.driverVersion ? ` · driver ${this.meta.driverVersion}` : '';
    this.put(layout.header, 'header', `${c.bold('gpuwatch')} ${c.dim(`· ${this.meta.source}${driver} · ${gpus}`)}`);
    this.put(
      layout.footer,
      'footer',
      c.dim(`[q] quit  [r] redraw  every ${this.options.intervalMs} ms  history ${this.options.historySize}`),
    );
  }

  private renderReadings(layout: PanelLayout): void {
    this.gpuOrder.forEach((index, position) => {
      const panel = layout.panels[position];
      const gpu = this.latest.get(index);
      const history = this.histories.get(index);
      if (panel && gpu && history) this.renderPanel(panel, `gpu${index}`, gpu, history, layout);
    });
    this.renderProcesses(layout);
    this.renderStatus(layout);
    if (this.updatedAt) this.put(layout.clock, 'clock', c.dim(clockText(this.updatedAt)));
  }

  private renderPanel(panel: GpuPanelLayout, key: string, gpu: GpuSnapshot, history: GpuHistory, layout: PanelLayout): void {
    const name = truncate(gpu.name, Math.max(4, panel.title.width - 14));
    const title = ` ${c.bold(`GPU ${gpu.index}`)} ${c.cyan(name)} `;
    this.put(panel.title, `${key}.title`, title + '─'.repeat(Math.max(0, panel.title.width - visibleLength(title))));

    const util = gpu.utilization;
    this.put(panel.utilization.bar, `${key}.util.bar`, renderBar(util, layout.barWidth, THRESHOLDS.utilization));
    this.put(panel.utilization.value, `${key}.util.value`, tint(colorTier(util, THRESHOLDS.utilization), percentText(util)));

    const memPct = memoryPercent(gpu);
    this.put(panel.memory.bar, `${key}.mem.bar`, renderBar(memPct, layout.barWidth, THRESHOLDS.memory));
    this.put(panel.memory.value, `${key}.mem.value`, tint(colorTier(memPct, THRESHOLDS.memory), memoryText(gpu)));

    const powPct = powerPercent(gpu);
    this.put(panel.power.bar, `${key}.power.bar`, renderBar(powPct, layout.barWidth, THRESHOLDS.power));
    this.put(panel.power.value, `${key}.power.value`, tint(colorTier(powPct, THRESHOLDS.power), powerText(gpu)));

    const temp = gpu.temperature;
    const tempText = temp === null ? NA : `${Math.round(temp)}°C`;
    this.put(panel.temperature, `${key}.temp`, tint(colorTier(temp, THRESHOLDS.temperature), tempText));
    this.put(panel.fan, `${key}.fan`, `Fan ${tint(colorTier(gpu.fan_speed, THRESHOLDS.fan), percentText(gpu.fan_speed))}`);
    this.put(
      panel.clocks,
      `${key}.clocks`,
      c.blue(`${mhz(gpu.clock_graphics)} core  ${mhz(gpu.clock_memory)} mem`),
    );

    for (const metric of TRACKED_METRICS) {
      this.put(
        panel.sparks[metric],
        `${key}.spark.${metric}`,
        renderSparkline(history[metric].values(), layout.sparkWidth, SPARK_THRESHOLDS[metric]),
      );
    }
  }

  private renderProcesses(layout: PanelLayout): void {
    const width = layout.processes[0]?.width ?? 0;
    const rows: string[] = [];
    for (const index of this.gpuOrder) {
      const gpu = this.latest.get(index);
      if (!gpu) continue;
      const sorted = [...gpu.processes].sort((a, b) => (b.memory_used ?? 0) - (a.memory_used ?? 0));
      for (const proc of sorted) {
        const memory = proc.memory_used === null ? NA : formatMiB(proc.memory_used);
        rows.push(processLine(String(index), String(proc.pid), proc.name, memory, width));
      }
    }

    const slots = layout.processes;
    if (rows.length === 0) {
      rows.push(c.dim('No active GPU processes'));
    } else if (rows.length > slots.length) {
      const hidden = rows.length - slots.length + 1;
      rows.splice(slots.length - 1, rows.length, c.dim(`… ${hidden} more`));
    }
    slots.forEach((slot, i) => this.put(slot, `proc${i}`, rows[i] ?? ''));
  }

  private renderStatus(layout: PanelLayout): void {
    const staleAfter = this.options.staleAfter ?? 3;
    const width = layout.status.width - 2;
    let status: string;
    if (this.failures === 0) {
      status = c.green('● live');
    } else if (this.failures < staleAfter) {
      status = c.yellow(truncate(`● stale, retrying: ${this.lastFailure}`, width));
    } else {
      status = c.red(truncate(`● telemetry unavailable for ${this.failures} polls: ${this.lastFailure}`, width));
    }
    this.put(layout.status, 'status', status);
  }
}
