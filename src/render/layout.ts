import { pad, truncate } from '../ansi.js';
import { DisplaySurfaceError } from '../core/errors.js';
import type { TerminalSize, TrackedMetric } from '../types.js';

/** A fixed screen region one field is written into. Zero-based. */
export interface Slot {
  row: number;
  col: number;
  width: number;
}

export interface StaticText {
  row: number;
  col: number;
  text: string;
}

export interface GpuPanelLayout {
  title: Slot;
  utilization: { bar: Slot; value: Slot };
  memory: { bar: Slot; value: Slot };
  power: { bar: Slot; value: Slot };
  temperature: Slot;
  fan: Slot;
  clocks: Slot;
  sparks: Record<TrackedMetric, Slot>;
}

export interface PanelLayout {
  size: TerminalSize;
  barWidth: number;
  sparkWidth: number;
  header: Slot;
  clock: Slot;
  status: Slot;
  panels: GpuPanelLayout[];
  processes: Slot[];
  footer: Slot;
  /** Borders and labels, drawn once. */
  frame: StaticText[];
}

export interface LayoutOptions {
  historySize: number;
  maxProcessRows?: number;
}

export const MIN_COLUMNS = 60;
export const MAX_BAR_WIDTH = 40;
export const PANEL_HEIGHT = 12;

const LABEL_WIDTH = 14;
const VALUE_WIDTH = 24;
const CLOCK_WIDTH = 8;

const SPARK_LABELS: Record<TrackedMetric, string> = {
  utilization: 'Util history',
  memory: 'Mem history',
  temperature: 'Temp history',
  power: 'Power history',
};

/** One row of the process table, columns aligned to `width`. */
export function processLine(gpu: string, pid: string, name: string, memory: string, width: number): string {
  const nameWidth = Math.max(4, width - 4 - 8 - 12 - 3);
  return [pad(gpu, 4), pad(pid, 8), pad(truncate(name, nameWidth), nameWidth), pad(memory, 12, 'r')].join(' ');
}

function border(row: number, width: number, left: string, right: string): StaticText {
  return { row, col: 0, text: left + '─'.repeat(Math.max(0, width - 2)) + right };
}

function sides(row: number, width: number): StaticText[] {
  return [
    { row, col: 0, text: '│' },
    { row, col: width - 1, text: '│' },
  ];
}

/**
 * Compute every slot position for `gpuCount` panels. The result never changes
 * for the lifetime of a dashboard.
 */
export function computeLayout(size: TerminalSize, gpuCount: number, options: LayoutOptions): PanelLayout {
  if (size.columns < MIN_COLUMNS) {
    throw new DisplaySurfaceError(`terminal is ${size.columns} columns wide, need at least ${MIN_COLUMNS}`);
  }

  const width = size.columns;
  const inner = width - 4;
  const left = 2;
  const valueCol = left + LABEL_WIDTH;
  const barWidth = Math.max(5, Math.min(MAX_BAR_WIDTH, inner - LABEL_WIDTH - 1 - VALUE_WIDTH));
  const sparkWidth = Math.max(1, Math.min(options.historySize, inner - LABEL_WIDTH));
  const frame: StaticText[] = [];

  const header: Slot = { row: 0, col: 0, width: width - CLOCK_WIDTH - 1 };
  const clock: Slot = { row: 0, col: width - CLOCK_WIDTH, width: CLOCK_WIDTH };
  const status: Slot = { row: 1, col: 0, width };

  const panels: GpuPanelLayout[] = [];
  for (let i = 0; i < gpuCount; i += 1) {
    const top = 2 + i * PANEL_HEIGHT;
    frame.push(border(top, width, '┌', '┐'));
    for (let r = top + 1; r < top + PANEL_HEIGHT - 1; r += 1) frame.push(...sides(r, width));
    frame.push(border(top + PANEL_HEIGHT - 1, width, '└', '┘'));

    const labels: Array<[number, string]> = [
      [1, 'Utilization'],
      [2, 'Memory'],
      [3, 'Power'],
      [4, 'Temperature'],
      [5, 'Clocks'],
      [7, SPARK_LABELS.utilization],
      [8, SPARK_LABELS.memory],
      [9, SPARK_LABELS.temperature],
      [10, SPARK_LABELS.power],
    ];
    for (const [offset, text] of labels) frame.push({ row: top + offset, col: left, text });

    const barValue = (offset: number): { bar: Slot; value: Slot } => ({
      bar: { row: top + offset, col: valueCol, width: barWidth },
      value: { row: top + offset, col: valueCol + barWidth + 1, width: VALUE_WIDTH },
    });
    const spark = (offset: number): Slot => ({ row: top + offset, col: valueCol, width: sparkWidth });
    const tempWidth = 12;

    panels.push({
      title: { row: top, col: 2, width: width - 4 },
      utilization: barValue(1),
      memory: barValue(2),
      power: barValue(3),
      temperature: { row: top + 4, col: valueCol, width: tempWidth },
      fan: { row: top + 4, col: valueCol + tempWidth + 2, width: 16 },
      clocks: { row: top + 5, col: valueCol, width: inner - LABEL_WIDTH },
      sparks: {
        utilization: spark(7),
        memory: spark(8),
        temperature: spark(9),
        power: spark(10),
      },
    });
  }

  const processTop = 2 + gpuCount * PANEL_HEIGHT;
  // label, column heading and footer around at least one process row
  const minRows = processTop + 4;
  if (size.rows < minRows) {
    throw new DisplaySurfaceError(
      `terminal is ${size.rows} rows high, need at least ${minRows} for ${gpuCount} GPU${gpuCount === 1 ? '' : 's'}`,
    );
  }
  const available = size.rows - processTop - 3;
  const processRowCount = Math.max(1, Math.min(options.maxProcessRows ?? 8, available));
  frame.push({ row: processTop, col: 0, text: 'Processes' });
  frame.push({ row: processTop + 1, col: left, text: processLine('GPU', 'PID', 'Process', 'Memory', inner) });
  const processes: Slot[] = [];
  for (let i = 0; i < processRowCount; i += 1) {
    processes.push({ row: processTop + 2 + i, col: left, width: inner });
  }

  return {
    size: { ...size },
    barWidth,
    sparkWidth,
    header,
    clock,
    status,
    panels,
    processes,
    footer: { row: processTop + 2 + processRowCount, col: 0, width },
    frame,
  };
}
