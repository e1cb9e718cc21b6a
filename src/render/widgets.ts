import { c } from '../ansi.js';
import type { Reading, Tier, TierThresholds } from '../types.js';

export const BAR_FILLED = '█';
export const BAR_EMPTY = '░';
export const SPARK_GLYPHS = ['▁', '▂', '▃', '▄', '▅', '▆', '▇', '█'] as const;

export const THRESHOLDS = {
  utilization: { medium: 50, high: 80 },
  memory: { medium: 50, high: 80 },
  temperature: { medium: 65, high: 80 },
  power: { medium: 50, high: 80 },
  fan: { medium: 50, high: 80 },
} as const satisfies Record<string, TierThresholds>;

const TIER_STYLE: Record<Tier, (s: string) => string> = {
  low: c.green,
  medium: c.yellow,
  high: c.red,
  unknown: c.dim,
};

export function colorTier(value: Reading, thresholds: TierThresholds): Tier {
  if (value === null) return 'unknown';
  if (value > thresholds.high) return 'high';
  if (value > thresholds.medium) return 'medium';
  return 'low';
}

export function tint(tier: Tier, s: string): string {
  return TIER_STYLE[tier](s);
}

/** Filled cells for a percentage, always within [0, width]. */
export function barFill(percent: Reading, width: number): number {
  if (percent === null || !Number.isFinite(percent) || width <= 0) return 0;
  const filled = Math.floor((percent * width) / 100);
  return Math.min(width, Math.max(0, filled));
}

export function renderBar(percent: Reading, width: number, thresholds: TierThresholds): string {
  const filled = barFill(percent, width);
  const tier = colorTier(percent, thresholds);
  return tint(tier, BAR_FILLED.repeat(filled)) + c.dim(BAR_EMPTY.repeat(Math.max(0, width - filled)));
}

/**
 * Glyph level for one sample scaled between the window's min and max.
 * A flat window maps everything to the lowest level.
 */
export function sparkLevel(value: number, min: number, max: number, levels = SPARK_GLYPHS.length): number {
  if (!(max > min)) return 0;
  const level = Math.floor((levels * (value - min)) / (max - min));
  return Math.min(levels - 1, Math.max(0, level));
}

/** Plain glyph string for the newest `width` samples, scaled over the whole window. */
export function sparkline(values: readonly number[], width: number): string {
  if (values.length === 0 || width <= 0) return '';
  const min = Math.min(...values);
  const max = Math.max(...values);
  return values
    .slice(-width)
    .map((value) => SPARK_GLYPHS[sparkLevel(value, min, max)] ?? SPARK_GLYPHS[0])
    .join('');
}

/** Sparkline with each run of glyphs colored by the tier of its samples. */
export function renderSparkline(values: readonly number[], width: number, thresholds?: TierThresholds): string {
  const glyphs = [...sparkline(values, width)];
  if (!thresholds) return c.cyan(glyphs.join(''));

  const visible = values.slice(-width);
  let out = '';
  let run = '';
  let runTier: Tier = 'unknown';
  for (let i = 0; i < glyphs.length; i += 1) {
    const tier = colorTier(visible[i] ?? null, thresholds);
    if (tier !== runTier && run) {
      out += tint(runTier, run);
      run = '';
    }
    runTier = tier;
    run += glyphs[i] ?? '';
  }
  if (run) out += tint(runTier, run);
  return out;
}
