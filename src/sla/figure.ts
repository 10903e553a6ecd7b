/**
 * SLA figure: the time series the UI widget charts: one series per pool,
 * average queue wait in minutes per sample.
 */

import { MILLISECONDS_IN_MINUTE } from "../config/sla-defaults.js";
import { averageWaitMs, type SlaEntry } from "./sla-entry.js";

export interface SlaPoint {
  /** Sample time, truncated to the second. */
  readonly timestamp: number;
  readonly minutes: number;
}

export interface SlaSeries {
  readonly pool: string;
  readonly points: readonly SlaPoint[];
}

export interface SlaFigure {
  /** The widget draws its own heading. */
  readonly title: null;
  readonly yAxisLabel: "minutes";
  readonly width: number;
  readonly height: number;
  /** Epoch ms the figure was rendered; 0 for the placeholder. */
  readonly generatedAt: number;
  readonly series: readonly SlaSeries[];
}

export const FIGURE_WIDTH = 336;
export const FIGURE_HEIGHT = 240;

export const EMPTY_SLA_FIGURE: SlaFigure = Object.freeze({
  title: null,
  yAxisLabel: "minutes",
  width: FIGURE_WIDTH,
  height: FIGURE_HEIGHT,
  generatedAt: 0,
  series: Object.freeze([]),
});

function toSeries(pool: string, entries: readonly SlaEntry[]): SlaSeries {
  // Samples falling in the same second collapse onto one point; the later sample wins.
  const bySecond = new Map<number, number>();
  for (const entry of entries) {
    const second = Math.floor(entry.timestamp / 1000) * 1000;
    bySecond.set(second, averageWaitMs(entry) / MILLISECONDS_IN_MINUTE);
  }

  const points = [...bySecond.entries()]
    .sort(([a], [b]) => a - b)
    .map(([timestamp, minutes]) => Object.freeze({ timestamp, minutes }));

  return Object.freeze({ pool, points: Object.freeze(points) });
}

/** Render a frozen figure from per-pool window copies, in the map's order. */
export function renderSlaFigure(
  windows: ReadonlyMap<string, readonly SlaEntry[]>,
  generatedAt: number,
): SlaFigure {
  const series: SlaSeries[] = [];
  for (const [pool, entries] of windows) {
    series.push(toSeries(pool, entries));
  }

  return Object.freeze({
    title: null,
    yAxisLabel: "minutes",
    width: FIGURE_WIDTH,
    height: FIGURE_HEIGHT,
    generatedAt,
    series: Object.freeze(series),
  });
}
