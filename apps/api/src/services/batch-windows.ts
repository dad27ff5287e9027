import { BatchWindow } from '@trendlens/shared-types';

export type BatchWindowSpec = {
  code: number; // wire value of the window
  points: number; // samples in a complete series
  stepSeconds: number;
  timeframe: string;
};

/**
 * Batch showcase windows. Upstream refreshes them every few minutes, so a
 * series may be one sample short of `points` until the newest step lands.
 */
export const BATCH_WINDOWS: Record<BatchWindow, BatchWindowSpec> = {
  Past4H: { code: 2, points: 31, stepSeconds: 8 * 60, timeframe: 'now 4-H' },
  Past24H: { code: 3, points: 91, stepSeconds: 16 * 60, timeframe: 'now 1-d' },
  Past48H: { code: 5, points: 181, stepSeconds: 16 * 60, timeframe: 'now 2-d' },
  Past7D: { code: 4, points: 43, stepSeconds: 4 * 60 * 60, timeframe: 'now 7-d' },
};

export function isBatchWindow(value: string): value is BatchWindow {
  return Object.prototype.hasOwnProperty.call(BATCH_WINDOWS, value);
}
