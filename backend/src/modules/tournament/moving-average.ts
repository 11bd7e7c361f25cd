/**
 * MOVING AVERAGE
 * ==============
 * Trailing simple moving average over a chronologically sorted sequence.
 */

import { SMA } from 'technicalindicators';
import { AppError, InsufficientDataError } from '../../common/errors.js';

function assertPeriod(period: number): void {
  if (!Number.isInteger(period) || period < 1) {
    throw new AppError('INVALID_PERIOD', `Moving average period must be a positive integer, got ${period}`, 500);
  }
}

/**
 * SMA ending at every index with at least `period` values behind it
 * (inclusive). Result length is values.length - period + 1.
 */
export function movingAverageSeries(values: readonly number[], period: number): number[] {
  assertPeriod(period);
  if (values.length < period) {
    throw new InsufficientDataError(period, values.length);
  }
  return SMA.calculate({ values: [...values], period });
}

/**
 * Average of the final `period` values.
 */
export function currentMovingAverage(values: readonly number[], period: number): number {
  assertPeriod(period);
  if (values.length < period) {
    throw new InsufficientDataError(period, values.length);
  }
  // Only the last window: no running-sum carry from earlier values
  const window = values.slice(values.length - period);
  // A flat window averages to its own value exactly
  if (window.every(v => v === window[0])) return window[0];
  const [ma] = SMA.calculate({ values: window, period });
  return ma;
}
