/**
 * Series Reshaper
 *
 * Derived views over formatted noise series: date windows, outliers, the
 * hour-by-day heatmap and the latest-vs-previous comparisons shown on the
 * dashboard indicators.
 */

import type { DateRange, Row } from '../types.js';
import { TIME } from '../utils/constants.js';
import { startOfDay, subtractDays } from '../utils/datetime.js';

/**
 * Hour-by-day grid. `values[h][d]` belongs to `hours[h]` on `dates[d]`.
 */
export interface HeatmapGrid {
  hours: number[];
  dates: Date[];
  values: (number | null)[][];
}

/**
 * Latest mean against the one before it
 */
export interface MeanComparison {
  latest: number;
  reference: number;
  /** Change relative to the latest value, in percent, one decimal */
  deltaPercent: number;
}

/**
 * Last seven days against the seven days before them
 */
export interface WeeklyComparison {
  count: number;
  countPrior: number;
  avgMin: number | null;
  avgMinPrior: number | null;
  outlierCount: number;
  outlierCountPrior: number;
}

type TimedRow = Row & { timestamp: Date };

function hasTimestamp(row: Row): row is TimedRow {
  return row.timestamp instanceof Date;
}

/**
 * Keep rows whose timestamp lies inside the window, both ends inclusive
 */
export function filterByDate(rows: readonly Row[], range: DateRange): Row[] {
  const start = range.start?.getTime() ?? -Infinity;
  const end = range.end?.getTime() ?? Infinity;

  return rows.filter(hasTimestamp).filter((row) => {
    const time = row.timestamp.getTime();
    return time >= start && time <= end;
  });
}

/**
 * Rows whose maximum exceeds the noise threshold
 */
export function filterOutliers(rows: readonly Row[], threshold: number): Row[] {
  return rows.filter((row) => typeof row.max === 'number' && row.max > threshold);
}

/**
 * Add the `date` (UTC midnight) and `hour` fields derived from each timestamp
 */
export function withDateAndHour(rows: readonly Row[]): Row[] {
  return rows.filter(hasTimestamp).map((row) => ({
    ...row,
    date: startOfDay(row.timestamp),
    hour: row.timestamp.getUTCHours(),
  }));
}

/**
 * Pivot an hourly series into an hour-by-day grid of the mean `min` or `max`.
 * Every day between the first and the last sample gets a column; hours only
 * appear when at least one sample has them.
 */
export function pivotHeatmap(rows: readonly Row[], field: 'min' | 'max'): HeatmapGrid {
  const sums = new Map<string, { total: number; samples: number }>();
  const hours = new Set<number>();
  let firstDay = Infinity;
  let lastDay = -Infinity;

  for (const row of withDateAndHour(rows)) {
    const value = row[field];
    if (typeof value !== 'number' || !row.date || typeof row.hour !== 'number') continue;

    const day = row.date.getTime();
    firstDay = Math.min(firstDay, day);
    lastDay = Math.max(lastDay, day);
    hours.add(row.hour);

    const key = `${row.hour}:${day}`;
    const cell = sums.get(key) ?? { total: 0, samples: 0 };
    cell.total += value;
    cell.samples += 1;
    sums.set(key, cell);
  }

  if (hours.size === 0) {
    return { hours: [], dates: [], values: [] };
  }

  const dates: Date[] = [];
  for (let day = firstDay; day <= lastDay; day += TIME.MS_PER_DAY) {
    dates.push(new Date(day));
  }

  const sortedHours = Array.from(hours).sort((a, b) => a - b);
  const values = sortedHours.map((hour) =>
    dates.map((date) => {
      const cell = sums.get(`${hour}:${date.getTime()}`);
      return cell ? cell.total / cell.samples : null;
    }),
  );

  return { hours: sortedHours, dates, values };
}

/**
 * Compare the most recent mean with the one before it. With a single sample
 * both sides are the same value.
 *
 * @returns undefined when no row carries a mean
 */
export function compareLatestMean(rows: readonly Row[]): MeanComparison | undefined {
  const recent = rows
    .filter(hasTimestamp)
    .filter((row): row is TimedRow & { mean: number } => typeof row.mean === 'number')
    .sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime())
    .slice(0, 2);

  const [latestRow, previousRow] = recent;
  if (!latestRow) {
    return undefined;
  }

  const latest = latestRow.mean;
  const reference = (previousRow ?? latestRow).mean;
  const deltaPercent = latest === 0 ? 0 : Math.round(((latest - reference) / latest) * 1000) / 10;

  return { latest, reference, deltaPercent };
}

/**
 * Rolling comparison of the week ending at `referenceEnd` with the week before.
 * The current week is `[end - 7d, end]`, the prior week `[end - 14d, end - 7d)`.
 */
export function compareWeeks(
  rows: readonly Row[],
  referenceEnd: Date,
  threshold: number,
): WeeklyComparison {
  const end = referenceEnd.getTime();
  const weekStart = subtractDays(referenceEnd, 7).getTime();
  const priorStart = subtractDays(referenceEnd, 14).getTime();

  const current: Row[] = [];
  const prior: Row[] = [];
  for (const row of rows.filter(hasTimestamp)) {
    const time = row.timestamp.getTime();
    if (time >= weekStart && time <= end) {
      current.push(row);
    } else if (time >= priorStart && time < weekStart) {
      prior.push(row);
    }
  }

  return {
    count: current.length,
    countPrior: prior.length,
    avgMin: averageOf(current, 'min'),
    avgMinPrior: averageOf(prior, 'min'),
    outlierCount: filterOutliers(current, threshold).length,
    outlierCountPrior: filterOutliers(prior, threshold).length,
  };
}

function averageOf(rows: readonly Row[], field: 'min' | 'max' | 'mean'): number | null {
  const values = rows.map((row) => row[field]).filter((v): v is number => typeof v === 'number');
  if (values.length === 0) {
    return null;
  }
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}
