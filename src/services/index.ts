/**
 * Services Index
 *
 * Central export point for all service modules.
 */

export { DataFormatter, FIELD_REGISTRY, coerce } from './DataFormatter.js';
export { FileService } from './FileService.js';
export { PaginationEngine } from './PaginationEngine.js';
export type { PageFetcher, PaginationOptions, PaginationResult } from './PaginationEngine.js';
export { ResultCache } from './ResultCache.js';
export type { CacheKey, CacheKind } from './ResultCache.js';
export {
  compareLatestMean,
  compareWeeks,
  filterByDate,
  filterOutliers,
  pivotHeatmap,
  withDateAndHour,
} from './SeriesReshaper.js';
export type { HeatmapGrid, MeanComparison, WeeklyComparison } from './SeriesReshaper.js';
