/**
 * Application Data Manager
 *
 * The one entry point the dashboard calls. Loads locations, life-time stats
 * and noise series through the API client, formats them into registry rows
 * and keeps the latest successful result per entity in a ResultCache.
 *
 * A load only writes its cache slot after it fully succeeds, so a failed or
 * cancelled load leaves the previous slot in place. Errors still propagate.
 */

import type { NoiseApiClient, RequestOptions } from './noiseApiClient.js';
import type { ManagerSettings } from './config.js';
import { buildNoiseRequestParams } from './requestParams.js';
import { DataFormatter } from './services/DataFormatter.js';
import { ResultCache } from './services/ResultCache.js';
import type { DateRange, Granularity, Row } from './types.js';
import { createLogger, LOG_NAMESPACES, subtractDays, subtractHours } from './utils/index.js';

const logger = createLogger(LOG_NAMESPACES.MANAGER);

/**
 * Dependencies of the data manager
 */
export interface DataManagerConfig {
  /** API client instance */
  client: NoiseApiClient;
  /** Behaviour switches, usually from loadConfig() */
  settings: ManagerSettings;
  /** Formatter instance */
  formatter?: DataFormatter;
  /** Cache for loaded rows */
  cache?: ResultCache<Row[]>;
  /** Clock used for the freshness check */
  now?: () => Date;
}

/**
 * Whether a location with the given last measurement is still sending data.
 * Used for every "active/sending" indicator so they cannot disagree.
 */
export function isSendingData(
  lastMeasurement: Date | null | undefined,
  now: Date,
  thresholdHours: number,
): boolean {
  if (!lastMeasurement) {
    return false;
  }
  return lastMeasurement.getTime() > subtractHours(now, thresholdHours).getTime();
}

/**
 * Loads, formats and caches dashboard data
 */
export class AppDataManager {
  private readonly client: NoiseApiClient;
  private readonly settings: ManagerSettings;
  private readonly formatter: DataFormatter;
  private readonly cache: ResultCache<Row[]>;
  private readonly now: () => Date;

  constructor(config: DataManagerConfig) {
    this.client = config.client;
    this.settings = config.settings;
    this.formatter = config.formatter ?? new DataFormatter();
    this.cache = config.cache ?? new ResultCache<Row[]>();
    this.now = config.now ?? (() => new Date());
  }

  // ==========================================================================
  // Loaders
  // ==========================================================================

  /**
   * Load every location, then apply the active-only and deduplication filters
   */
  async loadLocations(): Promise<void> {
    const locations = await this.client.getLocations();
    let rows = this.formatter.wireToInternal(locations.map((location) => ({ ...location })));

    if (this.settings.filterActive) {
      rows = rows.filter((row) => row.active === true);
      logger.info(`Filtered active only to ${rows.length} locations`);
    }

    if (this.settings.deduplicate) {
      rows = deduplicateById(rows);
      logger.info(`Deduplicated to ${rows.length} locations`);
    }

    this.cache.set({ kind: 'locations' }, rows);
  }

  /**
   * Load the info record of a single location
   */
  async loadLocationInfo(locationId: string): Promise<void> {
    const locations = await this.client.getLocations(locationId);
    const rows = this.formatter.wireToInternal(locations.map((location) => ({ ...location })));

    this.cache.set({ kind: 'info', locationId }, rows);
  }

  /**
   * Load the life-time aggregate of a location: observed date range and sample count
   */
  async loadLocationStats(locationId: string): Promise<void> {
    const params = buildNoiseRequestParams({ granularity: 'life-time' });
    const data = await this.client.getLocationNoiseData(locationId, params);
    const rows = this.formatter.wireToInternal(data.measurements.map((m) => ({ ...m })));

    logger.info(`Received ${rows.length} rows of stats for location ${locationId}`);

    this.cache.set({ kind: 'stats', locationId }, rows);
  }

  /**
   * Load a noise series for a location
   *
   * Without a window the series covers `lookbackDays` ending at the last
   * life-time measurement; stats are loaded first when not cached. Hourly
   * series get explicit gap rows when gap filling is enabled.
   *
   * A load cancelled through `options.signal` returns without touching the cache.
   */
  async loadLocationNoise(
    locationId: string,
    granularity: Granularity,
    window: DateRange = {},
    options: RequestOptions = {},
  ): Promise<void> {
    const range = await this.resolveWindow(locationId, window);
    const params = buildNoiseRequestParams({ granularity, ...range });

    const data = await this.client.getLocationNoiseData(locationId, params, options);
    if (data.cancelled) {
      logger.info(`Noise load for location ${locationId} cancelled, keeping previous data`);
      return;
    }

    let rows = this.formatter.wireToInternal(data.measurements.map((m) => ({ ...m })));

    if (this.settings.fillGaps && granularity === 'hourly') {
      rows = this.formatter.fillMissingTimes(rows, 'hour');
    }

    logger.info(`Stored ${rows.length} ${granularity} rows for location ${locationId}`);

    this.cache.set({ kind: 'noise', locationId, granularity }, rows);
  }

  // ==========================================================================
  // Derived state
  // ==========================================================================

  /**
   * True when the location has recorded no samples at all.
   * The dashboard uses it to redirect away from an empty location page.
   */
  async isNoiseAvailable(locationId: string): Promise<boolean> {
    const [stats] = await this.ensureStats(locationId);
    return !stats || stats.count === 0;
  }

  /**
   * Whether the location's last measurement falls within the freshness window
   */
  async getActiveStatus(locationId: string): Promise<boolean> {
    const [stats] = await this.ensureStats(locationId);
    return isSendingData(stats?.end, this.now(), this.settings.activeThresholdHours);
  }

  async getRadius(locationId: string): Promise<number | undefined> {
    const [info] = await this.ensureInfo(locationId);
    return info?.radius ?? undefined;
  }

  async getLabel(locationId: string): Promise<string | undefined> {
    const [info] = await this.ensureInfo(locationId);
    return info?.label ?? undefined;
  }

  /**
   * CSV of a cached noise series, with wire column names
   *
   * @returns undefined when the series has not been loaded
   */
  exportLocationNoise(locationId: string, granularity: Granularity): string | undefined {
    const rows = this.getLocationNoise(locationId, granularity);
    if (!rows) {
      return undefined;
    }
    return this.formatter.toCsv(this.formatter.internalToWire(rows));
  }

  // ==========================================================================
  // Cached slots
  // ==========================================================================

  // Getters hand out copies; only the loaders write the cache.

  getLocations(): Row[] | undefined {
    return copyRows(this.cache.get({ kind: 'locations' }));
  }

  getLocationInfo(locationId: string): Row[] | undefined {
    return copyRows(this.cache.get({ kind: 'info', locationId }));
  }

  getLocationStats(locationId: string): Row[] | undefined {
    return copyRows(this.cache.get({ kind: 'stats', locationId }));
  }

  getLocationNoise(locationId: string, granularity: Granularity): Row[] | undefined {
    return copyRows(this.cache.get({ kind: 'noise', locationId, granularity }));
  }

  /**
   * Forget cached data of one location, or of everything when no id is given
   */
  invalidate(locationId?: string): void {
    const removed = this.cache.invalidate(locationId === undefined ? {} : { locationId });
    logger.debug(`Invalidated ${removed} cached slot(s)`);
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private async ensureStats(locationId: string): Promise<Row[]> {
    const cached = this.getLocationStats(locationId);
    if (cached) {
      return cached;
    }
    await this.loadLocationStats(locationId);
    return this.getLocationStats(locationId) ?? [];
  }

  private async ensureInfo(locationId: string): Promise<Row[]> {
    const cached = this.getLocationInfo(locationId);
    if (cached) {
      return cached;
    }
    await this.loadLocationInfo(locationId);
    return this.getLocationInfo(locationId) ?? [];
  }

  /**
   * Fill in the missing ends of a noise window. The end defaults to the last
   * life-time measurement, the start to `lookbackDays` before the end. A
   * location without data gets no window.
   */
  private async resolveWindow(locationId: string, window: DateRange): Promise<DateRange> {
    let end = window.end;
    if (!end) {
      const [stats] = await this.ensureStats(locationId);
      end = stats?.end ?? undefined;
    }

    const start = window.start ?? (end ? subtractDays(end, this.settings.lookbackDays) : undefined);

    return {
      ...(start && { start }),
      ...(end && { end }),
    };
  }
}

/**
 * Keep the first row per device identifier, preserving order
 */
function deduplicateById(rows: readonly Row[]): Row[] {
  const seen = new Set<string>();
  return rows.filter((row) => {
    const id = row.deviceId ?? '';
    if (seen.has(id)) {
      return false;
    }
    seen.add(id);
    return true;
  });
}

function copyRows(rows: readonly Row[] | undefined): Row[] | undefined {
  return rows?.map((row) => ({
    ...row,
    ...(row.timestamp && { timestamp: new Date(row.timestamp.getTime()) }),
    ...(row.start && { start: new Date(row.start.getTime()) }),
    ...(row.end && { end: new Date(row.end.getTime()) }),
    ...(row.date && { date: new Date(row.date.getTime()) }),
  }));
}
