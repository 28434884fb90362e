/**
 * Main Entry Point
 *
 * Loads every location, reports which ones are sending data and optionally
 * exports each location's hourly noise series as CSV.
 */

import dotenv from 'dotenv';
import { AppDataManager } from './dataManager.js';
import { loadConfig } from './config.js';
import { NoiseApiClient } from './noiseApiClient.js';
import { FileService } from './services/FileService.js';
import { compareWeeks } from './services/SeriesReshaper.js';
import { TransportError } from './errors.js';
import { createLogger, formatDuration, LOG_NAMESPACES } from './utils/index.js';

const logger = createLogger(LOG_NAMESPACES.MAIN);

// Load environment variables from .env file
dotenv.config();

/**
 * Main application entry point
 */
async function main(): Promise<void> {
  const startTime = new Date();

  console.log('='.repeat(60));
  console.log('Noise Data Client');
  console.log('='.repeat(60));
  console.log(`Start time: ${startTime.toISOString()}`);

  try {
    const config = loadConfig();
    const client = new NoiseApiClient({
      baseUrl: config.apiUrl,
      apiToken: config.apiToken,
      timeoutMs: config.requestTimeoutMs,
    });
    const manager = new AppDataManager({ client, settings: config });

    console.log(`API: ${config.apiUrl}`);
    console.log(`Freshness window: ${config.activeThresholdHours}h`);
    console.log('='.repeat(60));

    await manager.loadLocations();
    const locations = manager.getLocations() ?? [];

    let sending = 0;
    for (const location of locations) {
      const id = location.deviceId;
      if (!id) continue;

      const active = await manager.getActiveStatus(id);
      const empty = await manager.isNoiseAvailable(id);
      if (active) sending += 1;

      console.log(
        `${id.padEnd(16)} ${String(location.label ?? '').padEnd(30)} ${
          empty ? 'no data' : active ? 'sending' : 'silent'
        }`,
      );

      if (config.exportDir && !empty) {
        await manager.loadLocationNoise(id, 'hourly');
        const stats = manager.getLocationStats(id)?.[0];
        if (stats?.end) {
          const week = compareWeeks(
            manager.getLocationNoise(id, 'hourly') ?? [],
            stats.end,
            config.noiseThreshold,
          );
          console.log(
            `${''.padEnd(16)} hours above ${config.noiseThreshold} dB: ${week.outlierCount} (prior week ${week.outlierCountPrior})`,
          );
        }

        const csv = manager.exportLocationNoise(id, 'hourly');
        if (csv !== undefined) {
          await new FileService(config.exportDir).writeCsv(`${id}-hourly`, csv);
        }
      }
    }

    const duration = formatDuration(Date.now() - startTime.getTime());

    console.log('='.repeat(60));
    console.log(`Locations: ${locations.length}, sending data: ${sending}`);
    console.log(`Duration: ${duration}`);
    console.log('='.repeat(60));

    process.exit(0);
  } catch (error) {
    logger.error('Load failed', error);

    console.error('\n' + '='.repeat(60));
    console.error('LOAD FAILED');
    console.error('='.repeat(60));
    console.error('Error:', error instanceof Error ? error.message : String(error));

    if (error instanceof TransportError && error.url) {
      console.error(`Request: ${error.url}`);
    }

    if (error instanceof Error && error.stack) {
      console.error('\nStack trace:');
      console.error(error.stack);
    }

    console.error('='.repeat(60));
    process.exit(1);
  }
}

// Start the application
void main();
