import { afterEach, describe, expect, it, vi } from 'vitest';
import { AppDataManager, isSendingData } from './dataManager.js';
import type { ManagerSettings } from './config.js';
import { NoiseApiClient } from './noiseApiClient.js';
import { TransportError } from './errors.js';
import { FAKE_BASE_URL, FakeNoiseApi, type FakeResponse } from './testing/fakeNoiseApi.js';

const SETTINGS: ManagerSettings = {
  filterActive: true,
  deduplicate: true,
  fillGaps: true,
  lookbackDays: 7,
  activeThresholdHours: 5,
};

const LIFETIME = {
  start: '2024-01-01T00:00:00Z',
  end: '2024-03-10T00:00:00Z',
  count: 100,
  min: 30,
  max: 80,
  mean: 50,
};

function location(id: string, active: boolean, label = `Sensor ${id}`) {
  return { id, label, latitude: 51.05, longitude: 3.72, radius: 40, active };
}

/**
 * Routes the three endpoints; noise pages come from `hourlyPages` unless the
 * request is a life-time one.
 */
function noiseApi(options: {
  locations?: unknown[];
  lifetime?: unknown[];
  hourlyPages?: unknown[][];
}) {
  return (url: URL): FakeResponse => {
    if (url.pathname === '/v1/locations') {
      return { body: { locations: options.locations ?? [] } };
    }
    if (url.pathname.endsWith('/noise')) {
      if (url.searchParams.get('granularity') === 'life-time') {
        return { body: { measurements: options.lifetime ?? [] } };
      }
      const page = Number(url.searchParams.get('page') ?? '0');
      return { body: { measurements: options.hourlyPages?.[page] ?? [] } };
    }
    const id = url.pathname.split('/').pop();
    return { body: { locations: [location(id ?? '', true)] } };
  };
}

function setup(route: (url: URL) => FakeResponse, settings: Partial<ManagerSettings> = {}, now?: Date) {
  const api = new FakeNoiseApi(route);
  vi.stubGlobal('fetch', api.fetch);
  const client = new NoiseApiClient({ baseUrl: FAKE_BASE_URL });
  const manager = new AppDataManager({
    client,
    settings: { ...SETTINGS, ...settings },
    now: now ? () => now : undefined,
  });
  return { api, manager };
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('AppDataManager.loadLocations', () => {
  it('keeps the unique active locations', async () => {
    const { manager } = setup(
      noiseApi({
        locations: [location('a', true), location('b', true), location('a', false, 'Old sensor a')],
      }),
    );

    await manager.loadLocations();

    expect(manager.getLocations()?.map((row) => row.deviceId)).toEqual(['a', 'b']);
    expect(manager.getLocations()?.[0]).toEqual({
      deviceId: 'a',
      label: 'Sensor a',
      latitude: 51.05,
      longitude: 3.72,
      radius: 40,
      active: true,
    });
  });

  it('leaves every location in place when both filters are off', async () => {
    const { manager } = setup(
      noiseApi({
        locations: [location('a', true), location('b', true), location('a', false)],
      }),
      { filterActive: false, deduplicate: false },
    );

    await manager.loadLocations();

    expect(manager.getLocations()).toHaveLength(3);
  });

  it('hands out copies that callers cannot use to change the cache', async () => {
    const { manager } = setup(noiseApi({ locations: [location('a', true)] }));
    await manager.loadLocations();

    const returned = manager.getLocations() ?? [];
    const [first] = returned;
    if (first) {
      first.label = 'Renamed';
    }
    returned.length = 0;

    expect(manager.getLocations()).toHaveLength(1);
    expect(manager.getLocations()?.[0]?.label).toBe('Sensor a');
  });

  it('keeps the previous slot when a reload fails', async () => {
    let failing = false;
    const { manager } = setup((url) =>
      failing
        ? { status: 502, body: { error: 'bad gateway' } }
        : noiseApi({ locations: [location('a', true)] })(url),
    );

    await manager.loadLocations();
    failing = true;

    await expect(manager.loadLocations()).rejects.toBeInstanceOf(TransportError);
    expect(manager.getLocations()?.map((row) => row.deviceId)).toEqual(['a']);
  });
});

describe('AppDataManager.loadLocationNoise', () => {
  it('defaults to the seven days ending at the last life-time measurement', async () => {
    const { api, manager } = setup(
      noiseApi({
        lifetime: [LIFETIME],
        hourlyPages: [
          [
            { timestamp: '2024-03-09T10:00:00Z', min: 40, max: 60, mean: 50 },
            { timestamp: '2024-03-09T12:00:00Z', min: 41, max: 61, mean: 51 },
          ],
        ],
      }),
    );

    await manager.loadLocationNoise('x', 'hourly');

    const hourlyRequests = api
      .requestsTo('/v1/locations/x/noise')
      .filter((url) => url.searchParams.get('granularity') === 'hourly');
    expect(hourlyRequests).toHaveLength(2);
    expect(hourlyRequests[0]?.searchParams.get('start')).toBe('2024-03-03T00:00:00Z');
    expect(hourlyRequests[0]?.searchParams.get('end')).toBe('2024-03-10T00:00:00Z');

    expect(manager.getLocationNoise('x', 'hourly')).toEqual([
      { timestamp: new Date('2024-03-09T10:00:00Z'), min: 40, max: 60, mean: 50 },
      { timestamp: new Date('2024-03-09T11:00:00Z'), min: null, max: null, mean: null },
      { timestamp: new Date('2024-03-09T12:00:00Z'), min: 41, max: 61, mean: 51 },
    ]);
  });

  it('hands out timestamps that do not alias the cached ones', async () => {
    const { manager } = setup(noiseApi({ lifetime: [LIFETIME] }));
    await manager.loadLocationStats('x');

    manager.getLocationStats('x')?.[0]?.end?.setTime(0);

    expect(manager.getLocationStats('x')?.[0]?.end).toEqual(new Date('2024-03-10T00:00:00Z'));
  });

  it('reuses cached stats instead of requesting them again', async () => {
    const { api, manager } = setup(noiseApi({ lifetime: [LIFETIME] }));

    await manager.loadLocationStats('x');
    await manager.loadLocationNoise('x', 'raw');
    await manager.loadLocationNoise('x', 'hourly');

    const lifetimeRequests = api
      .requestsTo('/v1/locations/x/noise')
      .filter((url) => url.searchParams.get('granularity') === 'life-time');
    expect(lifetimeRequests).toHaveLength(1);
  });

  it('uses an explicit window as given and does not fill raw series', async () => {
    const { api, manager } = setup(
      noiseApi({
        hourlyPages: [
          [
            { timestamp: '2024-02-01T10:00:00Z', min: 40, max: 60, mean: 50 },
            { timestamp: '2024-02-01T12:00:00Z', min: 41, max: 61, mean: 51 },
          ],
        ],
      }),
    );

    await manager.loadLocationNoise('x', 'raw', {
      start: new Date('2024-02-01T00:00:00Z'),
      end: new Date('2024-02-02T00:00:00Z'),
    });

    expect(api.requests[0]?.url.searchParams.get('start')).toBe('2024-02-01T00:00:00Z');
    expect(api.requests[0]?.url.searchParams.get('granularity')).toBe('raw');
    expect(manager.getLocationNoise('x', 'raw')).toHaveLength(2);
  });

  it('leaves the cache untouched when the load is cancelled', async () => {
    const { api, manager } = setup(noiseApi({ hourlyPages: [[LIFETIME]] }));
    const controller = new AbortController();
    controller.abort();

    await manager.loadLocationNoise(
      'x',
      'hourly',
      { start: new Date('2024-02-01T00:00:00Z'), end: new Date('2024-02-02T00:00:00Z') },
      { signal: controller.signal },
    );

    expect(api.requests).toHaveLength(0);
    expect(manager.getLocationNoise('x', 'hourly')).toBeUndefined();
  });
});

describe('AppDataManager with an empty location', () => {
  it('reports no noise after one life-time request and loads empty series', async () => {
    const { api, manager } = setup(noiseApi({ lifetime: [] }));

    await expect(manager.isNoiseAvailable('x')).resolves.toBe(true);
    expect(api.requests).toHaveLength(1);

    await manager.loadLocationNoise('x', 'hourly');
    await manager.loadLocationNoise('x', 'raw');

    expect(manager.getLocationNoise('x', 'hourly')).toEqual([]);
    expect(manager.getLocationNoise('x', 'raw')).toEqual([]);
    expect(api.requests).toHaveLength(3);
    expect(api.requests[1]?.url.searchParams.has('start')).toBe(false);
    expect(api.requests[1]?.url.searchParams.has('end')).toBe(false);
  });

  it('reports noise for a location with samples', async () => {
    const { manager } = setup(noiseApi({ lifetime: [LIFETIME] }));

    await expect(manager.isNoiseAvailable('x')).resolves.toBe(false);
  });
});

describe('AppDataManager.getActiveStatus', () => {
  it('is true while the last measurement is inside the freshness window', async () => {
    const { manager } = setup(noiseApi({ lifetime: [LIFETIME] }), {}, new Date('2024-03-10T03:00:00Z'));

    await expect(manager.getActiveStatus('x')).resolves.toBe(true);
  });

  it('is false once the last measurement is older than the window', async () => {
    const { manager } = setup(noiseApi({ lifetime: [LIFETIME] }), {}, new Date('2024-03-10T06:00:00Z'));

    await expect(manager.getActiveStatus('x')).resolves.toBe(false);
  });

  it('is false without data', async () => {
    const { manager } = setup(noiseApi({ lifetime: [] }), {}, new Date('2024-03-10T03:00:00Z'));

    await expect(manager.getActiveStatus('x')).resolves.toBe(false);
  });
});

describe('isSendingData', () => {
  it('compares against now minus the threshold, exclusive', () => {
    const now = new Date('2024-03-10T05:00:00Z');

    expect(isSendingData(new Date('2024-03-10T00:00:01Z'), now, 5)).toBe(true);
    expect(isSendingData(new Date('2024-03-10T00:00:00Z'), now, 5)).toBe(false);
    expect(isSendingData(null, now, 5)).toBe(false);
  });
});

describe('AppDataManager location info', () => {
  it('loads the info record once for label and radius', async () => {
    const { api, manager } = setup(noiseApi({}));

    await expect(manager.getLabel('q7')).resolves.toBe('Sensor q7');
    await expect(manager.getRadius('q7')).resolves.toBe(40);
    expect(api.requestsTo('/v1/locations/q7')).toHaveLength(1);
  });
});

describe('AppDataManager.exportLocationNoise', () => {
  it('renders the cached series as CSV with wire column names', async () => {
    const { manager } = setup(
      noiseApi({
        lifetime: [LIFETIME],
        hourlyPages: [
          [
            { timestamp: '2024-03-09T10:00:00Z', min: 40, max: 60, mean: 50 },
            { timestamp: '2024-03-09T12:00:00Z', min: 41.5, max: 61, mean: 51 },
          ],
        ],
      }),
    );

    expect(manager.exportLocationNoise('x', 'hourly')).toBeUndefined();
    await manager.loadLocationNoise('x', 'hourly');

    expect(manager.exportLocationNoise('x', 'hourly')).toBe(
      'timestamp,min,max,mean\n' +
        '2024-03-09T10:00:00Z,40,60,50\n' +
        '2024-03-09T11:00:00Z,,,\n' +
        '2024-03-09T12:00:00Z,41.5,61,51\n',
    );
  });

  it('drops a location from the cache on invalidate', async () => {
    const { manager } = setup(noiseApi({ lifetime: [LIFETIME] }));

    await manager.loadLocationStats('x');
    manager.invalidate('x');

    expect(manager.getLocationStats('x')).toBeUndefined();
  });
});
