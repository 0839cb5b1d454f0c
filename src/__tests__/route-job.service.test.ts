/**
 * =============================================================================
 * ROUTE JOB SERVICE - Orchestration Tests
 * =============================================================================
 *
 * Geocoder and routing service are both answered by one in-process fake:
 * - geocode "A"      -> 55.5, 37.5
 * - geocode "D"      -> 59.75, 30.25
 * - geocode "lon,lat" -> "Reverse addr"
 * - routing          -> 12345 m, 678 s
 * =============================================================================
 */

import { InputError, ValidationError } from '../core';
import { GeocodingService } from '../modules/geocoding/geocoding.service';
import { PointResolver } from '../modules/geocoding/point-resolver.service';
import { RouteJobService, pickRouteOptions } from '../modules/route-job/route-job.service';
import { RoutingService } from '../modules/routing';
import {
  FakeReply,
  createFakeFetch,
  emptyGeocoderReply,
  geocoderReply,
  routingReply,
  searchParam,
  testConfig,
} from './helpers/fake-fetch';

jest.mock('../shared/services/logger.service', () => ({
  ...jest.requireActual('../shared/services/logger.service'),
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const FORWARD: Record<string, string> = {
  A: '37.5 55.5',
  D: '30.25 59.75',
};

function defaultResponder(url: string): FakeReply | Error {
  if (url.startsWith('https://geocode-maps.yandex.ru')) {
    const geocode = searchParam(url, 'geocode') ?? '';
    if (geocode.includes(',')) {
      return geocoderReply(geocode.replace(',', ' '), 'Reverse addr');
    }
    const pos = FORWARD[geocode];
    return pos ? geocoderReply(pos) : emptyGeocoderReply();
  }
  return routingReply(12345, 678);
}

function createService(responder: (url: string) => FakeReply | Error = defaultResponder) {
  const config = testConfig();
  const fetchFn = createFakeFetch(responder);
  const service = new RouteJobService(
    new PointResolver(new GeocodingService(config.geocoder, fetchFn)),
    new RoutingService(config.routing, fetchFn)
  );
  const routingCalls = () => fetchFn.mock.calls.filter(([url]) => url.startsWith('https://routing.api.2gis.com'));
  return { service, fetchFn, routingCalls };
}

function bodyOf(init: RequestInit | undefined): Record<string, unknown> {
  return typeof init?.body === 'string' ? JSON.parse(init.body) : {};
}

// =============================================================================
// SINGLE MODE
// =============================================================================

describe('RouteJobService.runSingle', () => {
  it('resolves both points and reports meters, kilometers, seconds and minutes', async () => {
    const { service } = createService();

    const output = await service.runSingle({
      from: { address: 'A' },
      to: { lat: 1, lon: 2 },
    });

    expect(output).toEqual({
      success: true,
      from: { address: 'A', lat: 55.5, lon: 37.5 },
      to: { address: 'Reverse addr', lat: 1, lon: 2 },
      distance_meters: 12345,
      distance_km: 12.345,
      duration_seconds: 678,
      duration_minutes: 11.3,
    });
  });

  it('passes top-level route options to the routing service', async () => {
    const { service, routingCalls } = createService();

    await service.runSingle({
      from: { lat: 1, lon: 2, address: 'X' },
      to: { lat: 3, lon: 4, address: 'Y' },
      vehicle: 'truck',
      traffic: 'enabled',
      vehicle_params: { height: 3.8, width: 0 },
    });

    const body = bodyOf(routingCalls()[0][1]);
    expect(body.transport).toBe('truck');
    expect(body.traffic_mode).toBe('jam');
    expect(body.truck_params).toEqual({ height: 3.8 });
  });

  it('fails the whole run when a point cannot be resolved', async () => {
    const { service, routingCalls } = createService();

    await expect(service.runSingle({ from: {}, to: { lat: 1, lon: 2 } })).rejects.toThrow(
      new InputError('[from] Neither coordinates nor address given')
    );
    expect(routingCalls()).toHaveLength(0);
  });

  it('rejects input that does not match the schema', async () => {
    const { service } = createService();

    await expect(service.runSingle({ from: 'Moscow' })).rejects.toBeInstanceOf(ValidationError);
  });
});

// =============================================================================
// BATCH MODE
// =============================================================================

describe('RouteJobService.runBatch', () => {
  it('isolates a failing route from the others', async () => {
    const { service, routingCalls } = createService();

    const output = await service.runBatch({
      routes: [
        { id: 'r1', loading: { address: 'A' }, unloading: { lat: 1, lon: 2 } },
        { id: 'r2', loading: {}, unloading: { lat: 1, lon: 2 } },
        { id: 'r3', loading: { address: 'C', lat: 3, lon: 4 }, unloading: { address: 'D' } },
      ],
    });

    expect(output.routes).toHaveLength(3);
    expect(output.routes[0]).toEqual({
      id: 'r1',
      loading: { address: 'A', lat: '55.500000', lon: '37.500000' },
      unloading: { address: 'Reverse addr', lat: '1.000000', lon: '2.000000' },
      distance_m: 12345,
      duration_s: 678,
      error: null,
    });
    expect(output.routes[1]).toEqual({
      id: 'r2',
      loading: {},
      unloading: { lat: 1, lon: 2 },
      distance_m: null,
      duration_s: null,
      error: '[r2 / loading] Neither coordinates nor address given',
    });
    expect(output.routes[2]).toEqual({
      id: 'r3',
      loading: { address: 'C', lat: '3.000000', lon: '4.000000' },
      unloading: { address: 'D', lat: '59.750000', lon: '30.250000' },
      distance_m: 12345,
      duration_s: 678,
      error: null,
    });
    expect(routingCalls()).toHaveLength(2);
  });

  it('keeps previously known distance/duration on failure and the resolved loading point', async () => {
    const { service } = createService();

    const output = await service.runBatch({
      routes: [
        {
          id: 7,
          loading: { lat: 1, lon: 2, address: 'Depot' },
          unloading: { address: 'Unknown street' },
          distance_m: 500,
          duration_s: 60,
        },
      ],
    });

    expect(output.routes[0]).toEqual({
      id: 7,
      loading: { address: 'Depot', lat: '1.000000', lon: '2.000000' },
      unloading: { address: 'Unknown street' },
      distance_m: 500,
      duration_s: 60,
      error: 'Geocoder found nothing for address "Unknown street"',
    });
  });

  it('records upstream failures per route and continues', async () => {
    let routingCount = 0;
    const { service } = createService((url) => {
      if (url.startsWith('https://routing.api.2gis.com')) {
        routingCount++;
        return routingCount === 1 ? { status: 503, body: 'unavailable' } : routingReply(10, 20);
      }
      return defaultResponder(url);
    });

    const output = await service.runBatch({
      routes: [
        { id: 'a', loading: { lat: 1, lon: 2, address: 'P' }, unloading: { lat: 3, lon: 4, address: 'Q' } },
        { id: 'b', loading: { lat: 1, lon: 2, address: 'P' }, unloading: { lat: 3, lon: 4, address: 'Q' } },
      ],
    });

    expect(output.routes.map(route => route.error)).toEqual(['Routing returned HTTP 503: unavailable', null]);
    expect(output.routes[1].distance_m).toBe(10);
    expect(output.routes[1].duration_s).toBe(20);
  });

  it('records routes that are not objects', async () => {
    const { service } = createService();

    const output = await service.runBatch({ routes: [{ id: 'ok', loading: { address: 'A' }, unloading: { address: 'D' } }, 42] });

    expect(output.routes[0].error).toBeNull();
    expect(output.routes[1]).toEqual({
      id: '',
      loading: {},
      unloading: {},
      distance_m: null,
      duration_s: null,
      error: '[#2] Invalid route: (root): Expected object, received number',
    });
  });

  it('fails a route with non-numeric coordinates without calling the routing service', async () => {
    const { service, routingCalls } = createService();

    const output = await service.runBatch({
      routes: [
        { id: 'bad', loading: { lat: 'abc', lon: '2' }, unloading: { address: 'D' }, distance_m: 900 },
        { id: 'good', loading: { address: 'A' }, unloading: { address: 'D' } },
      ],
    });

    expect(output.routes[0]).toEqual({
      id: 'bad',
      loading: { lat: 'abc', lon: '2' },
      unloading: { address: 'D' },
      distance_m: 900,
      duration_s: null,
      error: '[bad / loading] Coordinates are not numeric: lat="abc", lon="2"',
    });
    expect(output.routes[1].error).toBeNull();
    expect(routingCalls()).toHaveLength(1);
  });

  it('lets route options override top-level defaults', async () => {
    const { service, routingCalls } = createService();

    await service.runBatch({
      vehicle: 'truck',
      locale: 'en',
      routes: [
        { id: 'x', loading: { address: 'A' }, unloading: { address: 'D' } },
        { id: 'y', loading: { address: 'A' }, unloading: { address: 'D' }, vehicle: 'driving' },
      ],
    });

    const [first, second] = routingCalls().map(([, init]) => bodyOf(init));
    expect(first.transport).toBe('truck');
    expect(first.locale).toBe('en');
    expect(second.transport).toBe('driving');
    expect(second.locale).toBe('en');
  });

  it('does not call reverse geocoding when an address is supplied', async () => {
    const { service, fetchFn } = createService();

    await service.runBatch({
      routes: [{ id: 'z', loading: { lat: 1, lon: 2, address: 'P' }, unloading: { lat: 3, lon: 4, address: 'Q' } }],
    });

    expect(fetchFn).toHaveBeenCalledTimes(1);
  });
});

// =============================================================================
// MODE DETECTION
// =============================================================================

describe('RouteJobService.run', () => {
  it('detects batch mode by a routes array', async () => {
    const { service } = createService();

    const result = await service.run({ routes: [] });

    expect(result).toEqual({ mode: 'batch', output: { routes: [] } });
  });

  it('falls back to single mode', async () => {
    const { service } = createService();

    const result = await service.run({ from: { address: 'A' }, to: { address: 'D' } });

    expect(result.mode).toBe('single');
  });
});

describe('pickRouteOptions', () => {
  it('copies only the route option fields that are set', () => {
    expect(pickRouteOptions({ vehicle: 'truck', priority: undefined, utc: 0 })).toEqual({ vehicle: 'truck', utc: 0 });
  });
});
