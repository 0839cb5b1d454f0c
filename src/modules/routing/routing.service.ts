/**
 * =============================================================================
 * ROUTING SERVICE - Distance & Duration via 2GIS Routing API
 * =============================================================================
 *
 * Builds a routing request from two points and a set of optional route
 * options, sends it, and reads distance/duration from the first route
 * candidate. Candidates are not compared, the first one is authoritative.
 *
 * PROFILES (ROUTING_PROFILE):
 * ─────────────────────────────────────────────────────────────────────────────
 * routing     POST JSON body, default transport "driving", route_mode shortest
 * carrouting  GET query string, default type "truck", traffic disabled
 *
 * Authentication is always the `key` query parameter, never the body.
 * No unit conversion happens here: meters and seconds as returned.
 * =============================================================================
 */

import { AppConfig } from '../../config/environment';
import { ConfigurationError, UpstreamError, VEHICLE_PARAM_KEYS } from '../../core';
import { logger } from '../../shared/services/logger.service';
import { FetchFn, assertOk, buildUrl, parseJsonBody, requestText } from '../../shared/utils/http.utils';
import {
  ROUTING_CONFIG,
  TRUCK_VEHICLE,
  RouteDistance,
  RouteOptions,
  RoutePoint,
  RoutingRequest,
  RoutingRequestBody,
  VehicleDimensions,
  VehicleParams,
  carroutingResponseSchema,
  routingResponseSchema,
} from './routing.schema';

const SERVICE_NAME = 'Routing';

// =============================================================================
// MAIN SERVICE CLASS
// =============================================================================

export class RoutingService {
  constructor(
    private readonly config: AppConfig['routing'],
    private readonly fetchFn: FetchFn = fetch
  ) {}

  // ===========================================================================
  // PUBLIC: Route
  // ===========================================================================

  /**
   * Compute distance (m) and duration (s) between two points.
   *
   * @throws ConfigurationError when no routing key is configured
   * @throws UpstreamError on non-2xx status or an unexpected response body
   */
  async route(from: RoutePoint, to: RoutePoint, options: RouteOptions = {}): Promise<RouteDistance> {
    if (this.config.apiKey.length === 0) {
      throw new ConfigurationError('ROUTING_API_KEY', 'route calculation');
    }

    const request = this.buildRequest(from, to, options);

    const response = request.method === 'POST'
      ? await requestText(this.fetchFn, request.url, {
          service: SERVICE_NAME,
          timeoutMs: this.config.timeoutMs,
          method: 'POST',
          body: request.body,
        })
      : await requestText(this.fetchFn, buildUrl(request.url, request.query), {
          service: SERVICE_NAME,
          timeoutMs: this.config.timeoutMs,
        });

    assertOk(SERVICE_NAME, response);
    const data = parseJsonBody(SERVICE_NAME, response);

    const distance = request.profile === 'routing'
      ? readRoutingResult(data, response.text)
      : readCarroutingResult(data, response.text);

    logger.debug(`🛣️ Route: ${distance.distanceM} m, ${distance.durationS} s`);
    return distance;
  }

  // ===========================================================================
  // PUBLIC: Request building (pure)
  // ===========================================================================

  buildRequest(from: RoutePoint, to: RoutePoint, options: RouteOptions = {}): RoutingRequest {
    const profile = this.config.profile;
    const { path, defaultVehicle } = ROUTING_CONFIG[profile];
    const baseUrl = `${this.config.baseUrl.replace(/\/+$/, '')}${path}`;
    const vehicle = options.vehicle ?? defaultVehicle;
    const dimensions = vehicle === TRUCK_VEHICLE ? pickVehicleDimensions(options.vehicle_params) : {};

    if (profile === 'carrouting') {
      const query: Record<string, string> = {
        key: this.config.apiKey,
        points: `${from.longitude},${from.latitude};${to.longitude},${to.latitude}`,
        type: vehicle,
        traffic: options.traffic ?? 'disabled',
      };

      if (options.filters && options.filters.length > 0) {
        query.filters = options.filters.join(',');
      }
      if (options.priority) {
        query.priority = options.priority;
      }
      if (options.locale) {
        query.locale = options.locale;
      }
      if (options.utc) {
        query.utc = String(options.utc);
      }
      for (const [key, value] of Object.entries(dimensions)) {
        query[key] = String(value);
      }

      return { profile, method: 'GET', url: baseUrl, query };
    }

    const body: RoutingRequestBody = {
      points: [
        { type: 'stop', lat: from.latitude, lon: from.longitude },
        { type: 'stop', lat: to.latitude, lon: to.longitude },
      ],
      transport: vehicle,
      route_mode: options.priority === 'time' ? 'fastest' : 'shortest',
      locale: options.locale ?? this.config.locale,
    };

    if (options.traffic === 'enabled') {
      body.traffic_mode = 'jam';
    }
    if (options.filters && options.filters.length > 0) {
      body.filters = [...options.filters];
    }
    if (options.utc) {
      body.utc = options.utc;
    }
    if (Object.keys(dimensions).length > 0) {
      body.truck_params = dimensions;
    }

    return {
      profile,
      method: 'POST',
      url: buildUrl(baseUrl, { key: this.config.apiKey }),
      body,
    };
  }
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Keep only dimensions that carry a value.
 * 0, "0", "" and null are treated as "not set".
 */
export function pickVehicleDimensions(params: VehicleParams | undefined): VehicleDimensions {
  const dimensions: VehicleDimensions = {};
  if (!params) {
    return dimensions;
  }

  for (const key of VEHICLE_PARAM_KEYS) {
    const value = params[key];
    if (value === null || value === undefined || value === '' || value === 0 || value === '0') {
      continue;
    }
    dimensions[key] = value;
  }

  return dimensions;
}

function readRoutingResult(data: unknown, rawBody: string): RouteDistance {
  const parsed = routingResponseSchema.safeParse(data);
  if (!parsed.success) {
    throw new UpstreamError('Routing response has no result[0] with total_distance/total_duration', {
      body: rawBody,
    });
  }

  const first = parsed.data.result[0];
  return {
    distanceM: Math.trunc(first.total_distance),
    durationS: Math.trunc(first.total_duration),
  };
}

function readCarroutingResult(data: unknown, rawBody: string): RouteDistance {
  const parsed = carroutingResponseSchema.safeParse(data);
  if (!parsed.success) {
    throw new UpstreamError('Routing response has no result[0] with distance/duration', {
      body: rawBody,
    });
  }

  const first = parsed.data.result[0];
  return {
    distanceM: Math.trunc(first.distance),
    durationS: Math.trunc(first.duration),
  };
}
