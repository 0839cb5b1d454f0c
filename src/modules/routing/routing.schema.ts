/**
 * =============================================================================
 * ROUTING MODULE - SCHEMAS & TYPES
 * =============================================================================
 *
 * Defines the route options accepted from input files and the two request
 * shapes understood by the routing service.
 *
 * KEY CONCEPTS:
 * - RouteOptions: vehicle, traffic, filters, priority, locale, utc, dimensions
 * - Profile "routing":    JSON POST, answers with total_distance/total_duration
 * - Profile "carrouting": query-string GET, answers with distance/duration
 *
 * EXAMPLE OPTIONS:
 * {
 *   "vehicle": "truck",
 *   "traffic": "enabled",
 *   "filters": ["toll_road", "dirt_road"],
 *   "priority": "time",
 *   "vehicle_params": { "height": 3.8, "weight": 12000 }
 * }
 * =============================================================================
 */

import { z } from 'zod';
import { VehicleParamKey } from '../../core/constants';
import { RoutingProfile } from '../../config/environment';

// =============================================================================
// CONFIGURATION
// =============================================================================

export const ROUTING_CONFIG: Record<RoutingProfile, {
  /** Path under the routing base URL */
  path: string;
  /** Vehicle type used when the request names none */
  defaultVehicle: string;
}> = {
  routing: {
    path: '/routing/7.0.0/global',
    defaultVehicle: 'driving',
  },
  carrouting: {
    path: '/carrouting/7.0.0/global',
    defaultVehicle: 'truck',
  },
};

/**
 * Vehicle type that accepts dimension parameters
 */
export const TRUCK_VEHICLE = 'truck';

// =============================================================================
// ROUTE OPTIONS (Input)
// =============================================================================

const dimensionValueSchema = z.union([z.number(), z.string()]).nullish();

export const vehicleParamsSchema = z.object({
  height: dimensionValueSchema,
  width: dimensionValueSchema,
  length: dimensionValueSchema,
  weight: dimensionValueSchema,
  axle_weight: dimensionValueSchema,
  hazard_class: dimensionValueSchema,
});

export const routeOptionsSchema = z.object({
  vehicle: z.string().min(1).optional(),
  traffic: z.enum(['enabled', 'disabled']).optional(),
  filters: z.array(z.string().min(1)).optional(),
  priority: z.enum(['time', 'distance']).optional(),
  locale: z.string().min(1).optional(),
  utc: z.number().int().nonnegative().optional(),
  vehicle_params: vehicleParamsSchema.optional(),
});

export type VehicleParams = z.infer<typeof vehicleParamsSchema>;
export type RouteOptions = z.infer<typeof routeOptionsSchema>;

/** Dimension values that survive filtering */
export type VehicleDimensions = Partial<Record<VehicleParamKey, number | string>>;

// =============================================================================
// ROUTE POINT & RESULT
// =============================================================================

export interface RoutePoint {
  latitude: number;
  longitude: number;
}

export interface RouteDistance {
  /** Meters, integer */
  distanceM: number;
  /** Seconds, integer */
  durationS: number;
}

// =============================================================================
// OUTGOING REQUESTS
// =============================================================================

export interface RoutingRequestBody {
  points: Array<{ type: 'stop'; lat: number; lon: number }>;
  transport: string;
  route_mode: 'shortest' | 'fastest';
  locale: string;
  traffic_mode?: 'jam';
  filters?: string[];
  utc?: number;
  truck_params?: VehicleDimensions;
}

/**
 * Fully built request, ready to send
 */
export type RoutingRequest =
  | { profile: 'routing'; method: 'POST'; url: string; body: RoutingRequestBody }
  | { profile: 'carrouting'; method: 'GET'; url: string; query: Record<string, string> };

// =============================================================================
// RESPONSES
// =============================================================================

// Only result[0] is checked, further candidates are alternatives and ignored

export const routingResponseSchema = z.object({
  result: z
    .tuple([
      z.object({
        total_distance: z.number(),
        total_duration: z.number(),
      }),
    ])
    .rest(z.unknown()),
});

export const carroutingResponseSchema = z.object({
  result: z
    .tuple([
      z.object({
        distance: z.number(),
        duration: z.number(),
      }),
    ])
    .rest(z.unknown()),
});
