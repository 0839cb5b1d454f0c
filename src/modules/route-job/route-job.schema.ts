/**
 * =============================================================================
 * ROUTE JOB MODULE - SCHEMAS & TYPES
 * =============================================================================
 *
 * Input and output file shapes.
 *
 * SINGLE MODE INPUT:
 * { "from": { "address": "Moscow, Red Square" },
 *   "to":   { "lat": 59.9386, "lon": 30.3141 },
 *   "vehicle": "truck" }
 *
 * BATCH MODE INPUT:
 * { "routes": [
 *     { "id": "r1", "loading": {...}, "unloading": {...}, "vehicle_params": {...} }
 * ] }
 *
 * Top-level route options in a batch file apply to every route; options
 * on a route override them.
 * =============================================================================
 */

import { z } from 'zod';
import { pointInputSchema } from '../geocoding/geocoding.schema';
import { routeOptionsSchema } from '../routing/routing.schema';

// =============================================================================
// SINGLE MODE
// =============================================================================

export const singleRouteInputSchema = routeOptionsSchema.extend({
  from: pointInputSchema,
  to: pointInputSchema,
});

export type SingleRouteInput = z.infer<typeof singleRouteInputSchema>;

export interface SingleRouteOutput {
  success: true;
  from: { address?: string | null; lat: number; lon: number };
  to: { address?: string | null; lat: number; lon: number };
  distance_meters: number;
  distance_km: number;
  duration_seconds: number;
  duration_minutes: number;
}

// =============================================================================
// BATCH MODE
// =============================================================================

/**
 * Outer batch file. Routes are validated one by one so that one bad
 * route does not reject the whole file.
 */
export const batchInputSchema = routeOptionsSchema.extend({
  routes: z.array(z.unknown()),
});

export const batchRouteSchema = routeOptionsSchema.extend({
  id: z.union([z.string(), z.number()]).optional(),
  loading: pointInputSchema.nullish(),
  unloading: pointInputSchema.nullish(),
  distance_m: z.number().nullish(),
  duration_s: z.number().nullish(),
});

export type BatchInput = z.infer<typeof batchInputSchema>;
export type BatchRoute = z.infer<typeof batchRouteSchema>;

export interface BatchRouteOutput {
  id: string | number;
  /** Input point, replaced by the resolved point once resolution succeeds */
  loading: Record<string, unknown>;
  unloading: Record<string, unknown>;
  distance_m: number | null;
  duration_s: number | null;
  error: string | null;
}

export interface BatchOutput {
  routes: BatchRouteOutput[];
}

/**
 * Batch mode is recognised by a "routes" array
 */
export function isBatchInput(data: unknown): boolean {
  return (
    typeof data === 'object' &&
    data !== null &&
    'routes' in data &&
    Array.isArray(data.routes)
  );
}
