/**
 * =============================================================================
 * ROUTE JOB SERVICE - Single & Batch Orchestration
 * =============================================================================
 *
 * SINGLE MODE:
 *   resolve "from" -> resolve "to" -> route. Any failure propagates.
 *
 * BATCH MODE:
 *   For each route, independently: resolve loading -> resolve unloading -> route.
 *   A failing route gets its `error` set and keeps the distance/duration it
 *   came with (or null). Processing continues with the next route.
 *
 * Strictly sequential: one upstream call in flight at a time.
 * =============================================================================
 */

import { ValidationError, toAppError } from '../../core';
import { logger } from '../../shared/services/logger.service';
import { PointResolver } from '../geocoding/point-resolver.service';
import { RouteOptions, RoutingService } from '../routing';
import {
  BatchOutput,
  BatchRouteOutput,
  SingleRouteOutput,
  batchInputSchema,
  batchRouteSchema,
  isBatchInput,
  singleRouteInputSchema,
} from './route-job.schema';

export type RouteJobResult =
  | { mode: 'single'; output: SingleRouteOutput }
  | { mode: 'batch'; output: BatchOutput };

// =============================================================================
// MAIN SERVICE CLASS
// =============================================================================

export class RouteJobService {
  constructor(
    private readonly resolver: PointResolver,
    private readonly routing: RoutingService
  ) {}

  /**
   * Run whatever the input file describes
   */
  async run(input: unknown): Promise<RouteJobResult> {
    if (isBatchInput(input)) {
      return { mode: 'batch', output: await this.runBatch(input) };
    }
    return { mode: 'single', output: await this.runSingle(input) };
  }

  // ===========================================================================
  // SINGLE MODE
  // ===========================================================================

  async runSingle(input: unknown): Promise<SingleRouteOutput> {
    const parsed = singleRouteInputSchema.safeParse(input);
    if (!parsed.success) {
      throw ValidationError.fromZodError(parsed.error, 'Invalid route input');
    }

    const { from, to } = parsed.data;
    const resolvedFrom = await this.resolver.resolve(from, 'from');
    const resolvedTo = await this.resolver.resolve(to, 'to');

    const { distanceM, durationS } = await this.routing.route(
      resolvedFrom,
      resolvedTo,
      pickRouteOptions(parsed.data)
    );

    logger.info(`✅ Route calculated: ${distanceM} m, ${durationS} s`);

    return {
      success: true,
      from: {
        ...addressOf(resolvedFrom.point.address),
        lat: resolvedFrom.latitude,
        lon: resolvedFrom.longitude,
      },
      to: {
        ...addressOf(resolvedTo.point.address),
        lat: resolvedTo.latitude,
        lon: resolvedTo.longitude,
      },
      distance_meters: distanceM,
      distance_km: roundTo(distanceM / 1000, 3),
      duration_seconds: durationS,
      duration_minutes: roundTo(durationS / 60, 1),
    };
  }

  // ===========================================================================
  // BATCH MODE
  // ===========================================================================

  async runBatch(input: unknown): Promise<BatchOutput> {
    const parsed = batchInputSchema.safeParse(input);
    if (!parsed.success) {
      throw ValidationError.fromZodError(parsed.error, 'Invalid batch input');
    }

    const defaults = pickRouteOptions(parsed.data);
    const routes: BatchRouteOutput[] = [];

    for (const [index, raw] of parsed.data.routes.entries()) {
      routes.push(await this.processRoute(raw, index, defaults));
    }

    const failed = routes.filter(route => route.error !== null).length;
    logger.info(`📦 Batch finished: ${routes.length - failed} succeeded, ${failed} failed`);

    return { routes };
  }

  /**
   * Process one batch route. Never throws.
   */
  private async processRoute(raw: unknown, index: number, defaults: RouteOptions): Promise<BatchRouteOutput> {
    const source: Record<string, unknown> = isRecord(raw) ? raw : {};
    const rawId = source.id;
    const id = typeof rawId === 'string' || typeof rawId === 'number' ? rawId : '';
    const label = id === '' ? `#${index + 1}` : String(id);

    const out: BatchRouteOutput = {
      id,
      loading: copyRecord(source.loading),
      unloading: copyRecord(source.unloading),
      distance_m: numberOrNull(source.distance_m),
      duration_s: numberOrNull(source.duration_s),
      error: null,
    };

    logger.info(`== Processing route ${label} ==`);

    try {
      const parsed = batchRouteSchema.safeParse(raw);
      if (!parsed.success) {
        throw ValidationError.fromZodError(parsed.error, `[${label}] Invalid route`);
      }

      const loading = await this.resolver.resolve(parsed.data.loading ?? {}, `${label} / loading`);
      out.loading = loading.point;

      const unloading = await this.resolver.resolve(parsed.data.unloading ?? {}, `${label} / unloading`);
      out.unloading = unloading.point;

      const { distanceM, durationS } = await this.routing.route(loading, unloading, {
        ...defaults,
        ...pickRouteOptions(parsed.data),
      });
      out.distance_m = distanceM;
      out.duration_s = durationS;
    } catch (error: unknown) {
      const appError = toAppError(error);
      out.error = appError.message;
      logger.warn(`Route ${label} failed: ${appError.message}`, { code: appError.code });
    }

    return out;
  }
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Copy only the route option fields that are set
 */
export function pickRouteOptions(source: RouteOptions): RouteOptions {
  const options: RouteOptions = {};
  if (source.vehicle !== undefined) options.vehicle = source.vehicle;
  if (source.traffic !== undefined) options.traffic = source.traffic;
  if (source.filters !== undefined) options.filters = source.filters;
  if (source.priority !== undefined) options.priority = source.priority;
  if (source.locale !== undefined) options.locale = source.locale;
  if (source.utc !== undefined) options.utc = source.utc;
  if (source.vehicle_params !== undefined) options.vehicle_params = source.vehicle_params;
  return options;
}

function addressOf(address: string | null | undefined): { address?: string } {
  return address ? { address } : {};
}

function copyRecord(value: unknown): Record<string, unknown> {
  return isRecord(value) ? { ...value } : {};
}

function numberOrNull(value: unknown): number | null {
  return typeof value === 'number' ? value : null;
}

function roundTo(value: number, digits: number): number {
  return Number(value.toFixed(digits));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
