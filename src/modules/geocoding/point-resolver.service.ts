/**
 * =============================================================================
 * POINT RESOLVER - Guarantee coordinates (and, best effort, an address)
 * =============================================================================
 *
 * PRECEDENCE:
 * 1. Coordinates given      -> used as is, address filled by reverse geocoding
 * 2. Only address given     -> forward geocoding
 * 3. Neither                -> InputError
 *
 * Coordinates that do not parse as numbers are rejected before any lookup.
 *
 * Explicit coordinates always win over an address. An address is only
 * used to derive coordinates, never to override supplied ones.
 *
 * The input point is never modified, a new ResolvedPoint is returned.
 * =============================================================================
 */

import { InputError } from '../../core';
import { logger } from '../../shared/services/logger.service';
import { formatCoordinate, normalizeCoordinate, parseCoordinate } from '../../shared/utils/coordinates.utils';
import { PointInput, PointResolution } from './geocoding.schema';
import { GeocodingService } from './geocoding.service';

export class PointResolver {
  constructor(private readonly geocoder: GeocodingService) {}

  /**
   * @param label Context for logs and errors, e.g. "route-7 / loading"
   */
  async resolve(point: PointInput, label: string): Promise<PointResolution> {
    const lat = normalizeCoordinate(point.lat);
    const lon = normalizeCoordinate(point.lon);
    const address = hasAddress(point.address) ? point.address : null;

    // Coordinates given
    if (lat !== null && lon !== null) {
      const latitude = parseCoordinate(lat);
      const longitude = parseCoordinate(lon);
      if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) {
        throw new InputError(
          `[${label}] Coordinates are not numeric: lat=${JSON.stringify(lat)}, lon=${JSON.stringify(lon)}`,
          undefined,
          { label }
        );
      }

      let resolvedAddress = address;

      if (resolvedAddress === null) {
        const reverse = await this.geocoder.reverse(lat, lon);
        if (reverse.ok) {
          resolvedAddress = reverse.value;
        } else {
          // Not fatal: the route can still be computed
          logger.warn(`Reverse geocoding failed for ${label}: ${reverse.error.message}`);
        }
      }

      return {
        point: {
          ...point,
          ...(resolvedAddress !== null && { address: resolvedAddress }),
          lat,
          lon,
        },
        latitude,
        longitude,
      };
    }

    // Only an address
    if (address !== null) {
      const { latitude, longitude } = await this.geocoder.forward(address);
      return {
        point: {
          ...point,
          address,
          lat: formatCoordinate(latitude),
          lon: formatCoordinate(longitude),
        },
        latitude,
        longitude,
      };
    }

    throw new InputError(`[${label}] Neither coordinates nor address given`, undefined, { label });
  }
}

function hasAddress(address: string | null | undefined): address is string {
  return typeof address === 'string' && address !== '';
}
