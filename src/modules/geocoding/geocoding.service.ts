/**
 * =============================================================================
 * GEOCODING SERVICE - Forward & Reverse Geocoding
 * =============================================================================
 *
 * Yandex Geocoder HTTP API:
 * - forward(address)   -> coordinates (throws on any failure)
 * - reverse(lat, lon)  -> Result<address | null> (never throws)
 *
 * AXIS ORDER:
 * The public contract is (latitude, longitude). The geocoder takes and
 * returns "lon,lat" / "lon lat"; the swap happens only in this file.
 *
 * Only the first feature of a response is used. The geocoder already
 * ranks its results, so no disambiguation is attempted here.
 * =============================================================================
 */

import { AppConfig } from '../../config/environment';
import { AppError, ConfigurationError, NotFoundError, UpstreamError, toAppError } from '../../core';
import { logger } from '../../shared/services/logger.service';
import { Coordinates, Result, err, ok } from '../../shared/types/result.types';
import { FetchFn, assertOk, buildUrl, parseJsonBody, requestText } from '../../shared/utils/http.utils';
import { GeoObject, geocoderResponseSchema } from './geocoding.schema';

const SERVICE_NAME = 'Geocoder';

// =============================================================================
// GEOCODING SERVICE CLASS
// =============================================================================

export class GeocodingService {
  constructor(
    private readonly config: AppConfig['geocoder'],
    private readonly fetchFn: FetchFn = fetch
  ) {}

  /**
   * Check if service is available (API key configured)
   */
  isAvailable(): boolean {
    return this.config.apiKey.length > 0;
  }

  // ===========================================================================
  // FORWARD GEOCODING
  // ===========================================================================

  async forward(address: string): Promise<Coordinates> {
    if (!this.isAvailable()) {
      throw new ConfigurationError('GEOCODER_API_KEY', 'forward geocoding');
    }

    const features = await this.lookup(address);
    const first = features[0];
    if (!first) {
      throw new NotFoundError(`Geocoder found nothing for address ${JSON.stringify(address)}`, undefined, {
        address,
      });
    }

    const coordinates = parsePos(first.Point.pos);
    logger.debug(`📍 Geocoded "${address}" -> ${coordinates.latitude}, ${coordinates.longitude}`);
    return coordinates;
  }

  // ===========================================================================
  // REVERSE GEOCODING
  // ===========================================================================

  /**
   * Best-effort address lookup.
   * - ok(address) on success
   * - ok(null) when the key is missing or nothing was found
   * - err(error) on network/HTTP/response failures
   */
  async reverse(lat: string, lon: string): Promise<Result<string | null, AppError>> {
    if (!this.isAvailable()) {
      logger.debug('Reverse geocoding skipped: GEOCODER_API_KEY not configured');
      return ok(null);
    }

    try {
      const features = await this.lookup(`${lon},${lat}`);
      const text = features[0]?.metaDataProperty?.GeocoderMetaData?.text;
      return ok(text && text.trim() !== '' ? text : null);
    } catch (error: unknown) {
      return err(toAppError(error));
    }
  }

  // ===========================================================================
  // HTTP
  // ===========================================================================

  private async lookup(geocode: string): Promise<GeoObject[]> {
    const url = buildUrl(this.config.url, {
      apikey: this.config.apiKey,
      format: 'json',
      geocode,
      results: '1',
      lang: this.config.lang,
    });

    const response = await requestText(this.fetchFn, url, {
      service: SERVICE_NAME,
      timeoutMs: this.config.timeoutMs,
    });
    assertOk(SERVICE_NAME, response);

    const parsed = geocoderResponseSchema.safeParse(parseJsonBody(SERVICE_NAME, response));
    if (!parsed.success) {
      throw new UpstreamError('Geocoder response has no GeoObjectCollection', {
        status: response.status,
        body: response.text,
      });
    }

    return parsed.data.response.GeoObjectCollection.featureMember.map(member => member.GeoObject);
  }
}

/**
 * Parse a geocoder "lon lat" point string
 */
export function parsePos(pos: string): Coordinates {
  const parts = pos.trim().split(/\s+/);
  const longitude = parseFloat(parts[0] ?? '');
  const latitude = parseFloat(parts[1] ?? '');

  if (parts.length !== 2 || !Number.isFinite(latitude) || !Number.isFinite(longitude)) {
    throw new UpstreamError(`Geocoder returned an unreadable point "${pos}"`);
  }

  return { latitude, longitude };
}
