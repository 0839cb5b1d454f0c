/**
 * =============================================================================
 * GEOCODING MODULE - SCHEMAS & TYPES
 * =============================================================================
 *
 * Shape of the geocoder JSON response (only the fields we read) and of
 * points before and after resolution.
 *
 * EXAMPLE RESPONSE (trimmed):
 * {
 *   "response": { "GeoObjectCollection": { "featureMember": [
 *     { "GeoObject": {
 *         "Point": { "pos": "37.617635 55.755814" },
 *         "metaDataProperty": { "GeocoderMetaData": { "text": "Russia, Moscow, Red Square" } }
 *     } }
 *   ] } }
 * }
 *
 * Note the point string is "lon lat".
 * =============================================================================
 */

import { z } from 'zod';

// =============================================================================
// GEOCODER RESPONSE
// =============================================================================

export const geoObjectSchema = z.object({
  Point: z.object({
    pos: z.string(),
  }),
  metaDataProperty: z
    .object({
      GeocoderMetaData: z
        .object({
          text: z.string().optional(),
        })
        .optional(),
    })
    .optional(),
});

export const geocoderResponseSchema = z.object({
  response: z.object({
    GeoObjectCollection: z.object({
      featureMember: z.array(z.object({ GeoObject: geoObjectSchema })),
    }),
  }),
});

export type GeoObject = z.infer<typeof geoObjectSchema>;
export type GeocoderResponse = z.infer<typeof geocoderResponseSchema>;

// =============================================================================
// POINTS
// =============================================================================

const rawCoordinateSchema = z.union([z.string(), z.number()]).nullish();

/**
 * Point as found in an input file. Unknown keys are kept.
 */
export const pointInputSchema = z
  .object({
    address: z.string().nullish(),
    lat: rawCoordinateSchema,
    lon: rawCoordinateSchema,
  })
  .passthrough();

export type PointInput = z.infer<typeof pointInputSchema>;

/**
 * Point after resolution: coordinates always present as 6-decimal
 * (or caller-supplied) strings, address present when known.
 */
export type ResolvedPoint = Omit<PointInput, 'lat' | 'lon' | 'address'> & {
  address?: string | null;
  lat: string;
  lon: string;
};

/**
 * Resolution result: the new point plus parsed coordinates
 */
export interface PointResolution {
  point: ResolvedPoint;
  latitude: number;
  longitude: number;
}
