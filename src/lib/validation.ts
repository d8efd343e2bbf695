import { z } from 'zod';

/**
 * Validation schemas for common data types
 */

export const LatitudeSchema = z
  .number()
  .finite()
  .min(-90, 'Latitude must be >= -90')
  .max(90, 'Latitude must be <= 90');

export const LongitudeSchema = z
  .number()
  .finite()
  .min(-180, 'Longitude must be >= -180')
  .max(180, 'Longitude must be <= 180');

export const LocationNameSchema = z.string().trim().min(1).max(200);

export const ServiceLabelSchema = z.string().trim().min(1).max(200);

/**
 * Validation for named locations
 */
export const NamedLocationSchema = z.object({
  name: LocationNameSchema,
  latitude: LatitudeSchema,
  longitude: LongitudeSchema
});

/**
 * Catalog file layout: ordered `name -> [latitude, longitude]`
 */
export const LocationCatalogFileSchema = z
  .record(LocationNameSchema, z.tuple([LatitudeSchema, LongitudeSchema]))
  .refine(entries => Object.keys(entries).length > 0, {
    message: 'Location catalog must contain at least one location'
  });

/**
 * Validation for uploaded file identity
 */
export const FileIdentitySchema = z.object({
  name: z.string().min(1).max(1024),
  size: z.number().int().min(0)
});

/**
 * Content validation
 */

export function validateImageSize(sizeBytes: number): boolean {
  const maxSize = 50 * 1024 * 1024; // 50MB
  return sizeBytes > 0 && sizeBytes <= maxSize;
}
