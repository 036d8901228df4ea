import { z } from "zod";

export const GeocodingResultSchema = z
  .object({
    id: z.number().optional(),
    name: z.string().min(1),
    latitude: z.number(),
    longitude: z.number(),
    country: z.string().optional(),
    country_code: z.string().optional(),
    admin1: z.string().optional(),
    timezone: z.string().optional(),
  })
  .refine((result) => result.admin1 !== undefined || result.country !== undefined, {
    message: "Geocoding result has neither admin1 nor country",
  });

// The API omits `results` entirely when nothing matches.
export const GeocodingResponseSchema = z.object({
  results: z.array(GeocodingResultSchema).optional(),
  generationtime_ms: z.number().optional(),
});
