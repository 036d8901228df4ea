import { z } from "zod";
import { GeocodingResultSchema } from "../schemas/geocoding.schema";

export type GeocodingResult = z.infer<typeof GeocodingResultSchema>;

export interface Location {
  latitude: number;
  longitude: number;
  displayName: string;
}

export type UnavailableReason = 'timeout' | 'api_error';

export type GeocodeResult =
  | {
      status: 'found';
      location: Location;
    }
  | {
      status: 'not_found';
    }
  | {
      status: 'unavailable';
      reason: UnavailableReason;
    };
