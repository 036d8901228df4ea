import { GEOCODING_PARAMS } from '../constants/api';
import { GeocodeResult, GeocodingResult, Location } from '../interfaces/location';
import { logger } from '../logger';
import { GeocodingResponseSchema } from '../schemas/geocoding.schema';
import {
  HttpClient,
  SchemaMismatchError,
  classifyFailure,
  describeFailure,
} from './httpClient';

export function toLocation(result: GeocodingResult): Location {
  return {
    latitude: result.latitude,
    longitude: result.longitude,
    displayName: `${result.name}, ${result.admin1 ?? result.country}`,
  };
}

export class GeocodingClient {
  constructor(
    private readonly http: HttpClient,
    private readonly url: string
  ) {}

  /**
   * Looks up the best match for a free-text place name.
   * Never rejects: transport and schema failures come back as `unavailable`.
   */
  async lookup(name: string): Promise<GeocodeResult> {
    try {
      const response = await this.http.get(this.url, {
        params: { name, ...GEOCODING_PARAMS },
      });

      const parsed = GeocodingResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new SchemaMismatchError('Geocoding API', parsed.error.issues);
      }

      const first = parsed.data.results?.[0];
      if (!first) {
        logger.info({ query: name }, 'Geocoding returned no results');
        return { status: 'not_found' };
      }

      return { status: 'found', location: toLocation(first) };
    } catch (err) {
      logger.error(
        { query: name, ...describeFailure(err) },
        'Geocoding request failed'
      );

      return { status: 'unavailable', reason: classifyFailure(err) };
    }
  }

  async resolve(name: string): Promise<Location | null> {
    const result = await this.lookup(name);
    return result.status === 'found' ? result.location : null;
  }
}
