import { DAILY_FIELDS, HOURLY_FIELDS } from '../constants/api';
import { Forecast } from '../interfaces/forecast';
import { ForecastApiSchema } from '../schemas/forecast.schema';
import { HttpClient, SchemaMismatchError } from './httpClient';

export type ForecastQuery = {
  latitude: number;
  longitude: number;
  units: string;
};

export function buildForecastParams({ latitude, longitude, units }: ForecastQuery) {
  return {
    latitude,
    longitude,
    current_weather: true,
    hourly: HOURLY_FIELDS,
    daily: DAILY_FIELDS,
    timezone: 'auto',
    temperature_unit: units,
  };
}

// Throws on transport errors and on payloads that fail validation.
export async function getForecastFromApi(
  http: HttpClient,
  url: string,
  query: ForecastQuery
): Promise<Forecast> {
  const response = await http.get(url, {
    params: buildForecastParams(query),
  });

  const parsed = ForecastApiSchema.safeParse(response.data);

  if (!parsed.success) {
    throw new SchemaMismatchError('Forecast API', parsed.error.issues);
  }

  return parsed.data;
}
