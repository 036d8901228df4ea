import { MemoCache, forecastCacheKey } from '../cache';
import { Forecast, ForecastResult } from '../interfaces/forecast';
import { logger } from '../logger';
import { Clock } from '../utils/time';
import { getForecastFromApi } from './getForecast';
import { HttpClient, classifyFailure, describeFailure } from './httpClient';

export type ForecastServiceOptions = {
  http: HttpClient;
  url: string;
  cache: MemoCache<Forecast>;
  ttlMs: number;
  clock?: Clock;
};

export class ForecastService {
  constructor(private readonly options: ForecastServiceOptions) {}

  // Public API
  async getData(
    latitude: number,
    longitude: number,
    units: string
  ): Promise<ForecastResult> {
    const { http, url, cache, ttlMs, clock = Date.now } = this.options;
    const timestamp = clock();
    const cacheKey = forecastCacheKey(latitude, longitude, units);

    try {
      const { value: data, origin } = await cache.lookup(cacheKey, ttlMs, () =>
        getForecastFromApi(http, url, { latitude, longitude, units })
      );
      const source = origin === 'cached' ? 'cache' : 'api';

      logger.debug({ latitude, longitude, units, source }, 'Forecast resolved');

      return {
        status: 'success',
        source,
        data,
        timestamp,
      };
    } catch (err) {
      logger.error(
        { latitude, longitude, units, ...describeFailure(err) },
        'Forecast API request failed'
      );

      return {
        status: 'unavailable',
        reason: classifyFailure(err),
        timestamp,
      };
    }
  }

  async fetch(
    latitude: number,
    longitude: number,
    units: string
  ): Promise<Forecast | null> {
    const result = await this.getData(latitude, longitude, units);
    return result.status === 'success' ? result.data : null;
  }
}
