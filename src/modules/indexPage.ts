import { NextFunction, Request, RequestHandler, Response } from 'express';
import { DEFAULT_UNITS } from '../constants/api';
import {
  CurrentWeather,
  DailySeries,
  Forecast,
  LocatedForecast,
} from '../interfaces/forecast';
import { Location } from '../interfaces/location';
import { logger } from '../logger';
import { HourlyEntry, selectUpcomingHours } from '../utils/hourly';
import { Clock, DisplayTime, localHourStamp, resolveNow } from '../utils/time';
import { renderIndexPage } from '../views';
import { viewHelpers } from '../views/helpers';

export type IndexQuery = {
  location: string | null;
  units: string;
};

export type IndexViewContext = {
  weatherData: LocatedForecast | null;
  error: string | null;
  locationQuery: string | null;
  units: string;
  now: DisplayTime;
  current: CurrentWeather | null;
  daily: DailySeries | null;
  hourly: HourlyEntry[];
};

export type IndexPageDeps = {
  geocoder: { resolve(name: string): Promise<Location | null> };
  forecasts: {
    fetch(latitude: number, longitude: number, units: string): Promise<Forecast | null>;
  };
  clock?: Clock;
};

// Repeated query parameters (`?units=a&units=b`) take the first value.
function firstString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return undefined;
}

export function parseIndexQuery(query: Request['query']): IndexQuery {
  return {
    location: firstString(query.location) ?? null,
    units: firstString(query.units) ?? DEFAULT_UNITS,
  };
}

export function notFoundMessage(query: string): string {
  return `Could not find '${query}'. Try another city.`;
}

export function unavailableMessage(displayName: string): string {
  return `Could not fetch weather for '${displayName}'.`;
}

/**
 * Runs one page request: geocode, fetch the forecast, pick the display time.
 * Every failure ends up as a user-facing `error` string; nothing rejects on
 * upstream trouble.
 */
export async function handleIndexRequest(
  { location, units }: IndexQuery,
  deps: IndexPageDeps
): Promise<IndexViewContext> {
  const clock = deps.clock ?? Date.now;

  let weatherData: LocatedForecast | null = null;
  let error: string | null = null;

  if (location) {
    const geo = await deps.geocoder.resolve(location);

    if (geo) {
      const forecast = await deps.forecasts.fetch(geo.latitude, geo.longitude, units);

      if (forecast) {
        // Copy so the cached payload is never mutated.
        weatherData = { ...forecast, locationName: geo.displayName };
      } else {
        error = unavailableMessage(geo.displayName);
      }
    } else {
      error = notFoundMessage(location);
    }
  }

  const now = resolveNow(weatherData?.timezone, clock);

  return {
    weatherData,
    error,
    locationQuery: location,
    units,
    now,
    current: weatherData?.current_weather ?? null,
    daily: weatherData?.daily ?? null,
    hourly: weatherData ? selectUpcomingHours(weatherData.hourly, localHourStamp(now)) : [],
  };
}

export function indexRoute(deps: IndexPageDeps): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    const query = parseIndexQuery(req.query);
    logger.debug({ query }, 'Index page requested');

    try {
      const context = await handleIndexRequest(query, deps);
      res.status(200).type('html').send(renderIndexPage(context, viewHelpers));
    } catch (err) {
      next(err);
    }
  };
}
