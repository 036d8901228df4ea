import { z } from "zod";
import {
  CurrentWeatherSchema,
  DailySeriesSchema,
  ForecastApiSchema,
  HourlySeriesSchema,
} from "../schemas/forecast.schema";
import { UnavailableReason } from "./location";

/* ------------------ Root Types ------------------ */

export type Forecast = z.infer<typeof ForecastApiSchema>;

// Forecast as handed to the view, carrying the resolved place name.
export type LocatedForecast = Forecast & { locationName: string };

/* ------------------ Reusable Types ------------------ */

export type CurrentWeather = z.infer<typeof CurrentWeatherSchema>;
export type HourlySeries = z.infer<typeof HourlySeriesSchema>;
export type DailySeries = z.infer<typeof DailySeriesSchema>;

export type ForecastResult =
  | {
      status: 'success';
      source: 'cache' | 'api';
      data: Forecast;
      timestamp: number;
    }
  | {
      status: 'unavailable';
      reason: UnavailableReason;
      timestamp: number;
    };
