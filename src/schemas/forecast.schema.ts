import { z } from "zod";
import { isCalendarDate } from "../utils/time";

const nullableNumbers = z.array(z.number().nullable());

const LOCAL_DATE_TIME = /^(\d{4}-\d{2}-\d{2})T\d{2}:\d{2}(:\d{2})?$/;

// The page formats these, so anything else is rejected up front.
const IsoDate = z.string().refine(isCalendarDate, { message: "Expected YYYY-MM-DD" });

const IsoDateTime = z.string().refine(
  (value) => {
    const match = LOCAL_DATE_TIME.exec(value);
    return match !== null && isCalendarDate(match[1]);
  },
  { message: "Expected YYYY-MM-DDTHH:MM" }
);

export const CurrentWeatherSchema = z
  .object({
    time: z.string(),
    temperature: z.number(),
    windspeed: z.number(),
    winddirection: z.number(),
    weathercode: z.number().int(),
    is_day: z.number().int().optional(),
  })
  .passthrough();

export const HourlySeriesSchema = z
  .object({
    time: z.array(IsoDateTime),
    temperature_2m: nullableNumbers,
    apparent_temperature: nullableNumbers,
    weathercode: nullableNumbers,
    precipitation_probability: nullableNumbers,
  })
  .passthrough();

export const DailySeriesSchema = z
  .object({
    time: z.array(IsoDate),
    weathercode: nullableNumbers,
    temperature_2m_max: nullableNumbers,
    temperature_2m_min: nullableNumbers,
    sunrise: z.array(IsoDateTime),
    sunset: z.array(IsoDateTime),
    precipitation_probability_max: nullableNumbers,
    relative_humidity_2m_max: nullableNumbers,
  })
  .passthrough();

export const ForecastApiSchema = z
  .object({
    latitude: z.number(),
    longitude: z.number(),
    timezone: z.string().optional(),
    timezone_abbreviation: z.string().optional(),
    utc_offset_seconds: z.number().optional(),
    current_weather: CurrentWeatherSchema,
    hourly: HourlySeriesSchema.optional(),
    daily: DailySeriesSchema,
  })
  .passthrough();
