import { HourlySeries } from '../interfaces/forecast';

export type HourlyEntry = {
  time: string;
  temperature: number | null;
  apparentTemperature: number | null;
  weatherCode: number | null;
  precipitationProbability: number | null;
};

/**
 * Picks up to `count` hourly entries starting at the current local hour.
 * `hourStamp` is `YYYY-MM-DDTHH:00` in the forecast's timezone, which sorts
 * the same way as the API's local timestamps.
 */
export function selectUpcomingHours(
  hourly: HourlySeries | undefined,
  hourStamp: string,
  count = 24
): HourlyEntry[] {
  if (!hourly?.time.length) return [];

  const start = hourly.time.findIndex((time) => time >= hourStamp);
  if (start === -1) return [];

  return hourly.time.slice(start, start + count).map((time, offset) => {
    const index = start + offset;
    return {
      time,
      temperature: hourly.temperature_2m[index] ?? null,
      apparentTemperature: hourly.apparent_temperature[index] ?? null,
      weatherCode: hourly.weathercode[index] ?? null,
      precipitationProbability: hourly.precipitation_probability[index] ?? null,
    };
  });
}
