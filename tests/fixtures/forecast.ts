import type { Forecast } from '@/interfaces/forecast';

export function buildForecast(overrides: Partial<Forecast> = {}): Forecast {
  return {
    latitude: 48.86,
    longitude: 2.34,
    timezone: 'Europe/Paris',
    timezone_abbreviation: 'CET',
    utc_offset_seconds: 3600,
    current_weather: {
      time: '2024-03-05T14:00',
      temperature: 12.4,
      windspeed: 9.7,
      winddirection: 230,
      weathercode: 2,
      is_day: 1,
    },
    hourly: {
      time: ['2024-03-05T13:00', '2024-03-05T14:00', '2024-03-05T15:00'],
      temperature_2m: [12.1, 12.4, 11.8],
      apparent_temperature: [10.2, 10.6, 9.9],
      weathercode: [2, 2, 61],
      precipitation_probability: [10, 20, null],
    },
    daily: {
      time: ['2024-03-05', '2024-03-06'],
      weathercode: [2, 61],
      temperature_2m_max: [13.2, 11.0],
      temperature_2m_min: [4.6, 6.1],
      sunrise: ['2024-03-05T07:23', '2024-03-06T07:21'],
      sunset: ['2024-03-05T18:42', '2024-03-06T18:44'],
      precipitation_probability_max: [20, 80],
      relative_humidity_2m_max: [88, 95],
    },
    ...overrides,
  };
}

export const PARIS_RESULT = {
  id: 2988507,
  name: 'Paris',
  latitude: 48.85,
  longitude: 2.35,
  country: 'France',
  country_code: 'FR',
  admin1: 'Ile-de-France',
  timezone: 'Europe/Paris',
};
