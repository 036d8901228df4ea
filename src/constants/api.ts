export const DEFAULT_UNITS = 'metric';

export const GEOCODING_PARAMS = {
  count: 1,
  language: 'en',
  format: 'json',
} as const;

export const HOURLY_FIELDS = [
  'temperature_2m',
  'apparent_temperature',
  'weathercode',
  'precipitation_probability',
].join(',');

export const DAILY_FIELDS = [
  'weathercode',
  'temperature_2m_max',
  'temperature_2m_min',
  'sunrise',
  'sunset',
  'precipitation_probability_max',
  'relative_humidity_2m_max',
].join(',');
