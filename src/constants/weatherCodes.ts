export const WEATHER_CODES: Readonly<Record<number, string>> = {
  0: 'Clear sky',
  1: 'Mainly clear',
  2: 'Partly cloudy',
  3: 'Overcast',
  45: 'Fog',
  48: 'Depositing rime fog',
  51: 'Light drizzle',
  53: 'Moderate drizzle',
  55: 'Dense drizzle',
  61: 'Rain',
  63: 'Moderate rain',
  65: 'Heavy rain',
  71: 'Snow',
  73: 'Moderate snow',
  75: 'Heavy snow',
  80: 'Showers',
  81: 'Heavy showers',
  95: 'Thunderstorm',
  99: 'Severe thunderstorm',
};

export const UNKNOWN_WEATHER = 'Unknown';

export function describeWeatherCode(code: number): string {
  return WEATHER_CODES[code] ?? UNKNOWN_WEATHER;
}
