import type { CurrentWeather, DailySeries } from '../interfaces/forecast';
import type { IndexViewContext } from '../modules/indexPage';
import type { HourlyEntry } from '../utils/hourly';
import { escapeHtml } from './escape';
import type { ViewHelpers } from './helpers';

const UNIT_OPTIONS = [
  { value: 'celsius', label: 'Celsius' },
  { value: 'fahrenheit', label: 'Fahrenheit' },
];

const MISSING = 'n/a';

function rounded(value: number | null | undefined): string {
  return value === null || value === undefined ? MISSING : String(Math.round(value));
}

function percent(value: number | null | undefined): string {
  const text = rounded(value);
  return text === MISSING ? text : `${text}%`;
}

function layout(title: string, body: string): string {
  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '<meta charset="utf-8">',
    '<meta name="viewport" content="width=device-width, initial-scale=1">',
    `<title>${escapeHtml(title)}</title>`,
    '</head>',
    '<body>',
    '<main>',
    body,
    '</main>',
    '</body>',
    '</html>',
  ].join('\n');
}

function searchForm(locationQuery: string | null, units: string): string {
  const options = UNIT_OPTIONS.map(({ value, label }) => {
    const selected = value === units ? ' selected' : '';
    return `<option value="${value}"${selected}>${label}</option>`;
  }).join('');

  return [
    '<form method="get" action="/" class="search">',
    `<input type="text" name="location" placeholder="Enter a city" value="${escapeHtml(locationQuery ?? '')}">`,
    `<select name="units">${options}</select>`,
    '<button type="submit">Search</button>',
    '</form>',
  ].join('\n');
}

function currentSection(
  locationName: string,
  current: CurrentWeather,
  context: IndexViewContext,
  helpers: ViewHelpers
): string {
  const symbol = helpers.temperatureSymbol(context.units);
  // Celsius pages also show the Fahrenheit equivalent.
  const alternate =
    symbol === '°C'
      ? ` <span class="alternate">(${rounded(helpers.cToF(current.temperature))}°F)</span>`
      : '';

  return [
    '<section class="current">',
    `<h2>${escapeHtml(locationName)}</h2>`,
    `<p class="now">${escapeHtml(helpers.formatDisplayTime(context.now))}</p>`,
    `<p class="temperature">${rounded(current.temperature)}${symbol}${alternate}</p>`,
    `<p class="condition">${escapeHtml(helpers.describeWeatherCode(current.weathercode))}</p>`,
    `<p class="wind">Wind ${rounded(current.windspeed)} km/h from ${rounded(current.winddirection)}°</p>`,
    '</section>',
  ].join('\n');
}

function hourlySection(hours: HourlyEntry[], units: string, helpers: ViewHelpers): string {
  if (hours.length === 0) return '';

  const symbol = helpers.temperatureSymbol(units);
  const items = hours.map((hour) => {
    const condition =
      hour.weatherCode === null ? MISSING : helpers.describeWeatherCode(hour.weatherCode);
    return (
      `<li><span class="time">${escapeHtml(helpers.sliceTime(hour.time))}</span>` +
      ` <span class="temperature">${rounded(hour.temperature)}${symbol}</span>` +
      ` <span class="feels-like">feels ${rounded(hour.apparentTemperature)}${symbol}</span>` +
      ` <span class="condition">${escapeHtml(condition)}</span>` +
      ` <span class="precipitation">${percent(hour.precipitationProbability)}</span></li>`
    );
  });

  return ['<section class="hourly">', '<h3>Next hours</h3>', '<ol>', ...items, '</ol>', '</section>'].join('\n');
}

function dailySection(daily: DailySeries, units: string, helpers: ViewHelpers): string {
  const symbol = helpers.temperatureSymbol(units);
  const rows = daily.time.map((date, i) => {
    const code = daily.weathercode[i];
    const condition =
      code === null || code === undefined ? MISSING : helpers.describeWeatherCode(code);
    const sunrise = daily.sunrise[i];
    const sunset = daily.sunset[i];

    return [
      '<tr>',
      `<td>${escapeHtml(helpers.formatDate(date))}</td>`,
      `<td>${escapeHtml(condition)}</td>`,
      `<td>${rounded(daily.temperature_2m_max[i])}${symbol}</td>`,
      `<td>${rounded(daily.temperature_2m_min[i])}${symbol}</td>`,
      `<td>${sunrise ? escapeHtml(helpers.sliceTime(sunrise)) : MISSING}</td>`,
      `<td>${sunset ? escapeHtml(helpers.sliceTime(sunset)) : MISSING}</td>`,
      `<td>${percent(daily.precipitation_probability_max[i])}</td>`,
      `<td>${percent(daily.relative_humidity_2m_max[i])}</td>`,
      '</tr>',
    ].join('');
  });

  return [
    '<section class="daily">',
    '<h3>Daily forecast</h3>',
    '<table>',
    '<thead><tr><th>Date</th><th>Conditions</th><th>High</th><th>Low</th><th>Sunrise</th><th>Sunset</th><th>Precipitation</th><th>Humidity</th></tr></thead>',
    '<tbody>',
    ...rows,
    '</tbody>',
    '</table>',
    '</section>',
  ].join('\n');
}

export function renderIndexPage(context: IndexViewContext, helpers: ViewHelpers): string {
  const { weatherData, error, current, daily } = context;
  const sections = [searchForm(context.locationQuery, context.units)];

  if (error) {
    sections.push(`<p class="error">${escapeHtml(error)}</p>`);
  }

  if (weatherData && current && daily) {
    sections.push(currentSection(weatherData.locationName, current, context, helpers));
    sections.push(hourlySection(context.hourly, context.units, helpers));
    sections.push(dailySection(daily, context.units, helpers));
  } else if (!error) {
    sections.push('<p class="hint">Search for a city to see its forecast.</p>');
  }

  const title = weatherData ? `Weather for ${weatherData.locationName}` : 'Weather';
  return layout(title, sections.filter(Boolean).join('\n'));
}

export function renderErrorPage(): string {
  return layout(
    'Weather',
    '<p class="error">Something went wrong while loading the weather. Please try again.</p>'
  );
}
