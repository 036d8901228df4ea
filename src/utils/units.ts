export function cToF(celsius: number): number {
  return (celsius * 9) / 5 + 32;
}

// Labels the temperatures in the page; anything else renders as Celsius.
export function temperatureSymbol(units: string): string {
  const normalized = units.toLowerCase();
  return normalized === 'fahrenheit' || normalized === 'imperial' ? '°F' : '°C';
}
