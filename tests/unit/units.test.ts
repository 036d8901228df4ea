import { cToF, temperatureSymbol } from '@/utils/units';

describe('cToF (unit)', () => {
  it('converts with f = c * 9 / 5 + 32', () => {
    expect(cToF(0)).toBe(32);
    expect(cToF(100)).toBe(212);
    expect(cToF(-40)).toBe(-40);
    expect(cToF(37)).toBeCloseTo(98.6, 10);
  });

  it('does not round fractional results', () => {
    expect(cToF(12.5)).toBe(54.5);
    expect(cToF(1)).toBeCloseTo(33.8, 10);
  });
});

describe('temperatureSymbol (unit)', () => {
  it('labels fahrenheit and imperial as °F', () => {
    expect(temperatureSymbol('fahrenheit')).toBe('°F');
    expect(temperatureSymbol('Imperial')).toBe('°F');
  });

  it('labels everything else as °C', () => {
    expect(temperatureSymbol('metric')).toBe('°C');
    expect(temperatureSymbol('celsius')).toBe('°C');
    expect(temperatureSymbol('kelvin')).toBe('°C');
  });
});
