import { WEATHER_CODES, describeWeatherCode } from '../constants/weatherCodes';
import { formatDate, formatDisplayTime, sliceTime } from '../utils/time';
import { cToF, temperatureSymbol } from '../utils/units';

export type ViewHelpers = {
  formatDate: typeof formatDate;
  sliceTime: typeof sliceTime;
  cToF: typeof cToF;
  weatherCodes: typeof WEATHER_CODES;
  describeWeatherCode: typeof describeWeatherCode;
  formatDisplayTime: typeof formatDisplayTime;
  temperatureSymbol: typeof temperatureSymbol;
};

export const viewHelpers: ViewHelpers = {
  formatDate,
  sliceTime,
  cToF,
  weatherCodes: WEATHER_CODES,
  describeWeatherCode,
  formatDisplayTime,
  temperatureSymbol,
};
