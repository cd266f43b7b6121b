import type { TimestampInput } from './vehicle-position.js';

export type WeatherCondition =
  | 'CLEAR'
  | 'PARTLY_CLOUDY'
  | 'OVERCAST'
  | 'RAIN'
  | 'HEAVY_RAIN'
  | 'SNOW'
  | 'THUNDERSTORM'
  | 'FOG'
  | 'UNKNOWN';

export const WEATHER_CONDITIONS: readonly WeatherCondition[] = [
  'CLEAR',
  'PARTLY_CLOUDY',
  'OVERCAST',
  'RAIN',
  'HEAVY_RAIN',
  'SNOW',
  'THUNDERSTORM',
  'FOG',
  'UNKNOWN',
];

export const SEVERE_WEATHER_CONDITIONS: ReadonlySet<WeatherCondition> = new Set<WeatherCondition>([
  'HEAVY_RAIN',
  'SNOW',
  'THUNDERSTORM',
]);

/** Maps a WMO weather interpretation code to a simplified condition. */
export function weatherConditionFromWmo(code: number): WeatherCondition {
  if (code === 0) return 'CLEAR';
  if (code === 1 || code === 2) return 'PARTLY_CLOUDY';
  if (code === 3) return 'OVERCAST';
  if (code === 45 || code === 48) return 'FOG';
  if (code >= 51 && code <= 67) return 'RAIN';
  if (code >= 71 && code <= 77) return 'SNOW';
  if (code >= 80 && code <= 82) return 'HEAVY_RAIN';
  if (code >= 95 && code <= 99) return 'THUNDERSTORM';
  return 'UNKNOWN';
}

/** Weather reading supplied by the enrichment collaborator. */
export interface RawWeatherObservation {
  readonly latitude?: number;
  readonly longitude?: number;
  readonly temperatureCelsius?: number;
  readonly precipitationMm?: number;
  readonly windSpeedKmh?: number;
  readonly weatherCode?: number;
  readonly observationTime?: TimestampInput;
  readonly agencyId: string;
}

export interface WeatherObservation {
  readonly latitude: number;
  readonly longitude: number;
  readonly temperatureCelsius: number;
  readonly precipitationMm: number;
  readonly windSpeedKmh: number;
  readonly weatherCode: number;
  readonly weatherCondition: WeatherCondition;
  readonly observationTime: Date;
  readonly agencyId: string;
}
