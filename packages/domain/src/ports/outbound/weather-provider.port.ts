import type { RawWeatherObservation } from '../../entities/weather-observation.js';

export interface WeatherProviderPort {
  /** Current conditions at a point, or null when the provider has nothing usable. */
  currentWeather(
    latitude: number,
    longitude: number,
    agencyId: string,
  ): Promise<RawWeatherObservation | null>;
}
