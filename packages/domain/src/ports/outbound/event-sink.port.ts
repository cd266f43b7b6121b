import type { VehiclePosition } from '../../entities/vehicle-position.js';
import type { TripUpdate } from '../../entities/trip-update.js';
import type { WeatherObservation } from '../../entities/weather-observation.js';
import type { QualityAlert } from '../../entities/quality-alert.js';

/**
 * Downstream consumer of validated records and quality alerts.
 * Messages are keyed (vehicle id, trip id, agency id) for partition affinity;
 * delivery guarantees belong to the sink.
 */
export interface EventSinkPort {
  publishVehiclePosition(position: VehiclePosition): Promise<void>;
  publishTripUpdate(update: TripUpdate): Promise<void>;
  publishWeather(observation: WeatherObservation): Promise<void>;
  publishQualityAlert(alert: QualityAlert): Promise<void>;
}
