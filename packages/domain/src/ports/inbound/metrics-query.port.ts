import type {
  HourlyVehicleMetrics,
  LayerMetrics,
  RoutePerformance,
} from '../../entities/layer-records.js';
import type { QualityAlert } from '../../entities/quality-alert.js';
import type {
  HeatMapCell,
  HeatMapQuery,
  NearbyQuery,
  NearbyVehicle,
  SlowZone,
  SlowZoneQuery,
} from '../../entities/spatial.js';
import type { AggregateQuery, AlertQuery } from '../outbound/layered-store.port.js';

/** Read-only observability surface over the layered tables. */
export interface MetricsQueryPort {
  metrics(): Promise<LayerMetrics>;
  hourlyMetrics(query?: AggregateQuery): Promise<HourlyVehicleMetrics[]>;
  routePerformance(query?: AggregateQuery): Promise<RoutePerformance[]>;
  alerts(query?: AlertQuery): Promise<QualityAlert[]>;
  /** Nearest first. */
  vehiclesNear(query: NearbyQuery): Promise<NearbyVehicle[]>;
  /** Busiest cells first; empty cells are left out. */
  heatMap(query: HeatMapQuery): Promise<HeatMapCell[]>;
  /** Slowest zones first. */
  slowZones(query?: SlowZoneQuery): Promise<SlowZone[]>;
}
