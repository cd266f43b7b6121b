import { systemClock } from '@feedgate/adapters';
import { DEFAULT_SPATIAL_LOOKBACK_SECONDS } from '@feedgate/domain';
import type {
  AggregateQuery,
  AlertQuery,
  ClockPort,
  HeatMapCell,
  HeatMapQuery,
  HourlyVehicleMetrics,
  LayerCounts,
  LayerMetrics,
  LayeredStorePort,
  MetricsQueryPort,
  NearbyQuery,
  NearbyVehicle,
  PositionQuery,
  QualityAlert,
  RoutePerformance,
  SlowZone,
  SlowZoneQuery,
  VehiclePosition,
} from '@feedgate/domain';
import { buildHeatMap, findSlowZones, findVehiclesNear } from './spatial-analytics.js';

/** Share of raw vehicle positions that reached the validated layer. */
export function qualityRate(counts: LayerCounts): number {
  const raw = counts.raw.vehicle_positions;
  return raw === 0 ? 0 : counts.validated.vehicle_positions / raw;
}

export class MetricsReporter implements MetricsQueryPort {
  constructor(
    private readonly store: LayeredStorePort,
    private readonly clock: ClockPort = systemClock,
  ) {}

  async metrics(): Promise<LayerMetrics> {
    const counts = await this.store.counts();
    return { ...counts, qualityRate: qualityRate(counts) };
  }

  hourlyMetrics(query?: AggregateQuery): Promise<HourlyVehicleMetrics[]> {
    return this.store.listHourlyMetrics(query);
  }

  routePerformance(query?: AggregateQuery): Promise<RoutePerformance[]> {
    return this.store.listRoutePerformance(query);
  }

  alerts(query?: AlertQuery): Promise<QualityAlert[]> {
    return this.store.listAlerts(query);
  }

  async vehiclesNear(query: NearbyQuery): Promise<NearbyVehicle[]> {
    const positions = await this.recentPositions(query);
    return findVehiclesNear(positions, query.latitude, query.longitude, query.radiusMeters);
  }

  async heatMap(query: HeatMapQuery): Promise<HeatMapCell[]> {
    const positions = await this.recentPositions(query);
    return buildHeatMap(positions, query.bounds, query.gridSize);
  }

  async slowZones(query: SlowZoneQuery = {}): Promise<SlowZone[]> {
    const positions = await this.recentPositions(query);
    return findSlowZones(positions, query);
  }

  /** Validated positions in `[from, to)`; `from` defaults to one lookback before now. */
  private recentPositions(
    query: Pick<PositionQuery, 'agencyId' | 'from' | 'to' | 'bounds'>,
  ): Promise<VehiclePosition[]> {
    const from =
      query.from ?? new Date(this.clock.now().getTime() - DEFAULT_SPATIAL_LOOKBACK_SECONDS * 1000);
    return this.store.listValidatedPositions({
      agencyId: query.agencyId,
      from,
      to: query.to,
      bounds: query.bounds,
    });
  }
}
