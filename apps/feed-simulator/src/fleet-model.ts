import { SeededRng } from '@feedgate/adapters';
import type { GtfsFeedMessageInput } from '@feedgate/adapters';

type FeedEntityInput = NonNullable<GtfsFeedMessageInput['entity']>[number];

export type DrivePhase = 'idle' | 'accel' | 'cruise' | 'decel';

export interface FleetModelOptions {
  vehicleCount: number;
  seed: number;
  center: { latitude: number; longitude: number };
  routeIds?: readonly string[];
  /** Probability per vehicle per message of reporting an implausible speed. */
  faultRate?: number;
}

export interface SimulatedVehicle {
  readonly vehicleId: string;
  readonly routeId: string;
  readonly tripId: string;
  latitude: number;
  longitude: number;
  bearing: number;
  /** m/s, as GTFS-Realtime reports it. */
  speed: number;
  phase: DrivePhase;
  phaseTicks: number;
  cruiseTarget: number;
  stopSequence: number;
  delaySeconds: number;
}

const DEFAULT_ROUTES = ['10', '20', '33', '72'];
export const FAULT_SPEED_MPS = 45;
const KM_PER_DEGREE = 111;

// Protobuf codes: VehicleStopStatus, CongestionLevel
const STOPPED_AT = 1;
const IN_TRANSIT_TO = 2;
const RUNNING_SMOOTHLY = 1;
const CONGESTION = 3;

/**
 * A seeded fleet that drives through idle → accel → cruise → decel phases
 * and renders itself as a GTFS-Realtime FeedMessage.
 */
export class FleetModel {
  readonly vehicles: SimulatedVehicle[];
  private readonly rng: SeededRng;
  private readonly faultRate: number;

  constructor(opts: FleetModelOptions) {
    this.rng = new SeededRng(opts.seed);
    this.faultRate = opts.faultRate ?? 0;
    const routes = opts.routeIds && opts.routeIds.length > 0 ? opts.routeIds : DEFAULT_ROUTES;
    this.vehicles = Array.from({ length: opts.vehicleCount }, (_, i): SimulatedVehicle => {
      const routeId = routes[i % routes.length];
      return {
        vehicleId: `sim-${String(i + 1).padStart(3, '0')}`,
        routeId,
        tripId: `${routeId}-trip-${i + 1}`,
        latitude: opts.center.latitude + this.rng.between(-0.05, 0.05),
        longitude: opts.center.longitude + this.rng.between(-0.05, 0.05),
        bearing: this.rng.between(0, 360),
        speed: 0,
        phase: 'idle',
        phaseTicks: this.rng.intBetween(0, 5),
        cruiseTarget: 0,
        stopSequence: 1,
        delaySeconds: 0,
      };
    });
  }

  /** Advances every vehicle by `dtSeconds`. */
  step(dtSeconds: number): void {
    for (const v of this.vehicles) this.stepVehicle(v, dtSeconds);
  }

  toFeedMessage(now: Date): GtfsFeedMessageInput {
    const timestamp = Math.floor(now.getTime() / 1000);
    const entity: FeedEntityInput[] = [];
    for (const v of this.vehicles) {
      const faulty = this.rng.unit() < this.faultRate;
      entity.push({
        id: `vp-${v.vehicleId}`,
        vehicle: {
          trip: { tripId: v.tripId, routeId: v.routeId },
          vehicle: { id: v.vehicleId, label: v.vehicleId },
          position: {
            latitude: v.latitude,
            longitude: v.longitude,
            bearing: Math.round(v.bearing) % 360,
            speed: faulty ? FAULT_SPEED_MPS : Math.round(v.speed * 10) / 10,
          },
          currentStopSequence: v.stopSequence,
          currentStatus: v.speed < 0.5 ? STOPPED_AT : IN_TRANSIT_TO,
          congestionLevel: v.phase !== 'idle' && v.speed < 4 ? CONGESTION : RUNNING_SMOOTHLY,
          occupancyStatus: this.rng.intBetween(0, 4),
          timestamp,
        },
      });
      entity.push({
        id: `tu-${v.tripId}`,
        tripUpdate: {
          trip: { tripId: v.tripId, routeId: v.routeId },
          vehicle: { id: v.vehicleId },
          stopTimeUpdate: [
            {
              stopSequence: v.stopSequence + 1,
              stopId: `${v.routeId}-${v.stopSequence + 1}`,
              arrival: { delay: v.delaySeconds },
              departure: { delay: v.delaySeconds },
            },
          ],
          timestamp,
        },
      });
    }
    return {
      header: { gtfsRealtimeVersion: '2.0', incrementality: 0, timestamp },
      entity,
    };
  }

  // ─── Drive phases ───────────────────────────────────────────────────────────

  private nextPhase(v: SimulatedVehicle): void {
    switch (v.phase) {
      case 'idle':
        v.phase = 'accel';
        v.cruiseTarget = this.rng.between(8, 20);
        v.phaseTicks = this.rng.intBetween(4, 8);
        v.bearing = (v.bearing + this.rng.between(-15, 15) + 360) % 360;
        break;
      case 'accel':
        v.phase = 'cruise';
        v.phaseTicks = this.rng.intBetween(10, 30);
        break;
      case 'cruise':
        if (this.rng.unit() < 0.3) {
          // dwell at the next stop
          v.phase = 'idle';
          v.phaseTicks = this.rng.intBetween(3, 8);
          v.stopSequence++;
        } else {
          v.phase = 'decel';
          v.phaseTicks = this.rng.intBetween(3, 8);
        }
        break;
      case 'decel':
        v.phase = 'accel';
        v.cruiseTarget = this.rng.between(8, 20);
        v.phaseTicks = this.rng.intBetween(4, 10);
        v.bearing = (v.bearing + this.rng.between(-10, 10) + 360) % 360;
        break;
    }
  }

  private stepVehicle(v: SimulatedVehicle, dtSeconds: number): void {
    if (v.phaseTicks <= 0) this.nextPhase(v);
    v.phaseTicks--;

    switch (v.phase) {
      case 'idle':
        v.speed = Math.max(0, v.speed * 0.5);
        break;
      case 'accel':
        v.speed += (v.cruiseTarget - v.speed) * 0.25;
        break;
      case 'cruise':
        v.speed = Math.max(1.5, v.cruiseTarget + this.rng.between(-0.5, 0.5));
        break;
      case 'decel':
        v.speed = Math.max(0, v.speed * 0.8);
        break;
    }

    if (v.speed > 1) {
      v.bearing = (v.bearing + this.rng.between(-2.5, 2.5) + 360) % 360;
    }

    const distKm = (v.speed * dtSeconds) / 1000;
    const rad = (v.bearing * Math.PI) / 180;
    v.latitude += (distKm * Math.cos(rad)) / KM_PER_DEGREE;
    v.longitude += (distKm * Math.sin(rad)) / (KM_PER_DEGREE * Math.cos((v.latitude * Math.PI) / 180));
    v.delaySeconds = Math.min(900, Math.max(-120, v.delaySeconds + this.rng.intBetween(-10, 15)));
  }
}
