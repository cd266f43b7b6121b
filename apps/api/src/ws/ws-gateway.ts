import { WebSocketServer, WebSocket } from 'ws';
import type { Server } from 'http';
import type {
  EventSinkPort,
  QualityAlert,
  TripUpdate,
  VehiclePosition,
  WeatherObservation,
} from '@feedgate/domain';

export type WsMessage =
  | { type: 'vehicle_position'; key: string; data: VehiclePosition }
  | { type: 'trip_update'; key: string; data: TripUpdate }
  | { type: 'weather'; key: string; data: WeatherObservation }
  | { type: 'quality_alert'; key: string; data: QualityAlert };

/** Event sink that fans validated records and alerts out to WebSocket clients on /ws. */
export class WsGateway implements EventSinkPort {
  private readonly wss: WebSocketServer;
  private readonly clients = new Set<WebSocket>();

  constructor(server: Server) {
    this.wss = new WebSocketServer({ server, path: '/ws' });

    this.wss.on('connection', (ws) => {
      this.clients.add(ws);
      ws.on('close', () => this.clients.delete(ws));
      ws.on('error', () => this.clients.delete(ws));
    });

    console.log('[ws-gateway] listening on /ws');
  }

  get clientCount(): number {
    return this.clients.size;
  }

  private broadcast(msg: WsMessage): void {
    const payload = JSON.stringify(msg);
    for (const client of this.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(payload);
      }
    }
  }

  async publishVehiclePosition(position: VehiclePosition): Promise<void> {
    this.broadcast({ type: 'vehicle_position', key: position.vehicleId, data: position });
  }

  async publishTripUpdate(update: TripUpdate): Promise<void> {
    this.broadcast({ type: 'trip_update', key: update.tripId, data: update });
  }

  async publishWeather(observation: WeatherObservation): Promise<void> {
    this.broadcast({ type: 'weather', key: observation.agencyId, data: observation });
  }

  async publishQualityAlert(alert: QualityAlert): Promise<void> {
    this.broadcast({ type: 'quality_alert', key: alert.entityId ?? alert.agencyId, data: alert });
  }

  close(): Promise<void> {
    for (const client of this.clients) client.terminate();
    this.clients.clear();
    return new Promise((resolve, reject) => {
      this.wss.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
