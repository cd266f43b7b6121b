import { describe, it, expect } from '@jest/globals';
import { DecodeError } from '@feedgate/domain';
import { decodeFeedMessage, encodeFeedMessage } from '../feed-message.js';
import type { GtfsFeedMessageInput } from '../feed-message.js';

const HEADER = { gtfsRealtimeVersion: '2.0', incrementality: 0, timestamp: 1_710_079_200 };

describe('GTFS-Realtime codec', () => {
  it('decodes vehicle positions with camelCase fields and numeric codes', () => {
    const message: GtfsFeedMessageInput = {
      header: HEADER,
      entity: [
        {
          id: 'e1',
          vehicle: {
            trip: { tripId: 'trip-100', routeId: '20' },
            vehicle: { id: '4012', label: 'Bus 4012' },
            position: { latitude: 45.5152, longitude: -122.6784, bearing: 90, speed: 12.5 },
            currentStopSequence: 7,
            stopId: '8989',
            currentStatus: 2,
            congestionLevel: 1,
            occupancyStatus: 3,
            timestamp: 1_710_079_195,
          },
        },
      ],
    };

    const decoded = decodeFeedMessage(encodeFeedMessage(message));

    expect(decoded.header.timestamp).toBe(1_710_079_200);
    expect(decoded.header.gtfsRealtimeVersion).toBe('2.0');
    expect(decoded.entity).toHaveLength(1);
    const vehicle = decoded.entity[0]?.vehicle;
    expect(vehicle?.vehicle?.id).toBe('4012');
    expect(vehicle?.trip).toEqual({ tripId: 'trip-100', routeId: '20' });
    expect(vehicle?.position?.latitude).toBeCloseTo(45.5152, 4);
    expect(vehicle?.position?.longitude).toBeCloseTo(-122.6784, 4);
    expect(vehicle?.position?.speed).toBe(12.5);
    expect(vehicle?.timestamp).toBe(1_710_079_195);
    expect([vehicle?.currentStatus, vehicle?.congestionLevel, vehicle?.occupancyStatus]).toEqual([2, 1, 3]);
  });

  it('keeps codes outside the published enums', () => {
    const bytes = encodeFeedMessage({
      header: HEADER,
      entity: [
        {
          id: 'e1',
          vehicle: { position: { latitude: 45.5, longitude: -122.6 }, congestionLevel: 9 },
        },
      ],
    });

    expect(decodeFeedMessage(bytes).entity[0]?.vehicle?.congestionLevel).toBe(9);
  });

  it('decodes trip updates with their stop-time updates', () => {
    const bytes = encodeFeedMessage({
      header: HEADER,
      entity: [
        {
          id: 't1',
          tripUpdate: {
            trip: { tripId: 'trip-7', routeId: '72' },
            stopTimeUpdate: [
              { stopSequence: 3, stopId: 'A', arrival: { delay: 120 } },
              { stopSequence: 4, stopId: 'B', departure: { delay: -30, time: 1_710_079_500 } },
            ],
          },
        },
      ],
    });

    const update = decodeFeedMessage(bytes).entity[0]?.tripUpdate;
    expect(update?.trip.tripId).toBe('trip-7');
    expect(update?.stopTimeUpdate).toEqual([
      { stopSequence: 3, stopId: 'A', arrival: { delay: 120 } },
      { stopSequence: 4, stopId: 'B', departure: { delay: -30, time: 1_710_079_500 } },
    ]);
  });

  it('defaults missing repeated fields to empty arrays', () => {
    const decoded = decodeFeedMessage(encodeFeedMessage({ header: HEADER }));
    expect(decoded.entity).toEqual([]);
  });

  it('raises DecodeError for truncated bytes', () => {
    const truncated = new Uint8Array([0x0a, 0x05, 0x01]);
    expect(() => decodeFeedMessage(truncated)).toThrow(DecodeError);
    expect(() => decodeFeedMessage(truncated)).toThrow(/^malformed GTFS-Realtime feed: /);
  });

  it('raises DecodeError when the required header is missing', () => {
    expect(() => decodeFeedMessage(new Uint8Array(0))).toThrow(DecodeError);
  });
});
