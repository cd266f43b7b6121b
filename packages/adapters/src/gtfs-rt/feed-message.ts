import { parse } from 'protobufjs';
import type { Type } from 'protobufjs';
import { z } from 'zod';
import { DecodeError, errorMessage } from '@feedgate/domain';
import { readPackageAsset } from '../assets.js';

// ─── Wire shape after protobuf decoding ───────────────────────────────────────
// Enumerated fields stay numeric here; mapping to labels happens in the decoder
// so that codes outside the published tables can be reported instead of lost.

const stopTimeEventSchema = z.object({
  delay: z.number().int().optional(),
  time: z.number().optional(),
  uncertainty: z.number().int().optional(),
});

const tripDescriptorSchema = z.object({
  tripId: z.string().optional(),
  routeId: z.string().optional(),
  directionId: z.number().int().optional(),
  startTime: z.string().optional(),
  startDate: z.string().optional(),
  scheduleRelationship: z.number().int().optional(),
});

const vehicleDescriptorSchema = z.object({
  id: z.string().optional(),
  label: z.string().optional(),
  licensePlate: z.string().optional(),
});

const positionSchema = z.object({
  latitude: z.number(),
  longitude: z.number(),
  bearing: z.number().optional(),
  odometer: z.number().optional(),
  speed: z.number().optional(),
});

const vehiclePositionSchema = z.object({
  trip: tripDescriptorSchema.optional(),
  vehicle: vehicleDescriptorSchema.optional(),
  position: positionSchema.optional(),
  currentStopSequence: z.number().int().optional(),
  stopId: z.string().optional(),
  currentStatus: z.number().int().optional(),
  timestamp: z.number().optional(),
  congestionLevel: z.number().int().optional(),
  occupancyStatus: z.number().int().optional(),
});

const stopTimeUpdateSchema = z.object({
  stopSequence: z.number().int().optional(),
  stopId: z.string().optional(),
  arrival: stopTimeEventSchema.optional(),
  departure: stopTimeEventSchema.optional(),
  scheduleRelationship: z.number().int().optional(),
});

const tripUpdateSchema = z.object({
  trip: tripDescriptorSchema,
  vehicle: vehicleDescriptorSchema.optional(),
  stopTimeUpdate: z.array(stopTimeUpdateSchema).default([]),
  timestamp: z.number().optional(),
  delay: z.number().int().optional(),
});

const feedEntitySchema = z.object({
  id: z.string(),
  isDeleted: z.boolean().optional(),
  tripUpdate: tripUpdateSchema.optional(),
  vehicle: vehiclePositionSchema.optional(),
});

export const feedMessageSchema = z.object({
  header: z.object({
    gtfsRealtimeVersion: z.string(),
    incrementality: z.number().int().optional(),
    timestamp: z.number().optional(),
  }),
  entity: z.array(feedEntitySchema).default([]),
});

export type GtfsFeedMessage = z.infer<typeof feedMessageSchema>;
export type GtfsFeedMessageInput = z.input<typeof feedMessageSchema>;
export type GtfsFeedEntity = z.infer<typeof feedEntitySchema>;
export type GtfsVehiclePosition = z.infer<typeof vehiclePositionSchema>;
export type GtfsTripUpdate = z.infer<typeof tripUpdateSchema>;
export type GtfsStopTimeUpdate = z.infer<typeof stopTimeUpdateSchema>;

// ─── Codec ────────────────────────────────────────────────────────────────────

let feedMessageType: Type | null = null;

function getFeedMessageType(): Type {
  if (!feedMessageType) {
    const { root } = parse(readPackageAsset('proto/gtfs-realtime.proto'));
    feedMessageType = root.lookupType('transit_realtime.FeedMessage');
  }
  return feedMessageType;
}

/** Parses a binary GTFS-Realtime FeedMessage. Throws DecodeError on malformed input. */
export function decodeFeedMessage(bytes: Uint8Array): GtfsFeedMessage {
  const type = getFeedMessageType();
  let plain: unknown;
  try {
    const message = type.decode(bytes);
    plain = type.toObject(message, { longs: Number, enums: Number, defaults: false, arrays: true });
  } catch (err) {
    throw new DecodeError(`malformed GTFS-Realtime feed: ${errorMessage(err)}`, { cause: err });
  }
  const parsed = feedMessageSchema.safeParse(plain);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unexpected shape';
    throw new DecodeError(`malformed GTFS-Realtime feed: ${where}`, { cause: parsed.error });
  }
  return parsed.data;
}

/** Serialises a FeedMessage. Used by the feed simulator and tests. */
export function encodeFeedMessage(message: GtfsFeedMessageInput): Uint8Array {
  const type = getFeedMessageType();
  return type.encode(type.fromObject(message)).finish();
}
