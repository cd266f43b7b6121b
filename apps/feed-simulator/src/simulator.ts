import 'dotenv/config';
import { fetch } from 'undici';
import { encodeFeedMessage } from '@feedgate/adapters';
import { FleetModel } from './fleet-model.js';

/**
 * Feed simulator: pushes a synthetic GTFS-Realtime feed to the API.
 *
 * Env vars:
 *   API_BASE_URL      Base URL of the feedgate API (default: http://localhost:3001)
 *   SIM_AGENCY_ID     Agency the feed is ingested under (default: sim)
 *   SIM_VEHICLES      Fleet size (default: 20)
 *   SIM_SEED          RNG seed; the same seed replays the same fleet (default: 42)
 *   SIM_FAULT_RATE    Share of positions sent with an implausible speed (default: 0.02)
 *   SIM_CENTER_LAT / SIM_CENTER_LON   Start area (default: Portland, OR)
 *   EMIT_INTERVAL_MS  Emit interval in ms (default: 5000)
 */

const API_BASE_URL = process.env['API_BASE_URL'] ?? 'http://localhost:3001';
const AGENCY_ID = process.env['SIM_AGENCY_ID'] ?? 'sim';
const VEHICLES = parseInt(process.env['SIM_VEHICLES'] ?? '20', 10);
const SEED = parseInt(process.env['SIM_SEED'] ?? '42', 10);
const FAULT_RATE = parseFloat(process.env['SIM_FAULT_RATE'] ?? '0.02');
const CENTER_LAT = parseFloat(process.env['SIM_CENTER_LAT'] ?? '45.5152');
const CENTER_LON = parseFloat(process.env['SIM_CENTER_LON'] ?? '-122.6784');
const EMIT_INTERVAL_MS = parseInt(process.env['EMIT_INTERVAL_MS'] ?? '5000', 10);

const fleet = new FleetModel({
  vehicleCount: VEHICLES,
  seed: SEED,
  center: { latitude: CENTER_LAT, longitude: CENTER_LON },
  faultRate: FAULT_RATE,
});

let sending = false;

async function emit(): Promise<void> {
  fleet.step(EMIT_INTERVAL_MS / 1000);
  const bytes = encodeFeedMessage(fleet.toFeedMessage(new Date()));
  const url = `${API_BASE_URL}/api/ingest/feed?agencyId=${encodeURIComponent(AGENCY_ID)}`;

  try {
    const resp = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/octet-stream' },
      body: bytes,
    });
    if (!resp.ok) {
      const text = await resp.text();
      console.error(`[simulator] ingest failed ${resp.status}: ${text}`);
      return;
    }
    console.log(`[simulator] sent ${bytes.length} bytes for ${VEHICLES} vehicles`);
  } catch (err) {
    console.error('[simulator] network error', err instanceof Error ? err.message : err);
  }
}

function tick(): void {
  if (sending) return;
  sending = true;
  void emit()
    .catch((err) => console.error('[simulator] emit error', err))
    .finally(() => {
      sending = false;
    });
}

console.log(`[simulator] ${VEHICLES} vehicles (seed ${SEED}) → ${API_BASE_URL} as ${AGENCY_ID}`);
const timer = setInterval(tick, EMIT_INTERVAL_MS);

process.on('SIGINT', () => {
  clearInterval(timer);
  process.exit(0);
});
