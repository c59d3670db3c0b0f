import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import wk from "wellknown"; // GeoJSON -> WKT
import { z } from "zod";
import type { GeoPoint, RegionInfo, StoredFlight } from "../models/flight.js";
import type { PersistenceSink, SpatialRegionLookup } from "../services/ingest.js";

export interface FlightRow {
  flight_id: string;
  message_type: string;
  aircraft_type: string | null;
  aircraft_registration: string | null;
  departure_time: string | null;
  arrival_time: string | null;
  duration_minutes: number | null;
  departure_point: string | null; // EWKT, SRID 4326
  arrival_point: string | null;
  departure_aerodrome: string | null;
  arrival_aerodrome: string | null;
  altitude_m: number | null;
  distance_km: number | null;
  avg_speed_kmh: number | null;
  route: string | null;
  operator: string | null;
  remarks: string | null;
  region_departure: string | null;
  region_departure_code: string | null;
  region_arrival: string | null;
  region_arrival_code: string | null;
  raw_message: string;
  parse_errors: string | null;
}

// Ключ идемпотентности между батчами: идентификатор + время + точка вылета
export const FLIGHT_CONFLICT_KEY = "flight_id,departure_time,departure_point";

const RegionRowSchema = z.object({
  region_code: z.union([z.string(), z.number()]).transform(String),
  region_name: z.string(),
  federal_district: z.string().nullable().optional(),
  region_type: z.string().nullable().optional(),
});

export function createSupa(url: string, serviceRoleKey: string): SupabaseClient {
  return createClient(url, serviceRoleKey, { auth: { persistSession: false } });
}

function toEwkt(p: GeoPoint | undefined) {
  return p ? `SRID=4326;${wk.stringify({ type: "Point", coordinates: [p.lon, p.lat] })}` : null;
}

export function toFlightRow(f: StoredFlight): FlightRow {
  return {
    flight_id: f.flight_id,
    message_type: f.message_type,
    aircraft_type: f.aircraft_type ?? null,
    aircraft_registration: f.registration ?? null,
    departure_time: f.dep_time ? f.dep_time.toISOString() : null,
    arrival_time: f.arr_time ? f.arr_time.toISOString() : null,
    duration_minutes: f.duration_min ?? null,
    departure_point: toEwkt(f.dep),
    arrival_point: toEwkt(f.arr),
    departure_aerodrome: f.dep_aerodrome ?? null,
    arrival_aerodrome: f.arr_aerodrome ?? null,
    altitude_m: f.altitude_m ?? null,
    distance_km: f.distance_km ?? null,
    avg_speed_kmh: f.avg_speed_kmh ?? null,
    route: f.route ?? null,
    operator: f.operator ?? null,
    remarks: f.remarks ?? null,
    region_departure: f.dep_region?.region_name ?? null,
    region_departure_code: f.dep_region?.region_code ?? null,
    region_arrival: f.arr_region?.region_name ?? null,
    region_arrival_code: f.arr_region?.region_code ?? null,
    raw_message: f.raw,
    parse_errors: f.parse_errors.length ? f.parse_errors.join("; ") : null,
  };
}

/** RPC result → region; the function may return one row, a one-row array or nothing. */
export function parseRegionRow(data: unknown): RegionInfo | null {
  const row: unknown = Array.isArray(data) ? data[0] : data;
  if (row == null) return null;
  const parsed = RegionRowSchema.safeParse(row);
  if (!parsed.success) return null;
  const r = parsed.data;
  return {
    region_code: r.region_code,
    region_name: r.region_name,
    federal_district: r.federal_district ?? null,
    region_type: r.region_type ?? null,
  };
}

export function createFlightSink(supa: SupabaseClient, table = "flights"): PersistenceSink {
  return {
    async save(flight) {
      const { error } = await supa
        .from(table)
        .upsert(toFlightRow(flight), { onConflict: FLIGHT_CONFLICT_KEY });
      if (error) throw new Error(error.message);
      return true;
    },
  };
}

export function createRegionLookup(supa: SupabaseClient, rpc = "region_by_point"): SpatialRegionLookup {
  return {
    async geocode(lon, lat) {
      const { data, error } = await supa.rpc(rpc, { p_lon: lon, p_lat: lat });
      if (error) throw new Error(error.message);
      return parseRegionRow(data);
    },
  };
}
