export const MESSAGE_TYPES = ["FPL", "DEP", "ARR", "CHG", "CNL", "DLA", "RQS", "RQP"] as const;

export type MessageType = (typeof MESSAGE_TYPES)[number];

/** Geographic point in decimal degrees. */
export interface GeoPoint {
  /** latitude in decimal degrees */
  lat: number;
  /** longitude in decimal degrees */
  lon: number;
  /** original token that produced this coordinate (for traceability) */
  src?: string;
  /** notation the coordinate was written in */
  precision?: "dms" | "dm" | "dd"; // degrees‑minutes‑seconds | degrees‑minutes | decimal degrees
}

/**
 * One telegram after extraction. Created once per input line and changed
 * afterwards only through {@link applyPatch}.
 */
export interface ParsedRecord {
  message_type: MessageType;
  flight_id: string;           // может быть пустой строкой
  aircraft_type?: string;
  registration?: string;

  /** Scheduling, resolved against the reference clock (UTC) */
  dep_time?: Date;
  arr_time?: Date;
  duration_min?: number;       // derived by validation if both times are present

  /** Geography */
  dep?: GeoPoint;
  arr?: GeoPoint;
  dep_aerodrome?: string;      // 4-letter code
  arr_aerodrome?: string;
  distance_km?: number;        // derived by validation
  avg_speed_kmh?: number;      // derived by validation

  altitude_m?: number;
  route?: string;
  operator?: string;
  remarks?: string;

  readonly raw: string;
  parse_errors: string[];
}

/** Named corrections a validator may apply to a record. */
export interface RecordPatch {
  flight_id?: string;
  aircraft_type?: string;
  dep_time?: Date;
  arr_time?: Date;
  dep?: GeoPoint;
  arr?: GeoPoint;
  altitude_m?: number;
  duration_min?: number;
  distance_km?: number;
  avg_speed_kmh?: number;
}

export interface ValidationOutcome {
  is_valid: boolean;
  /** blocking */
  errors: string[];
  /** non-blocking, kept for audit */
  warnings: string[];
  patch: RecordPatch;
}

export interface RegionInfo {
  region_code: string;
  region_name: string;
  federal_district: string | null;
  region_type: string | null;
}

/** Accepted record together with its resolved regions, as handed to persistence. */
export type StoredFlight = ParsedRecord & {
  dep_region: RegionInfo | null;
  arr_region: RegionInfo | null;
};

export function emptyRecord(raw: string): ParsedRecord {
  return { message_type: "FPL", flight_id: "", raw, parse_errors: [] };
}

export function applyPatch(rec: ParsedRecord, patch: RecordPatch): ParsedRecord {
  if (patch.flight_id !== undefined) rec.flight_id = patch.flight_id;
  if (patch.aircraft_type !== undefined) rec.aircraft_type = patch.aircraft_type;
  if (patch.dep_time !== undefined) rec.dep_time = patch.dep_time;
  if (patch.arr_time !== undefined) rec.arr_time = patch.arr_time;
  if (patch.dep !== undefined) rec.dep = patch.dep;
  if (patch.arr !== undefined) rec.arr = patch.arr;
  if (patch.altitude_m !== undefined) rec.altitude_m = patch.altitude_m;
  if (patch.duration_min !== undefined) rec.duration_min = patch.duration_min;
  if (patch.distance_km !== undefined) rec.distance_km = patch.distance_km;
  if (patch.avg_speed_kmh !== undefined) rec.avg_speed_kmh = patch.avg_speed_kmh;
  return rec;
}
