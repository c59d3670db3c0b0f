import type { GeoPoint, ParsedRecord, RecordPatch, ValidationOutcome } from "../models/flight.js";
import { inTerritory, isValidLat, isValidLon, planarDistanceKm } from "./coords.js";
import { UAV_TYPE_CODES } from "./extractors.js";

export interface ValidationLimits {
  maxDurationHours: number;
  minDurationMinutes: number;
  maxAltitudeM: number;
  minAltitudeM: number;
  maxSpeedKmh: number;
  /** departures older than this are flagged */
  maxPastDays: number;
  /** departures further ahead than this are flagged */
  maxFutureDays: number;
}

export const DEFAULT_LIMITS: ValidationLimits = Object.freeze({
  maxDurationHours: 24,
  minDurationMinutes: 1,
  maxAltitudeM: 10000,
  minAltitudeM: 0,
  maxSpeedKmh: 500,
  maxPastDays: 365,
  maxFutureDays: 30,
});

export interface ValidateOptions {
  now?: Date;
  limits?: ValidationLimits;
}

interface Check {
  errors: string[];
  warnings: string[];
  patch: RecordPatch;
}

const DAY_MS = 24 * 60 * 60 * 1000;
const ID_CHARS_RE = /^[\p{L}\p{N}-]+$/u;

const round2 = (x: number) => Math.round(x * 100) / 100;

function check(): Check {
  return { errors: [], warnings: [], patch: {} };
}

function checkFlightId(flightId: string): Check {
  const c = check();
  if (!flightId) {
    c.errors.push("missing flight identifier");
    return c;
  }
  const id = flightId.trim().toUpperCase();
  if (id.length < 3 || id.length > 7) c.warnings.push(`non-standard flight identifier length: ${id.length}`);
  if (!ID_CHARS_RE.test(id)) c.warnings.push("flight identifier contains invalid characters");
  c.patch.flight_id = id;
  return c;
}

/** Maps an unrecognized type onto a known code by substring. */
export function inferAircraftType(type: string) {
  if (type.includes("QUAD") || type.includes("MULTI")) return "QUAD";
  if (type.includes("HELI")) return "HELI";
  if (type.includes("FIXED") || type.includes("WING")) return "FIXW";
  return "UNKN";
}

// Тип ВС никогда не блокирует запись
function checkAircraftType(aircraftType: string | undefined): Check {
  const c = check();
  if (!aircraftType) {
    c.warnings.push("aircraft type missing, set to UNKN");
    c.patch.aircraft_type = "UNKN";
    return c;
  }
  const type = aircraftType.trim().toUpperCase();
  if (UAV_TYPE_CODES.has(type)) {
    c.patch.aircraft_type = type;
    return c;
  }
  const inferred = inferAircraftType(type);
  c.warnings.push(`unknown aircraft type: ${type}`);
  c.warnings.push(`aircraft type inferred as: ${inferred}`);
  c.patch.aircraft_type = inferred;
  return c;
}

function checkTimes(dep: Date | undefined, arr: Date | undefined, now: Date, limits: ValidationLimits): Check {
  const c = check();
  if (!dep) {
    c.errors.push("missing departure time");
    return c;
  }

  if (dep.getTime() < now.getTime() - limits.maxPastDays * DAY_MS) {
    c.warnings.push(`departure time is more than ${limits.maxPastDays} days in the past`);
  } else if (dep.getTime() > now.getTime() + limits.maxFutureDays * DAY_MS) {
    c.warnings.push(`departure time is more than ${limits.maxFutureDays} days in the future`);
  }
  c.patch.dep_time = dep;

  if (!arr) return c;
  c.patch.arr_time = arr;

  // Знак сохраняем: ошибка порядка и предупреждение о длительности независимы
  const seconds = (arr.getTime() - dep.getTime()) / 1000;
  const hours = seconds / 3600;
  const minutes = seconds / 60;
  if (seconds <= 0) c.errors.push("arrival time must be later than departure time");

  if (hours > limits.maxDurationHours) {
    c.warnings.push(`very long flight: ${hours.toFixed(1)} h`);
  } else if (minutes < limits.minDurationMinutes) {
    c.warnings.push(`very short flight: ${minutes.toFixed(1)} min`);
  }
  if (seconds > 0) c.patch.duration_min = Math.floor(minutes);
  return c;
}

function checkPoint(p: GeoPoint, label: "departure" | "arrival", c: Check) {
  let ok = true;
  if (!isValidLon(p.lon)) {
    c.errors.push(`invalid ${label} longitude: ${p.lon}`);
    ok = false;
  }
  if (!isValidLat(p.lat)) {
    c.errors.push(`invalid ${label} latitude: ${p.lat}`);
    ok = false;
  }
  // Вторая, независимая от парсера проверка на территорию
  if (ok && !inTerritory(p)) c.warnings.push(`${label} coordinates may be outside the territory`);
}

function checkCoordinates(dep: GeoPoint | undefined, arr: GeoPoint | undefined): Check {
  const c = check();
  if (dep) {
    checkPoint(dep, "departure", c);
    c.patch.dep = dep;
  } else {
    c.errors.push("missing departure coordinates");
  }
  if (arr) {
    checkPoint(arr, "arrival", c);
    c.patch.arr = arr;
  }
  return c;
}

function checkAltitude(altitude: number, limits: ValidationLimits): Check {
  const c = check();
  if (altitude < limits.minAltitudeM) c.warnings.push(`negative altitude: ${altitude} m`);
  else if (altitude > limits.maxAltitudeM) c.warnings.push(`altitude above ceiling: ${altitude} m`);
  c.patch.altitude_m = altitude;
  return c;
}

function checkDistance(rec: ParsedRecord, dep: GeoPoint, arr: GeoPoint, limits: ValidationLimits): Check {
  const c = check();
  const distanceKm = planarDistanceKm(dep, arr);
  c.patch.distance_km = round2(distanceKm);

  if (rec.dep_time && rec.arr_time) {
    const hours = (rec.arr_time.getTime() - rec.dep_time.getTime()) / 3_600_000;
    if (hours > 0) {
      const speed = distanceKm / hours;
      if (speed > limits.maxSpeedKmh) c.warnings.push(`implausible average speed: ${speed.toFixed(1)} km/h`);
      c.patch.avg_speed_kmh = round2(speed);
    }
  }
  return c;
}

/**
 * Semantic checks and normalization of one record. Pure: the caller decides
 * whether to apply `patch` (only when `is_valid`).
 */
export function validateRecord(rec: ParsedRecord, opts: ValidateOptions = {}): ValidationOutcome {
  const now = opts.now ?? new Date();
  const limits = opts.limits ?? DEFAULT_LIMITS;

  try {
    const checks: Check[] = [
      checkFlightId(rec.flight_id),
      checkAircraftType(rec.aircraft_type),
      checkTimes(rec.dep_time, rec.arr_time, now, limits),
      checkCoordinates(rec.dep, rec.arr),
    ];
    if (rec.altitude_m !== undefined) checks.push(checkAltitude(rec.altitude_m, limits));
    if (rec.dep && rec.arr) checks.push(checkDistance(rec, rec.dep, rec.arr, limits));

    const errors = checks.flatMap((c) => c.errors);
    return {
      is_valid: errors.length === 0,
      errors,
      warnings: checks.flatMap((c) => c.warnings),
      // слоты патча у проверок не пересекаются
      patch: checks.reduce<RecordPatch>((acc, c) => ({ ...acc, ...c.patch }), {}),
    };
  } catch (e: unknown) {
    const message = e instanceof Error ? e.message : String(e);
    return { is_valid: false, errors: [`critical validation error: ${message}`], warnings: [], patch: {} };
  }
}
