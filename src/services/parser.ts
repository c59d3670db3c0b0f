import { emptyRecord, type ParsedRecord } from "../models/flight.js";
import { logger } from "../logger.js";
import { inTerritory } from "./coords.js";
import { FIELD_EXTRACTORS, type FieldExtractors } from "./extractors.js";

export interface ParseOptions {
  /** reference clock for date resolution; defaults to the system clock */
  now?: Date;
  extractors?: FieldExtractors;
}

const log = logger.child({ component: "parser" });

export function normalizeText(raw: string) {
  return raw.replace(/\s+/g, " ").trim().toUpperCase();
}

// Замечания уровня записи: не блокируют, валидатор перепроверяет независимо
function recordChecks(rec: ParsedRecord) {
  if (!rec.flight_id) rec.parse_errors.push("flight identifier not found");
  if (!rec.dep_time && !rec.dep) {
    rec.parse_errors.push("departure data not found (time or coordinates)");
  }
  if (rec.dep && !inTerritory(rec.dep)) {
    rec.parse_errors.push(`departure coordinates outside territorial bounds: ${rec.dep.lat}, ${rec.dep.lon}`);
  }
  if (rec.arr && !inTerritory(rec.arr)) {
    rec.parse_errors.push(`arrival coordinates outside territorial bounds: ${rec.arr.lat}, ${rec.arr.lon}`);
  }
}

/**
 * Turns one raw telegram line into a candidate record. Never throws: fields
 * that do not match stay unset, and an unexpected fault yields an `UNKNOWN`
 * record carrying a single critical parse error.
 */
export function parseMessage(raw: string, opts: ParseOptions = {}): ParsedRecord {
  const now = opts.now ?? new Date();
  const ex = opts.extractors ?? FIELD_EXTRACTORS;

  try {
    const text = normalizeText(raw);
    const rec = emptyRecord(raw);

    rec.message_type = ex.messageType(text);
    rec.flight_id = ex.flightId(text);
    rec.aircraft_type = ex.aircraftType(text);
    rec.registration = ex.registration(text);

    const times = ex.times(text, now);
    rec.dep_time = times.departure;
    rec.arr_time = times.arrival;

    const points = ex.coordinates(text);
    rec.dep = points.departure;
    rec.arr = points.arrival;

    const aerodromes = ex.aerodromes(text);
    rec.dep_aerodrome = aerodromes.departure;
    rec.arr_aerodrome = aerodromes.arrival;

    rec.altitude_m = ex.altitude(text);
    rec.route = ex.route(text);
    rec.operator = ex.operator(text);
    rec.remarks = ex.remarks(text);

    recordChecks(rec);
    return rec;
  } catch (e: unknown) {
    const message = e instanceof Error ? e.message : String(e);
    log.error({ err: message, snippet: String(raw).slice(0, 200) }, "critical_parse_failure");
    const failed = emptyRecord(String(raw));
    failed.flight_id = "UNKNOWN";
    failed.parse_errors.push(`critical parse error: ${message}`);
    return failed;
  }
}
