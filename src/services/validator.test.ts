import { describe, it, expect } from "vitest";
import { emptyRecord, type ParsedRecord } from "../models/flight.js";
import { validateRecord, inferAircraftType, DEFAULT_LIMITS } from "./validator.js";

const NOW = new Date("2024-06-15T12:00:00Z");
const T = new Date("2024-06-15T10:00:00Z");
const MIN = 60_000;
const DAY = 24 * 60 * MIN;

function record(overrides: Partial<ParsedRecord> = {}): ParsedRecord {
  return {
    ...emptyRecord("test"),
    flight_id: "RA1234",
    aircraft_type: "QUAD",
    dep_time: T,
    dep: { lat: 55.7, lon: 37.6 },
    ...overrides,
  };
}

describe("validateRecord", () => {
  it("accepts a complete record without findings", () => {
    const out = validateRecord(record(), { now: NOW });
    expect(out).toEqual({
      is_valid: true,
      errors: [],
      warnings: [],
      patch: { flight_id: "RA1234", aircraft_type: "QUAD", dep_time: T, dep: { lat: 55.7, lon: 37.6 } },
    });
  });

  it("does not modify the record", () => {
    const rec = record({ flight_id: " ra12 ", aircraft_type: "DRONE123" });
    validateRecord(rec, { now: NOW });
    expect(rec.flight_id).toBe(" ra12 ");
    expect(rec.aircraft_type).toBe("DRONE123");
  });

  it("concatenates blocking errors in check order", () => {
    const out = validateRecord(emptyRecord("x"), { now: NOW });
    expect(out.is_valid).toBe(false);
    expect(out.errors).toEqual(["missing flight identifier", "missing departure time", "missing departure coordinates"]);
    expect(out.warnings).toEqual(["aircraft type missing, set to UNKN"]);
  });

  describe("identifier", () => {
    it("trims and uppercases", () => {
      expect(validateRecord(record({ flight_id: " ra1 " }), { now: NOW }).patch.flight_id).toBe("RA1");
    });

    it("warns on unusual length and characters", () => {
      expect(validateRecord(record({ flight_id: "AB" }), { now: NOW }).warnings).toEqual([
        "non-standard flight identifier length: 2",
      ]);
      expect(validateRecord(record({ flight_id: "RA_12" }), { now: NOW }).warnings).toEqual([
        "flight identifier contains invalid characters",
      ]);
      expect(validateRecord(record({ flight_id: "RA-12" }), { now: NOW }).warnings).toEqual([]);
    });
  });

  describe("aircraft type", () => {
    it("remaps an unknown type with warnings", () => {
      const out = validateRecord(record({ aircraft_type: "DRONE123" }), { now: NOW });
      expect(out.is_valid).toBe(true);
      expect(out.patch.aircraft_type).toBe("UNKN");
      expect(out.warnings).toEqual(["unknown aircraft type: DRONE123", "aircraft type inferred as: UNKN"]);
    });

    it("infers by substring", () => {
      expect(inferAircraftType("MULTIROTOR")).toBe("QUAD");
      expect(inferAircraftType("QUADRO")).toBe("QUAD");
      expect(inferAircraftType("HELICOPTER")).toBe("HELI");
      expect(inferAircraftType("FIXEDWING")).toBe("FIXW");
      expect(inferAircraftType("DRONE123")).toBe("UNKN");
    });

    it("normalizes a known type written loosely", () => {
      const out = validateRecord(record({ aircraft_type: " hexa " }), { now: NOW });
      expect(out.patch.aircraft_type).toBe("HEXA");
      expect(out.warnings).toEqual([]);
    });
  });

  describe("times", () => {
    it("blocks an arrival before departure", () => {
      const out = validateRecord(record({ arr_time: new Date(T.getTime() - MIN) }), { now: NOW });
      expect(out.is_valid).toBe(false);
      expect(out.errors).toEqual(["arrival time must be later than departure time"]);
      expect(out.warnings).toEqual(["very short flight: -1.0 min"]);
      expect(out.patch.duration_min).toBeUndefined();
    });

    it("blocks an arrival equal to departure", () => {
      const out = validateRecord(record({ arr_time: T }), { now: NOW });
      expect(out.is_valid).toBe(false);
      expect(out.warnings).toEqual(["very short flight: 0.0 min"]);
    });

    it("derives duration in whole minutes", () => {
      const out = validateRecord(record({ arr_time: new Date(T.getTime() + 45 * MIN + 59_000) }), { now: NOW });
      expect(out.patch.duration_min).toBe(45);
      expect(out.warnings).toEqual([]);
    });

    it("warns on very short and very long flights", () => {
      const short = validateRecord(record({ arr_time: new Date(T.getTime() + 30_000) }), { now: NOW });
      expect(short.warnings).toEqual(["very short flight: 0.5 min"]);
      expect(short.patch.duration_min).toBe(0);

      const long = validateRecord(record({ arr_time: new Date(T.getTime() + 25 * 60 * MIN) }), { now: NOW });
      expect(long.is_valid).toBe(true);
      expect(long.warnings).toEqual(["very long flight: 25.0 h"]);
    });

    it("honours configured duration limits", () => {
      const limits = { ...DEFAULT_LIMITS, maxDurationHours: 2 };
      const out = validateRecord(record({ arr_time: new Date(T.getTime() + 3 * 60 * MIN) }), { now: NOW, limits });
      expect(out.warnings).toEqual(["very long flight: 3.0 h"]);
    });

    it("warns on departures far in the past or future", () => {
      const past = validateRecord(record({ dep_time: new Date(NOW.getTime() - 400 * DAY) }), { now: NOW });
      expect(past.warnings).toEqual(["departure time is more than 365 days in the past"]);
      const future = validateRecord(record({ dep_time: new Date(NOW.getTime() + 40 * DAY) }), { now: NOW });
      expect(future.warnings).toEqual(["departure time is more than 30 days in the future"]);
    });
  });

  describe("coordinates", () => {
    it("accepts a point outside the territory with a warning", () => {
      const out = validateRecord(record({ dep: { lat: 50, lon: 10 } }), { now: NOW });
      expect(out.is_valid).toBe(true);
      expect(out.warnings.some((w) => w.includes("territory"))).toBe(true);
      expect(out.warnings).toEqual(["departure coordinates may be outside the territory"]);
    });

    it("blocks a point outside global ranges", () => {
      const out = validateRecord(record({ dep: { lat: 95, lon: 37.6 } }), { now: NOW });
      expect(out.is_valid).toBe(false);
      expect(out.errors).toEqual(["invalid departure latitude: 95"]);
      expect(out.warnings).toEqual([]);
    });

    it("checks the arrival point independently", () => {
      const out = validateRecord(
        record({ arr: { lat: 55.7, lon: 200 }, arr_time: new Date(T.getTime() + 10 * MIN) }),
        { now: NOW }
      );
      expect(out.errors).toEqual(["invalid arrival longitude: 200"]);
    });
  });

  describe("altitude", () => {
    it("warns but never blocks", () => {
      const high = validateRecord(record({ altitude_m: 12000 }), { now: NOW });
      expect(high.is_valid).toBe(true);
      expect(high.warnings).toEqual(["altitude above ceiling: 12000 m"]);
      expect(high.patch.altitude_m).toBe(12000);

      const low = validateRecord(record({ altitude_m: -50 }), { now: NOW });
      expect(low.warnings).toEqual(["negative altitude: -50 m"]);
    });
  });

  describe("distance and speed", () => {
    const arrived = {
      arr: { lat: 55.7, lon: 38.6 },
      arr_time: new Date(T.getTime() + 10 * MIN),
    };

    it("flags an implausible average speed", () => {
      const out = validateRecord(record(arrived), { now: NOW });
      expect(out.is_valid).toBe(true);
      expect(out.patch.distance_km).toBe(111);
      expect(out.patch.avg_speed_kmh).toBe(666);
      expect(out.patch.duration_min).toBe(10);
      expect(out.warnings).toEqual(["implausible average speed: 666.0 km/h"]);
    });

    it("uses the configured speed ceiling", () => {
      const out = validateRecord(record(arrived), { now: NOW, limits: { ...DEFAULT_LIMITS, maxSpeedKmh: 1000 } });
      expect(out.warnings).toEqual([]);
    });

    it("skips speed without an arrival time", () => {
      const out = validateRecord(record({ arr: arrived.arr }), { now: NOW });
      expect(out.patch.distance_km).toBe(111);
      expect(out.patch.avg_speed_kmh).toBeUndefined();
    });
  });
});
