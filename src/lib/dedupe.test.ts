import { describe, it, expect } from "vitest";
import { emptyRecord, type ParsedRecord } from "../models/flight.js";
import { dedupeRecords, fingerprint } from "./dedupe.js";

const T = new Date("2024-06-15T10:00:00Z");

function rec(flight_id: string, overrides: Partial<ParsedRecord> = {}): ParsedRecord {
  return {
    ...emptyRecord(`FPL-${flight_id}`),
    flight_id,
    aircraft_type: "QUAD",
    dep_time: T,
    dep: { lat: 55.7, lon: 37.6 },
    ...overrides,
  };
}

describe("fingerprint", () => {
  it("ignores raw text, arrival and errors", () => {
    const a = rec("RA1234");
    const b = { ...rec("RA1234", { arr: { lat: 56, lon: 38 }, parse_errors: ["x"] }), raw: "other" };
    expect(fingerprint(a)).toBe(fingerprint(b));
  });

  it("compares the departure point to six decimals", () => {
    expect(fingerprint(rec("RA1", { dep: { lat: 55.7000001, lon: 37.6 } }))).toBe(fingerprint(rec("RA1")));
    expect(fingerprint(rec("RA1", { dep: { lat: 55.700001, lon: 37.6 } }))).not.toBe(fingerprint(rec("RA1")));
  });

  it("differs by time and type", () => {
    expect(fingerprint(rec("RA1", { aircraft_type: "HEXA" }))).not.toBe(fingerprint(rec("RA1")));
    expect(fingerprint(rec("RA1", { dep_time: new Date(T.getTime() + 60_000) }))).not.toBe(fingerprint(rec("RA1")));
  });

  it("is a hex md5 digest", () => {
    expect(fingerprint(rec("RA1"))).toMatch(/^[0-9a-f]{32}$/);
  });
});

describe("dedupeRecords", () => {
  it("keeps the first of each group in input order", () => {
    const first = rec("RA1");
    const input = [first, rec("RB2"), rec("RA1"), rec("RC3"), rec("RA1"), rec("RB2")];
    const out = dedupeRecords(input);

    expect(out.unique.map((r) => r.flight_id)).toEqual(["RA1", "RB2", "RC3"]);
    expect(out.unique[0]).toBe(first);
    expect(out.removed_count).toBe(3);
    expect(out.duplicate_groups).toEqual([["RA1", "RA1"], ["RB2"]]);
  });

  it("returns nothing to remove for distinct records", () => {
    const out = dedupeRecords([rec("RA1"), rec("RB2")]);
    expect(out.removed_count).toBe(0);
    expect(out.duplicate_groups).toEqual([]);
  });

  it("is a no-op on its own output", () => {
    const once = dedupeRecords([rec("RA1"), rec("RB2"), rec("RA1")]);
    const twice = dedupeRecords(once.unique);
    expect(twice.unique).toEqual(once.unique);
    expect(twice.removed_count).toBe(0);
  });

  it("handles an empty batch", () => {
    expect(dedupeRecords([])).toEqual({ unique: [], removed_count: 0, duplicate_groups: [] });
  });
});
