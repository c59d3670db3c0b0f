// Дедупликация в пределах одного батча по каноническому отпечатку записи

import { createHash } from "node:crypto";
import type { ParsedRecord } from "../models/flight.js";

export interface DedupResult<T extends ParsedRecord = ParsedRecord> {
  /** first record of each fingerprint, in order of first occurrence */
  unique: T[];
  removed_count: number;
  /** identifiers of the dropped records, one group per duplicated fingerprint */
  duplicate_groups: string[][];
}

// Ключ: идентификатор | время вылета | точка вылета (6 знаков) | тип ВС
export function fingerprint(r: ParsedRecord): string {
  const point = r.dep ? `${r.dep.lat.toFixed(6)},${r.dep.lon.toFixed(6)}` : "";
  const parts = [
    r.flight_id || "",
    r.dep_time ? r.dep_time.toISOString() : "",
    point,
    r.aircraft_type || "",
  ];
  return createHash("md5").update(parts.join("|"), "utf8").digest("hex");
}

export function dedupeRecords<T extends ParsedRecord>(records: readonly T[]): DedupResult<T> {
  const groups = new Map<string, T[]>();
  for (const r of records) {
    const k = fingerprint(r);
    const prev = groups.get(k);
    if (!prev) { groups.set(k, [r]); continue; }
    prev.push(r);
  }

  const unique: T[] = [];
  const duplicate_groups: string[][] = [];
  for (const [first, ...rest] of groups.values()) {
    unique.push(first);
    if (rest.length) duplicate_groups.push(rest.map((r) => r.flight_id));
  }

  return { unique, removed_count: records.length - unique.length, duplicate_groups };
}
