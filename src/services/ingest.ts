import type { GeoPoint, ParsedRecord, RegionInfo, StoredFlight } from "../models/flight.js";
import { CONFIG } from "../config.js";
import { logger as rootLogger, type Logger } from "../logger.js";
import { processBatch, type BatchStatistics } from "./batch.js";
import type { ValidationLimits } from "./validator.js";

/** Point-in-polygon region service; caching is its own concern. */
export interface SpatialRegionLookup {
  geocode(lon: number, lat: number): Promise<RegionInfo | null>;
}

/** Cross-batch idempotency is the sink's responsibility. */
export interface PersistenceSink {
  save(flight: StoredFlight): Promise<boolean>;
}

export interface LogEntry {
  level: "warn" | "error";
  msg: string;
  ctx: Record<string, unknown>;
}

export interface IngestDeps {
  sink: PersistenceSink;
  regions?: SpatialRegionLookup;
  now?: Date;
  limits?: ValidationLimits;
  /** whole-batch limit; 0 disables it */
  timeoutMs?: number;
  clock?: () => number;
  logger?: Logger;
}

export interface IngestReport {
  ok: true;
  stats: BatchStatistics;
  saved: number;
  save_failed: number;
  geocode_failed: number;
  /** accepted records left unsaved because the deadline passed */
  skipped: number;
  timed_out: boolean;
  duplicate_groups: string[][];
  logs: LogEntry[];
}

const MAX_LOGS = 200; // не раздуваем ответ
const EXPIRED = Symbol("expired");

function errorText(e: unknown) {
  return e instanceof Error ? e.message : String(e);
}

// Вызов коллаборатора не отменить: по истечении бюджета его результат просто не ждём
async function within<T>(work: Promise<T>, budgetMs: number | undefined): Promise<T | typeof EXPIRED> {
  if (budgetMs === undefined) return work;
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<typeof EXPIRED>((resolve) => {
    timer = setTimeout(() => resolve(EXPIRED), Math.max(0, budgetMs));
  });
  try {
    return await Promise.race([work, expired]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Runs one batch through the core and hands every accepted record to the
 * collaborators, one at a time in input order. A failing record is logged and
 * the batch goes on. Collaborator calls are bounded by the deadline; once it
 * passes, the current record and the rest are counted as skipped.
 */
export async function ingestFlights(lines: readonly string[], deps: IngestDeps): Promise<IngestReport> {
  const clock = deps.clock ?? Date.now;
  const log = (deps.logger ?? rootLogger).child({ component: "ingest" });
  const timeoutMs = deps.timeoutMs ?? CONFIG.INGEST_TIMEOUT_MS;
  const deadline = timeoutMs > 0 ? clock() + timeoutMs : undefined;
  const logs: LogEntry[] = [];

  const { accepted, stats, duplicate_groups } = processBatch(lines, {
    now: deps.now,
    limits: deps.limits,
    deadline,
    clock,
    logger: deps.logger,
  });

  let saved = 0, save_failed = 0, geocode_failed = 0, skipped = 0;
  let timed_out = stats.timed_out;

  const geocode = async (rec: ParsedRecord, point: GeoPoint | undefined, which: "dep" | "arr") => {
    if (!point || !deps.regions) return null;
    try {
      return await deps.regions.geocode(point.lon, point.lat);
    } catch (e: unknown) {
      geocode_failed++;
      logs.push({ level: "warn", msg: "geocode_failed", ctx: { flight_id: rec.flight_id, point: which, error: errorText(e) } });
      return null;
    }
  };

  const deliver = async (rec: ParsedRecord) => {
    const flight: StoredFlight = {
      ...rec,
      dep_region: await geocode(rec, rec.dep, "dep"),
      arr_region: await geocode(rec, rec.arr, "arr"),
    };

    try {
      if (await deps.sink.save(flight)) {
        saved++;
      } else {
        save_failed++;
        logs.push({ level: "error", msg: "save_rejected", ctx: { flight_id: rec.flight_id } });
      }
    } catch (e: unknown) {
      // лог об ошибке записи, но не падаем весь батч
      save_failed++;
      logs.push({ level: "error", msg: "save_failed", ctx: { flight_id: rec.flight_id, error: errorText(e) } });
    }
  };

  for (let i = 0; i < accepted.length; i++) {
    const budget = deadline === undefined ? undefined : deadline - clock();
    const outcome = budget !== undefined && budget < 0 ? EXPIRED : await within(deliver(accepted[i]), budget);
    if (outcome === EXPIRED) {
      timed_out = true;
      skipped = accepted.length - i;
      logs.push({ level: "error", msg: "ingest_timeout", ctx: { saved, skipped } });
      break;
    }
  }

  log.info({ saved, save_failed, geocode_failed, skipped, timed_out }, "ingest_finished");
  for (const entry of logs.slice(0, MAX_LOGS)) log[entry.level](entry.ctx, entry.msg);

  return {
    ok: true,
    stats,
    saved,
    save_failed,
    geocode_failed,
    skipped,
    timed_out,
    duplicate_groups,
    logs: logs.slice(0, MAX_LOGS),
  };
}
