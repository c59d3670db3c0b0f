import { applyPatch, type ParsedRecord } from "../models/flight.js";
import { CONFIG, type Config } from "../config.js";
import { logger as rootLogger, type Logger } from "../logger.js";
import { dedupeRecords } from "../lib/dedupe.js";
import { parseMessage } from "./parser.js";
import { validateRecord, DEFAULT_LIMITS, type ValidationLimits } from "./validator.js";

export interface BatchStatistics {
  original_count: number;
  /** lines actually handled; lower than original_count only after a timeout */
  processed_count: number;
  valid_count: number;
  invalid_count: number;
  /** records with at least one warning */
  warning_count: number;
  /** records with at least one advisory parse error */
  parse_error_count: number;
  duplicates_removed: number;
  accepted_count: number;
  validation_errors: string[];
  processing_warnings: string[];
  timed_out: boolean;
}

export interface BatchResult {
  accepted: ParsedRecord[];
  stats: BatchStatistics;
  duplicate_groups: string[][];
}

export interface BatchOptions {
  now?: Date;
  limits?: ValidationLimits;
  /** epoch ms; once passed, remaining lines are left unprocessed */
  deadline?: number;
  clock?: () => number;
  logger?: Logger;
}

export function limitsFromConfig(cfg: Config = CONFIG): ValidationLimits {
  return {
    ...DEFAULT_LIMITS,
    maxDurationHours: cfg.MAX_FLIGHT_DURATION_HOURS,
    minDurationMinutes: cfg.MIN_FLIGHT_DURATION_MINUTES,
    maxAltitudeM: cfg.MAX_ALTITUDE_M,
    maxSpeedKmh: cfg.MAX_SPEED_KMH,
  };
}

/**
 * parse → validate → dedupe over one batch. No side effects beyond the
 * returned values; persistence and geocoding belong to the caller.
 */
export function processBatch(lines: readonly string[], opts: BatchOptions = {}): BatchResult {
  const now = opts.now ?? new Date();
  const limits = opts.limits ?? limitsFromConfig();
  const clock = opts.clock ?? Date.now;
  const log = (opts.logger ?? rootLogger).child({ component: "batch" });

  const stats: BatchStatistics = {
    original_count: lines.length,
    processed_count: 0,
    valid_count: 0,
    invalid_count: 0,
    warning_count: 0,
    parse_error_count: 0,
    duplicates_removed: 0,
    accepted_count: 0,
    validation_errors: [],
    processing_warnings: [],
    timed_out: false,
  };

  // Порядок входа сохраняется: дедупликации нужен стабильный «первый побеждает»
  const valid: ParsedRecord[] = [];
  for (const line of lines) {
    if (opts.deadline !== undefined && clock() > opts.deadline) {
      stats.timed_out = true;
      log.warn({ processed: stats.processed_count, total: lines.length }, "batch_deadline_exceeded");
      break;
    }
    stats.processed_count++;

    const rec = parseMessage(line, { now });
    if (rec.parse_errors.length) stats.parse_error_count++;

    const outcome = validateRecord(rec, { now, limits });
    if (outcome.is_valid) {
      stats.valid_count++;
      valid.push(applyPatch(rec, outcome.patch));
    } else {
      stats.invalid_count++;
      stats.validation_errors.push(...outcome.errors);
    }
    if (outcome.warnings.length) {
      stats.warning_count++;
      stats.processing_warnings.push(...outcome.warnings);
    }
  }

  const dedup = dedupeRecords(valid);
  stats.duplicates_removed = dedup.removed_count;
  stats.accepted_count = stats.valid_count - dedup.removed_count;

  log.info(
    {
      original: stats.original_count,
      valid: stats.valid_count,
      invalid: stats.invalid_count,
      duplicates: stats.duplicates_removed,
      accepted: stats.accepted_count,
    },
    "batch_processed"
  );

  return { accepted: dedup.unique, stats, duplicate_groups: dedup.duplicate_groups };
}
