export * from "./models/flight.js";
export { parseMessage, normalizeText, type ParseOptions } from "./services/parser.js";
export {
  FIELD_EXTRACTORS,
  UAV_TYPE_CODES,
  resolveBareTime,
  resolveCompoundTime,
  type FieldExtractors,
} from "./services/extractors.js";
export { TERRITORY_BOUNDS, inTerritory, orientPair, planarDistanceKm } from "./services/coords.js";
export {
  validateRecord,
  inferAircraftType,
  DEFAULT_LIMITS,
  type ValidationLimits,
  type ValidateOptions,
} from "./services/validator.js";
export { dedupeRecords, fingerprint, type DedupResult } from "./lib/dedupe.js";
export {
  processBatch,
  limitsFromConfig,
  type BatchOptions,
  type BatchResult,
  type BatchStatistics,
} from "./services/batch.js";
export {
  ingestFlights,
  type IngestDeps,
  type IngestReport,
  type LogEntry,
  type PersistenceSink,
  type SpatialRegionLookup,
} from "./services/ingest.js";
export { splitMessages, csvMessages } from "./lib/input.js";
export { createFlightSink, createRegionLookup, createSupa, toFlightRow } from "./db/supa.js";
export { CONFIG, loadConfig, type Config } from "./config.js";
