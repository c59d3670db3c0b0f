// scripts/process_file.ts
import fs from "node:fs";
import { CONFIG } from "../src/config.js";
import { logger } from "../src/logger.js";
import { splitMessages } from "../src/lib/input.js";
import { processBatch } from "../src/services/batch.js";
import { ingestFlights } from "../src/services/ingest.js";
import { createFlightSink, createRegionLookup, createSupa } from "../src/db/supa.js";

async function main() {
  const path = process.argv[2];
  if (!path) {
    console.error("Usage: node dist/scripts/process_file.js /path/to/messages.{txt,json,ndjson,csv}");
    process.exit(1);
  }

  const mimeType = path.endsWith(".json") ? "application/json" : path.endsWith(".csv") ? "text/csv" : undefined;
  const lines = splitMessages(fs.readFileSync(path, "utf8"), mimeType);
  if (!lines.length) {
    console.error("No messages in file:", path);
    process.exit(1);
  }

  // Без Supabase: только разбор и статистика
  if (CONFIG.SUPA_ENABLED !== "1") {
    const { stats, duplicate_groups } = processBatch(lines);
    console.log(JSON.stringify({ stats, duplicate_groups }, null, 2));
    return;
  }

  if (!CONFIG.SUPABASE_URL || !CONFIG.SUPABASE_SERVICE_ROLE_KEY) {
    console.error("Need SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY in env");
    process.exit(1);
  }
  const supa = createSupa(CONFIG.SUPABASE_URL, CONFIG.SUPABASE_SERVICE_ROLE_KEY);
  const report = await ingestFlights(lines, {
    sink: createFlightSink(supa, CONFIG.FLIGHTS_TABLE),
    regions: createRegionLookup(supa, CONFIG.REGION_LOOKUP_RPC),
  });
  console.log(JSON.stringify(report, null, 2));
}

main().catch((e: unknown) => {
  logger.error({ err: e }, "process_file_failed");
  process.exit(1);
});
