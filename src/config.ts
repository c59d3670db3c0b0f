import "dotenv/config";
import { z } from "zod";

// пустые значения из .env считаем незаданными
const blank = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

const EnvSchema = z.object({
  LOG_LEVEL: z.preprocess(
    blank,
    z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info")
  ),

  // Лимиты валидации полётов
  MAX_FLIGHT_DURATION_HOURS: z.preprocess(blank, z.coerce.number().positive().default(24)),
  MIN_FLIGHT_DURATION_MINUTES: z.preprocess(blank, z.coerce.number().nonnegative().default(1)),
  MAX_ALTITUDE_M: z.preprocess(blank, z.coerce.number().positive().default(10000)),
  MAX_SPEED_KMH: z.preprocess(blank, z.coerce.number().positive().default(500)),

  // Общий лимит на обработку одного батча; 0 отключает
  INGEST_TIMEOUT_MS: z.preprocess(blank, z.coerce.number().int().nonnegative().default(300_000)),

  SUPA_ENABLED: z.preprocess(blank, z.enum(["0", "1"]).default("0")),
  SUPABASE_URL: z.preprocess(blank, z.string().url().optional()),
  SUPABASE_SERVICE_ROLE_KEY: z.preprocess(blank, z.string().optional()),
  FLIGHTS_TABLE: z.preprocess(blank, z.string().default("flights")),
  REGION_LOOKUP_RPC: z.preprocess(blank, z.string().default("region_by_point")),
});

export type Config = z.infer<typeof EnvSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }
  return parsed.data;
}

export const CONFIG = loadConfig();
