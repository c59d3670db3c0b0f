import { pino, type Logger as PinoLogger } from "pino";
import { CONFIG } from "./config.js";

export type Logger = PinoLogger;

export const logger: Logger = pino({
  level: CONFIG.LOG_LEVEL,
  base: { service: "flight-telegram-parser" },
});
