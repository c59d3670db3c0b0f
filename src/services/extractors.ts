import { MESSAGE_TYPES, type GeoPoint, type MessageType } from "../models/flight.js";
import { findCompactPairs, findDecimalPairs } from "./coords.js";

/** Aircraft type codes accepted without remapping. */
export const UAV_TYPE_CODES: ReadonlySet<string> = new Set([
  "QUAD", "HEXA", "OCTO", // мультикоптеры
  "FIXW", "HELI", "GYRO", // самолёты, вертолёты, автожиры
  "BALL", "GLID", "PARA", // аэростаты, планеры, парапланы
  "UNKN",
]);

export interface TimePair {
  departure?: Date;
  arrival?: Date;
}

export interface PointPair {
  departure?: GeoPoint;
  arrival?: GeoPoint;
}

export interface AerodromePair {
  departure?: string;
  arrival?: string;
}

/**
 * Independent pattern rules over a normalized (collapsed, uppercased) telegram.
 * A rule that finds nothing returns `undefined`, never throws on its own input.
 */
export interface FieldExtractors {
  messageType(text: string): MessageType;
  flightId(text: string): string;
  aircraftType(text: string): string | undefined;
  registration(text: string): string | undefined;
  times(text: string, now: Date): TimePair;
  coordinates(text: string): PointPair;
  aerodromes(text: string): AerodromePair;
  altitude(text: string): number | undefined;
  route(text: string): string | undefined;
  operator(text: string): string | undefined;
  remarks(text: string): string | undefined;
}

const MESSAGE_TYPE_RE = new RegExp(`^\\(?(${MESSAGE_TYPES.join("|")})`);
const FLIGHT_ID_RE = /-([A-Z0-9]{1,7})/;
const TYPE_RE = /-([A-Z][A-Z0-9]{1,3})(?![A-Z0-9/])/;
const REG_RE = /-([A-Z]{1,2}[A-Z0-9]{1,5})(?![A-Z0-9/])/;
const TYPE_TAG_RE = /(?:^|[-\s(])TYP\/([A-Z0-9]+)/;
const REG_TAG_RE = /(?:^|[-\s(])REG\/([A-Z0-9]+)/;
const AERODROME_RE = /-([A-Z]{4})(?:\d{4})?(?=[-\s)]|$)/g;
// FL первым: на одной позиции "FL350" иначе не разобрать; между разными позициями побеждает первая
const ALTITUDE_RE = /(?<![A-Z0-9])(?:FL|F|A)(\d{3})(?!\d)/;
const ROUTE_RE = /-N([^-]*)/;

// Разделители полей при разбиении на токены для поиска времени
const TOKEN_SPLIT_RE = /[\s\-()/,;]+/;
// Значение за меткой поля 18 (DOF/230615, REG/...) временем не считаем
const TAG_VALUE_RE = /(?<![A-Z0-9])[A-Z]{3,4}\/\S*/g;
const COMPOUND_TIME_RE = /^(\d{2})(\d{2})(\d{2})(\d{2})\d{2}$/; // DDHHMMSS + 2 неиспользуемые цифры
const BARE_TIME_RE = /^(?:[A-Z]{4})?(\d{2})(\d{2})(\d{2})?$/;   // HHMM | HHMMSS, можно слитно с кодом аэродрома

const DAY_MS = 24 * 60 * 60 * 1000;

function tagged(tag: string) {
  return new RegExp(`(?:^|[-\\s(])${tag}\\/(.+?)(?=\\s[A-Z]{2,4}\\/|[-)]|$)`);
}
const OPERATOR_RE = tagged("OPR");
const REMARKS_RE = tagged("RMK");

function firstGroup(text: string, re: RegExp): string | undefined {
  const m = re.exec(text);
  return m ? m[1] : undefined;
}

function freeText(text: string, re: RegExp): string | undefined {
  const value = firstGroup(text, re)?.trim();
  return value ? value : undefined;
}

function daysInMonth(year: number, month: number) {
  return new Date(Date.UTC(year, month + 1, 0)).getUTCDate();
}

function validClock(h: number, m: number, s: number) {
  return h < 24 && m < 60 && s < 60;
}

/**
 * DDHHMMSS against the reference month; a day the month does not have rolls
 * back one month (January → December of the previous year).
 */
export function resolveCompoundTime(token: string, now: Date): Date | undefined {
  const m = COMPOUND_TIME_RE.exec(token);
  if (!m) return undefined;
  const [day, h, min, s] = [+m[1], +m[2], +m[3], +m[4]];
  if (!validClock(h, min, s) || day < 1) return undefined;

  let year = now.getUTCFullYear();
  let month = now.getUTCMonth();
  if (day > daysInMonth(year, month)) {
    if (month === 0) {
      year -= 1;
      month = 11;
    } else {
      month -= 1;
    }
    if (day > daysInMonth(year, month)) return undefined;
  }
  return new Date(Date.UTC(year, month, day, h, min, s));
}

/** HHMM or HHMMSS on the reference date; a result after `now` moves back one day. */
export function resolveBareTime(token: string, now: Date): Date | undefined {
  const m = BARE_TIME_RE.exec(token);
  if (!m) return undefined;
  const [h, min, s] = [+m[1], +m[2], m[3] ? +m[3] : 0];
  if (!validClock(h, min, s)) return undefined;

  const t = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate(), h, min, s));
  return t.getTime() > now.getTime() ? new Date(t.getTime() - DAY_MS) : t;
}

function pickTimes(tokens: string[], resolve: (t: string, now: Date) => Date | undefined, now: Date) {
  const found: Date[] = [];
  for (const token of tokens) {
    const d = resolve(token, now);
    if (d) found.push(d);
    if (found.length === 2) break;
  }
  return found;
}

export const FIELD_EXTRACTORS: FieldExtractors = Object.freeze({
  messageType(text: string): MessageType {
    const code = firstGroup(text, MESSAGE_TYPE_RE);
    return MESSAGE_TYPES.find((t) => t === code) ?? "FPL";
  },

  flightId(text: string): string {
    return firstGroup(text, FLIGHT_ID_RE) ?? "";
  },

  aircraftType(text: string) {
    return firstGroup(text, TYPE_TAG_RE) ?? firstGroup(text, TYPE_RE);
  },

  registration(text: string) {
    return firstGroup(text, REG_TAG_RE) ?? firstGroup(text, REG_RE);
  },

  times(text: string, now: Date): TimePair {
    const tokens = text.replace(TAG_VALUE_RE, " ").split(TOKEN_SPLIT_RE).filter(Boolean);
    // Составной токен с датой приоритетнее голого HHMM
    let found = pickTimes(tokens, resolveCompoundTime, now);
    if (!found.length) found = pickTimes(tokens, resolveBareTime, now);
    return { departure: found[0], arrival: found[1] };
  },

  coordinates(text: string): PointPair {
    const decimal = findDecimalPairs(text);
    const compact = findCompactPairs(text);
    return {
      departure: decimal[0] ?? compact[0],
      arrival: decimal[1] ?? compact[1],
    };
  },

  aerodromes(text: string): AerodromePair {
    const codes: string[] = [];
    for (const m of text.matchAll(AERODROME_RE)) {
      if (UAV_TYPE_CODES.has(m[1])) continue;
      codes.push(m[1]);
      if (codes.length === 2) break;
    }
    return { departure: codes[0], arrival: codes[1] };
  },

  altitude(text: string) {
    const level = firstGroup(text, ALTITUDE_RE);
    return level === undefined ? undefined : Number(level) * 100;
  },

  route(text: string) {
    return freeText(text, ROUTE_RE);
  },

  operator(text: string) {
    return freeText(text, OPERATOR_RE);
  },

  remarks(text: string) {
    return freeText(text, REMARKS_RE);
  },
});
