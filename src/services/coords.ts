// Разбор координат из текста телеграммы.
// Поддерживаем форматы:
//  1) Десятичные пары:   55.7 37.6, (55.7, 37.6), 55.75;37.61 (широта первой, но см. orientPair)
//  2) Слитные DM:        5542N03736E    (lat: DDMM,   lon: DDDMM)
//  3) Слитные DMS:       554200N0373600E (lat: DDMMSS, lon: DDDMMSS)
// Все функции возвращают только точки в глобальных диапазонах.

import type { GeoPoint } from "../models/flight.js";

/** Approximate bounding box of the served territory; a plausibility filter, not a polygon test. */
export const TERRITORY_BOUNDS = {
  lonMin: 19.0,
  lonMax: 180.0,
  latMin: 41.0,
  latMax: 82.0,
} as const;

/** Kilometres per degree used by the planar distance approximation. */
export const KM_PER_DEGREE = 111;

type Hemisphere = "N" | "S" | "E" | "W";

const DECIMAL_PAIR_RE =
  /(?<![\w.])([+-]?\d{1,3}\.\d{1,6})\s*[,;\s]\s*([+-]?\d{1,3}\.\d{1,6})(?![\d.])/g;

const COMPACT_RE =
  /(?<!\d)(\d{2})(\d{2})(\d{2})?([NS])\s?(\d{3})(\d{2})(\d{2})?([EW])(?![A-Z0-9])/g;

export function isValidLat(lat: number) {
  return Number.isFinite(lat) && lat >= -90 && lat <= 90;
}

export function isValidLon(lon: number) {
  return Number.isFinite(lon) && lon >= -180 && lon <= 180;
}

export function inTerritory(p: { lat: number; lon: number }) {
  return (
    p.lon >= TERRITORY_BOUNDS.lonMin &&
    p.lon <= TERRITORY_BOUNDS.lonMax &&
    p.lat >= TERRITORY_BOUNDS.latMin &&
    p.lat <= TERRITORY_BOUNDS.latMax
  );
}

function applyHemisphere(value: number, hemi: Hemisphere) {
  const sign = hemi === "S" || hemi === "W" ? -1 : 1;
  return sign * value;
}

function dmsToDec(d: number, m: number, s: number, hemi: Hemisphere) {
  if (!Number.isFinite(d) || !Number.isFinite(m) || !Number.isFinite(s)) return NaN;
  if (m < 0 || m >= 60 || s < 0 || s >= 60) return NaN;
  const raw = d + m / 60 + s / 3600;
  return applyHemisphere(raw, hemi);
}

function toHemisphere(letter: string | undefined): Hemisphere | null {
  return letter === "N" || letter === "S" || letter === "E" || letter === "W" ? letter : null;
}

/**
 * Reads a decimal pair as latitude-first. The pair is swapped when it is only
 * valid longitude-first, or when only the swapped reading falls inside
 * {@link TERRITORY_BOUNDS}.
 */
export function orientPair(a: number, b: number): { lat: number; lon: number } | null {
  const latFirst = isValidLat(a) && isValidLon(b) ? { lat: a, lon: b } : null;
  const lonFirst = isValidLon(a) && isValidLat(b) ? { lat: b, lon: a } : null;
  if (latFirst && lonFirst) {
    return !inTerritory(latFirst) && inTerritory(lonFirst) ? lonFirst : latFirst;
  }
  return latFirst ?? lonFirst;
}

/** All valid decimal pairs, in order of appearance. */
export function findDecimalPairs(text: string): GeoPoint[] {
  const out: GeoPoint[] = [];
  for (const m of text.matchAll(DECIMAL_PAIR_RE)) {
    const p = orientPair(parseFloat(m[1]), parseFloat(m[2]));
    if (p) out.push({ ...p, src: m[0], precision: "dd" });
  }
  return out;
}

/** All valid compact degree-minute(-second) pairs, in order of appearance. */
export function findCompactPairs(text: string): GeoPoint[] {
  const out: GeoPoint[] = [];
  for (const m of text.matchAll(COMPACT_RE)) {
    const [src, latD, latM, latS, latH, lonD, lonM, lonS, lonH] = m;
    const latHemi = toHemisphere(latH);
    const lonHemi = toHemisphere(lonH);
    if (!latHemi || !lonHemi) continue;
    const lat = dmsToDec(+latD, +latM, latS ? +latS : 0, latHemi);
    const lon = dmsToDec(+lonD, +lonM, lonS ? +lonS : 0, lonHemi);
    if (!isValidLat(lat) || !isValidLon(lon)) continue;
    out.push({ lat, lon, src, precision: latS || lonS ? "dms" : "dm" });
  }
  return out;
}

/**
 * Planar distance in decimal-degree space scaled by {@link KM_PER_DEGREE}.
 * Not geodesic; good enough for speed plausibility checks.
 */
export function planarDistanceKm(a: GeoPoint, b: GeoPoint) {
  return Math.hypot(b.lon - a.lon, b.lat - a.lat) * KM_PER_DEGREE;
}
