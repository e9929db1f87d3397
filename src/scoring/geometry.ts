/**
 * Fleetplan — Tracking Geometry
 *
 * Earth-centred coordinates, line-of-sight vectors and the dilution of
 * precision of a group of units observing one target.
 *
 *   gdop = (meanRange / referenceRange) / sqrt( Σ_{i<j} sin²θ_ij )
 *
 * θ_ij is the angle between the lines of sight of units i and j. Wide
 * intersection angles add information; a lone unit or collinear geometry
 * gives no triangulation and takes MAX_GDOP.
 */

import type { GeoPosition } from '../types/index.js';

export const EARTH_RADIUS_KM = 6371;
export const MAX_GDOP = 99;

const DEG_TO_RAD = Math.PI / 180;
const MIN_INFORMATION = 1e-12;

type Vec3 = readonly [number, number, number];

export function toCartesian(pos: GeoPosition): Vec3 {
  const r = EARTH_RADIUS_KM + pos.alt;
  const lat = pos.lat * DEG_TO_RAD;
  const lon = pos.lon * DEG_TO_RAD;
  return [
    r * Math.cos(lat) * Math.cos(lon),
    r * Math.cos(lat) * Math.sin(lon),
    r * Math.sin(lat),
  ];
}

function sub(a: Vec3, b: Vec3): Vec3 {
  return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
}

function norm(v: Vec3): number {
  return Math.sqrt(v[0] * v[0] + v[1] * v[1] + v[2] * v[2]);
}

function crossNormSquared(a: Vec3, b: Vec3): number {
  const x = a[1] * b[2] - a[2] * b[1];
  const y = a[2] * b[0] - a[0] * b[2];
  const z = a[0] * b[1] - a[1] * b[0];
  return x * x + y * y + z * z;
}

/**
 * Haversine ground distance combined with the altitude difference, in km.
 */
export function slantDistanceKm(a: GeoPosition, b: GeoPosition): number {
  const dLat = (b.lat - a.lat) * DEG_TO_RAD;
  const dLon = (b.lon - a.lon) * DEG_TO_RAD;
  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(a.lat * DEG_TO_RAD) * Math.cos(b.lat * DEG_TO_RAD) * Math.sin(dLon / 2) ** 2;
  const ground = 2 * EARTH_RADIUS_KM * Math.asin(Math.min(1, Math.sqrt(h)));
  const climb = b.alt - a.alt;
  return Math.sqrt(ground * ground + climb * climb);
}

/**
 * Dilution of precision for observers (in a fixed order) watching a target.
 */
export function groupGdop(
  target: GeoPosition,
  observers: ReadonlyArray<GeoPosition>,
  referenceRangeKm: number,
): number {
  if (observers.length < 2) return MAX_GDOP;

  const origin = toCartesian(target);
  const lines: Vec3[] = [];
  let rangeSum = 0;

  for (const observer of observers) {
    const offset = sub(toCartesian(observer), origin);
    const range = norm(offset);
    rangeSum += range;
    if (range > 0) {
      lines.push([offset[0] / range, offset[1] / range, offset[2] / range]);
    }
  }

  let information = 0;
  for (let i = 0; i < lines.length; i++) {
    for (let j = i + 1; j < lines.length; j++) {
      information += crossNormSquared(lines[i], lines[j]);
    }
  }
  if (information < MIN_INFORMATION) return MAX_GDOP;

  const rangeFactor = rangeSum / observers.length / referenceRangeKm;
  return Math.min(MAX_GDOP, rangeFactor / Math.sqrt(information));
}
