/**
 * Great-circle distance using the Haversine formula
 *
 * Returns meters. Spherical Earth with mean radius 6,371,008.8 m, so results
 * differ from ellipsoidal distances by up to ~0.5%.
 */

import type { Coordinate } from '../../contracts/assistant.contracts.js';

export const EARTH_RADIUS_METERS = 6_371_008.8;

export function toRadians(degrees: number): number {
  return degrees * (Math.PI / 180);
}

export function haversineMeters(from: Coordinate, to: Coordinate): number {
  const dLat = toRadians(to.latitude - from.latitude);
  const dLon = toRadians(to.longitude - from.longitude);

  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(toRadians(from.latitude)) *
    Math.cos(toRadians(to.latitude)) *
    Math.sin(dLon / 2) *
    Math.sin(dLon / 2);

  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
  return EARTH_RADIUS_METERS * c;
}
