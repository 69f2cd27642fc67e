// src/forecast/utils/geo.util.ts

import { GeoPoint } from '../types/station.types';

const EARTH_RADIUS_M = 6371000;

function toRadians(degrees: number): number {
  return degrees * (Math.PI / 180);
}

/**
 * Great-circle distance in metres (haversine).
 */
export function haversineDistance(point1: GeoPoint, point2: GeoPoint): number {
  const dLat = toRadians(point2.lat - point1.lat);
  const dLon = toRadians(point2.lon - point1.lon);

  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(toRadians(point1.lat)) *
      Math.cos(toRadians(point2.lat)) *
      Math.sin(dLon / 2) *
      Math.sin(dLon / 2);

  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
  return EARTH_RADIUS_M * c;
}
