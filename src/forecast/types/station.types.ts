// src/forecast/types/station.types.ts

/**
 * Live station types
 */

export interface GeoPoint {
  lat: number;
  lon: number;
}

export interface StationSnapshot {
  readonly stationId: string;
  readonly name: string;
  readonly address?: string;
  readonly lat: number;
  readonly lon: number;
  readonly capacity: number;
  readonly classicBikes: number;
  readonly ebikes: number;
  readonly docks: number;
  readonly isCharging?: boolean;
  readonly inService: boolean;
}

export interface NearbyStation extends StationSnapshot {
  /** Metres from the context's reference point */
  distanceM: number;
}

/**
 * Stations around a reference point, nearest first.
 * predictionSet is always a prefix of displaySet.
 */
export interface LocationContext {
  reference: GeoPoint;
  stations: NearbyStation[];
  displaySet: NearbyStation[];
  predictionSet: NearbyStation[];
}

export function totalBikes(station: StationSnapshot): number {
  return station.classicBikes + station.ebikes;
}
