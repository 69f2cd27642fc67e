// src/forecast/interfaces/station-feed.interface.ts

/**
 * Live station feed collaborator.
 *
 * Implemented outside this package (e.g. a GBFS client joining
 * station_information with station_status). The engine only ever receives
 * already-resolved records.
 */

export const STATION_FEED = Symbol('STATION_FEED');

export interface StationFeed {
  /** Plain records shaped like RawStationDto */
  fetchStations(): Promise<Record<string, unknown>[]>;
}
