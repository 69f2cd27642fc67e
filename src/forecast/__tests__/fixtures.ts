// src/forecast/__tests__/fixtures.ts

import { DateTime } from 'luxon';
import { DEFAULT_PREDICTION_CONFIG, PredictionConfig } from '../config/prediction.config';
import { ProfileLookup } from '../engine/profile-lookup';
import { FlowProfile, ProfileArtifact, StationProfile } from '../types/flow-profile.types';
import { LocationContext, NearbyStation, StationSnapshot } from '../types/station.types';

export const TEST_ZONE = 'America/Toronto';

/** Friday 2024-06-07 (day 4) at the given local time */
export function fridayAt(hour: number, minute = 0): DateTime {
  return DateTime.fromObject({ year: 2024, month: 6, day: 7, hour, minute }, { zone: TEST_ZONE });
}

export function testConfig(overrides: Partial<PredictionConfig> = {}): PredictionConfig {
  return {
    ...DEFAULT_PREDICTION_CONFIG,
    classification: { ...DEFAULT_PREDICTION_CONFIG.classification },
    warnings: { ...DEFAULT_PREDICTION_CONFIG.warnings },
    trip: { ...DEFAULT_PREDICTION_CONFIG.trip },
    ...overrides,
  };
}

export function makeStation(stationId: string, overrides: Partial<StationSnapshot> = {}): StationSnapshot {
  return {
    stationId,
    name: `Station ${stationId}`,
    lat: 43.6375,
    lon: -79.403,
    capacity: 20,
    classicBikes: 10,
    ebikes: 0,
    docks: 10,
    inService: true,
    ...overrides,
  };
}

export function nearby(station: StationSnapshot, distanceM = 100): NearbyStation {
  return { ...station, distanceM };
}

export function contextOf(stations: StationSnapshot[]): LocationContext {
  const sorted = stations.map((station, index) => nearby(station, (index + 1) * 100));
  return {
    reference: { lat: 43.6375, lon: -79.403 },
    stations: sorted,
    displaySet: sorted.slice(0, 5),
    predictionSet: sorted.slice(0, 2),
  };
}

export function slot(netFlow: number): FlowProfile {
  return {
    arrivalsPerWeek: netFlow > 0 ? netFlow : 0,
    departuresPerWeek: netFlow < 0 ? -netFlow : 0,
    netFlow,
  };
}

export function makeArtifact(stations: Record<string, Partial<StationProfile>>): ProfileArtifact {
  const profiles: Record<string, StationProfile> = {};
  for (const [stationId, profile] of Object.entries(stations)) {
    profiles[stationId] = { flows: {}, depletion: {}, fill: {}, ...profile };
  }

  return {
    metadata: {
      generatedAt: '2024-10-01T00:00:00.000-04:00',
      dataSource: 'test ridership',
      timezone: TEST_ZONE,
      weeksOfData: 39,
      totalStations: Object.keys(profiles).length,
      windowStart: '2024-01-01T00:00:00.000-05:00',
      windowEnd: '2024-09-30T23:00:00.000-04:00',
      discards: {
        total: 0,
        accepted: 0,
        discarded: 0,
        byReason: { MISSING_STATION: 0, MISSING_START_TIME: 0, INVALID_START_TIME: 0, INVALID_END_TIME: 0 },
      },
    },
    stations: profiles,
  };
}

export function lookupOf(stations: Record<string, Partial<StationProfile>>): ProfileLookup {
  return new ProfileLookup(makeArtifact(stations));
}
