// src/forecast/services/commute-planner.service.spec.ts

import { BadRequestException, ServiceUnavailableException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { DateTime } from 'luxon';
import { fridayAt, lookupOf, makeStation, testConfig } from '../__tests__/fixtures';
import { PREDICTION_CONFIG } from '../config/prediction.config';
import { AvailabilityClassifier } from '../engine/availability-classifier';
import { ProfileLookup } from '../engine/profile-lookup';
import { TripConfidenceEngine } from '../engine/trip-confidence-engine';
import { WarningGenerator } from '../engine/warning-generator';
import { STATION_FEED } from '../interfaces/station-feed.interface';
import { CommuteLocations } from '../types/forecast.types';
import { CommutePlannerService } from './commute-planner.service';
import { ForecastService } from './forecast.service';
import { LocationContextService } from './location-context.service';

const HOME = { lat: 43.6375, lon: -79.403 };
const WORK = { lat: 43.6458, lon: -79.3854 };
const LOCATIONS: CommuteLocations = { home: HOME, work: WORK };

const STATIONS = [
  makeStation('H1', { lat: 43.6376, lon: -79.403, classicBikes: 12, docks: 8 }),
  makeStation('H2', { lat: 43.6378, lon: -79.4031, classicBikes: 10, docks: 10 }),
  makeStation('W1', { lat: 43.6459, lon: -79.3854, classicBikes: 18, docks: 2 }),
  makeStation('W2', { lat: 43.646, lon: -79.3856, classicBikes: 18, docks: 2 }),
  makeStation('X1', { lat: 43.7, lon: -79.5, inService: false }),
];

async function createPlanner(extraProviders: Array<{ provide: symbol; useValue: unknown }> = []) {
  const module: TestingModule = await Test.createTestingModule({
    providers: [
      CommutePlannerService,
      LocationContextService,
      ForecastService,
      AvailabilityClassifier,
      WarningGenerator,
      TripConfidenceEngine,
      { provide: PREDICTION_CONFIG, useValue: testConfig() },
      ...extraProviders,
    ],
  }).compile();

  return module.get<CommutePlannerService>(CommutePlannerService);
}

describe('CommutePlannerService', () => {
  let planner: CommutePlannerService;

  beforeEach(async () => {
    planner = await createPlanner();
  });

  it('should be defined', () => {
    expect(planner).toBeDefined();
  });

  describe('planCommute', () => {
    it('should plan Home -> Work in the morning', () => {
      const report = planner.planCommute(LOCATIONS, STATIONS, ProfileLookup.empty(), fridayAt(7));

      expect(report.timestamp).toBe('2024-06-07T07:00:00.000-04:00');
      expect(report.isMorning).toBe(true);
      expect(report.direction).toEqual({ from: 'home', to: 'work' });
      expect(report.tripSummary).toEqual({
        bikeLikelihood: 'HIGH',
        dockLikelihood: 'LOW',
        tripVerdict: {
          confidence: 'MEDIUM',
          reason: 'DOCKS_TIGHT',
          message: 'Docks may be tight at work',
        },
      });
    });

    it('should plan Work -> Home in the afternoon', () => {
      const report = planner.planCommute(
        LOCATIONS,
        STATIONS,
        ProfileLookup.empty(),
        DateTime.fromISO('2024-06-07T17:00:00Z'),
      );

      expect(report.timestamp).toBe('2024-06-07T13:00:00.000-04:00');
      expect(report.isMorning).toBe(false);
      expect(report.direction).toEqual({ from: 'work', to: 'home' });
      expect(report.tripSummary.bikeLikelihood).toBe('HIGH');
      expect(report.tripSummary.dockLikelihood).toBe('HIGH');
      expect(report.tripSummary.tripVerdict.reason).toBe('SAFE');
    });

    it('should switch direction at the cutoff hour', () => {
      expect(planner.planCommute(LOCATIONS, STATIONS, ProfileLookup.empty(), fridayAt(11, 59)).isMorning).toBe(true);
      expect(planner.planCommute(LOCATIONS, STATIONS, ProfileLookup.empty(), fridayAt(12)).isMorning).toBe(false);
    });

    it('should report each location with its nearest stations', () => {
      const report = planner.planCommute(LOCATIONS, STATIONS, ProfileLookup.empty(), fridayAt(7));

      expect(report.locations.home.reference).toEqual(HOME);
      expect(report.locations.home.nearby.map(station => station.stationId)).toEqual(['H1', 'H2', 'W2', 'W1']);
      expect(report.locations.home.forecast.totalBikes).toBe(22);
      expect(report.locations.work.nearby.map(station => station.stationId)).toEqual(['W1', 'W2', 'H2', 'H1']);
      expect(report.locations.work.forecast.totalDocks).toBe(4);
    });

    it('should describe the data behind the report', () => {
      const withoutProfiles = planner.planCommute(LOCATIONS, STATIONS, ProfileLookup.empty(), fridayAt(7));
      const withProfiles = planner.planCommute(LOCATIONS, STATIONS, lookupOf({}), fridayAt(7));

      expect(withoutProfiles.meta).toEqual({ totalStations: 4, predictionSource: 'unknown' });
      expect(withProfiles.meta).toEqual({ totalStations: 4, predictionSource: 'test ridership' });
    });

    it('should require both locations', () => {
      expect(() => planner.planCommute({ home: HOME }, STATIONS, ProfileLookup.empty(), fridayAt(7))).toThrow(
        BadRequestException,
      );
      expect(() => planner.planCommute({ work: WORK }, STATIONS, ProfileLookup.empty(), fridayAt(7))).toThrow(
        'Both home and work locations are required',
      );
    });
  });

  describe('planCommuteFromFeed', () => {
    it('should fail without a registered feed', async () => {
      await expect(planner.planCommuteFromFeed(LOCATIONS, ProfileLookup.empty(), fridayAt(7))).rejects.toThrow(
        ServiceUnavailableException,
      );
    });

    it('should plan from the feed records', async () => {
      const fetchStations = jest.fn().mockResolvedValue(STATIONS.map(station => ({ ...station })));
      const withFeed = await createPlanner([{ provide: STATION_FEED, useValue: { fetchStations } }]);

      const report = await withFeed.planCommuteFromFeed(LOCATIONS, ProfileLookup.empty(), fridayAt(7));

      expect(fetchStations).toHaveBeenCalledTimes(1);
      expect(report.tripSummary.tripVerdict.reason).toBe('DOCKS_TIGHT');
      expect(report.meta.totalStations).toBe(4);
    });
  });
});
