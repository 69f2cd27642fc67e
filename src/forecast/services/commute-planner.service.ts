// src/forecast/services/commute-planner.service.ts

/**
 * Commute Planner Service
 *
 * Home/Work commute report: picks the trip direction from the time of day,
 * forecasts both ends and fuses origin bikes with destination docks.
 */

import {
  BadRequestException,
  Inject,
  Injectable,
  Logger,
  Optional,
  ServiceUnavailableException,
} from '@nestjs/common';
import { DateTime } from 'luxon';
import { PREDICTION_CONFIG, PredictionConfig } from '../config/prediction.config';
import { ProfileLookup } from '../engine/profile-lookup';
import { STATION_FEED, StationFeed } from '../interfaces/station-feed.interface';
import {
  CommuteEndpoint,
  CommuteLocationReport,
  CommuteLocations,
  CommuteReport,
} from '../types/forecast.types';
import { GeoPoint, StationSnapshot } from '../types/station.types';
import { ForecastService } from './forecast.service';
import { LocationContextService } from './location-context.service';

@Injectable()
export class CommutePlannerService {
  private readonly logger = new Logger(CommutePlannerService.name);

  constructor(
    @Inject(PREDICTION_CONFIG) private readonly config: PredictionConfig,
    private readonly locationContext: LocationContextService,
    private readonly forecastService: ForecastService,
    @Optional() @Inject(STATION_FEED) private readonly stationFeed?: StationFeed,
  ) {}

  planCommute(
    locations: CommuteLocations,
    stations: readonly StationSnapshot[],
    lookup: ProfileLookup,
    now: DateTime,
  ): CommuteReport {
    const { home, work } = locations;
    if (!home || !work) {
      throw new BadRequestException('Both home and work locations are required');
    }

    const local = now.setZone(this.config.timezone);
    const isMorning = local.hour < this.config.morningCutoffHour;
    const from: CommuteEndpoint = isMorning ? 'home' : 'work';
    const to: CommuteEndpoint = isMorning ? 'work' : 'home';

    const reports: Record<CommuteEndpoint, CommuteLocationReport> = {
      home: this.reportLocation(home, stations, lookup, local),
      work: this.reportLocation(work, stations, lookup, local),
    };

    if (!lookup.hasArtifact) {
      this.logger.warn('No historical profiles loaded; forecasting from live counts only');
    }

    return {
      timestamp: local.toISO() ?? now.toJSDate().toISOString(),
      isMorning,
      direction: { from, to },
      tripSummary: this.forecastService.summarize(reports[from].forecast, reports[to].forecast, local, to),
      locations: reports,
      meta: {
        totalStations: stations.filter(station => station.inService).length,
        predictionSource: lookup.dataSource,
      },
    };
  }

  /**
   * Same as planCommute, pulling stations from the registered feed.
   */
  async planCommuteFromFeed(
    locations: CommuteLocations,
    lookup: ProfileLookup,
    now: DateTime,
  ): Promise<CommuteReport> {
    if (!this.stationFeed) {
      throw new ServiceUnavailableException('No station feed is registered');
    }

    const records = await this.stationFeed.fetchStations();
    const stations = this.locationContext.normalizeStations(records);
    return this.planCommute(locations, stations, lookup, now);
  }

  private reportLocation(
    reference: GeoPoint,
    stations: readonly StationSnapshot[],
    lookup: ProfileLookup,
    now: DateTime,
  ): CommuteLocationReport {
    const context = this.locationContext.buildContext(reference, stations);
    return {
      reference,
      nearby: context.displaySet,
      forecast: this.forecastService.forecastLocation(context, lookup, now),
    };
  }
}
