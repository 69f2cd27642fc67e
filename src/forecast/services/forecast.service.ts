// src/forecast/services/forecast.service.ts

/**
 * Forecast Service
 *
 * Runtime entry point of the engine. Every call is a pure computation from
 * (location context, profile lookup, current time) to a structured forecast;
 * nothing is retained between calls.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { DateTime } from 'luxon';
import { PREDICTION_CONFIG, PredictionConfig } from '../config/prediction.config';
import { AvailabilityClassifier } from '../engine/availability-classifier';
import { ProfileLookup } from '../engine/profile-lookup';
import { TripConfidenceEngine } from '../engine/trip-confidence-engine';
import { WarningGenerator } from '../engine/warning-generator';
import { DAY_NAMES } from '../types/flow-profile.types';
import { ForecastOutput, LocationForecast, TripVerdict } from '../types/forecast.types';
import { LocationContext } from '../types/station.types';
import { toDayOfWeek } from '../utils/time.util';

@Injectable()
export class ForecastService {
  private readonly logger = new Logger(ForecastService.name);

  constructor(
    @Inject(PREDICTION_CONFIG) private readonly config: PredictionConfig,
    private readonly classifier: AvailabilityClassifier,
    private readonly warningGenerator: WarningGenerator,
    private readonly tripEngine: TripConfidenceEngine,
  ) {}

  /**
   * Bike/dock likelihood and warnings for one location's prediction set.
   */
  forecastLocation(context: LocationContext, lookup: ProfileLookup, now: DateTime): LocationForecast {
    const local = now.setZone(this.config.timezone);
    const day = toDayOfWeek(local);
    const hour = local.hour;

    const classification = this.classifier.classify(context.predictionSet, lookup, day, hour);
    const warnings = this.warningGenerator.generate(context.predictionSet, lookup, day, hour);

    if (classification.coverage.withoutProfile.length > 0) {
      this.logger.debug(
        `No flow profile for ${DAY_NAMES[day]} ${hour}:00 at stations ${classification.coverage.withoutProfile.join(', ')}`,
      );
    }

    return { ...classification, ...warnings, day, hour };
  }

  /**
   * Origin bikes gate the trip; destination docks refine it.
   */
  evaluateTrip(
    origin: LocationForecast,
    destination: LocationForecast,
    now: DateTime,
    destinationLabel?: string,
  ): TripVerdict {
    return this.tripEngine.evaluate(
      {
        bikeLikelihood: origin.bikeLikelihood,
        dockLikelihood: destination.dockLikelihood,
        originBikes: origin.totalBikes,
        originNetFlowBikes: origin.netFlowBikes,
      },
      now.setZone(this.config.timezone),
      destinationLabel,
    );
  }

  summarize(
    origin: LocationForecast,
    destination: LocationForecast,
    now: DateTime,
    destinationLabel?: string,
  ): ForecastOutput {
    const output: ForecastOutput = {
      bikeLikelihood: origin.bikeLikelihood,
      dockLikelihood: destination.dockLikelihood,
      tripVerdict: this.evaluateTrip(origin, destination, now, destinationLabel),
    };

    if (origin.depletionWarning) {
      output.depletionWarning = origin.depletionWarning;
    }
    if (destination.fillWarning) {
      output.fillWarning = destination.fillWarning;
    }

    return output;
  }

  /**
   * Full trip forecast from the two location contexts.
   */
  forecastTrip(
    originContext: LocationContext,
    destinationContext: LocationContext,
    lookup: ProfileLookup,
    now: DateTime,
    destinationLabel?: string,
  ): ForecastOutput {
    const origin = this.forecastLocation(originContext, lookup, now);
    const destination = this.forecastLocation(destinationContext, lookup, now);
    return this.summarize(origin, destination, now, destinationLabel);
  }
}
