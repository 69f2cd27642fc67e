// src/forecast/engine/availability-classifier.ts

/**
 * Availability Classifier
 *
 * Classifies the aggregate of the prediction set (not each station) into a
 * bike likelihood and a dock likelihood, combining the live fill percentage
 * with the historical net flow of the current (day, hour) slot.
 */

import { Inject, Injectable } from '@nestjs/common';
import { ClassificationThresholds, PREDICTION_CONFIG, PredictionConfig } from '../config/prediction.config';
import { AvailabilityClassification, Likelihood } from '../types/forecast.types';
import { StationSnapshot, totalBikes } from '../types/station.types';
import { ProfileLookup } from './profile-lookup';

/**
 * Percentage/trend rule followed by the absolute floor override.
 *
 * `netFlow` is signed from the point of view of the resource being
 * classified: positive means it is becoming more available.
 */
export function classifyLevel(
  pct: number,
  netFlow: number,
  absoluteCount: number,
  absoluteFloor: number,
  thresholds: ClassificationThresholds,
): Likelihood {
  let level: Likelihood;
  if (pct >= thresholds.highPct && netFlow >= thresholds.highMinNetFlow) {
    level = 'HIGH';
  } else if (pct >= thresholds.mediumPct || (pct >= thresholds.improvingPct && netFlow > 0)) {
    level = 'MEDIUM';
  } else {
    level = 'LOW';
  }

  // Large stations can sit under the percentage bars with plenty left for one rider
  if (level === 'LOW' && absoluteCount >= absoluteFloor) {
    level = 'MEDIUM';
  }

  return level;
}

@Injectable()
export class AvailabilityClassifier {
  constructor(@Inject(PREDICTION_CONFIG) private readonly config: PredictionConfig) {}

  classify(
    predictionSet: readonly StationSnapshot[],
    lookup: ProfileLookup,
    day: number,
    hour: number,
  ): AvailabilityClassification {
    let bikes = 0;
    let docks = 0;
    let capacity = 0;
    let netFlowBikes = 0;
    const withProfile: string[] = [];
    const withoutProfile: string[] = [];

    for (const station of predictionSet) {
      bikes += totalBikes(station);
      docks += station.docks;
      capacity += station.capacity;

      const slot = lookup.getFlow(station.stationId, day, hour);
      if (slot) {
        netFlowBikes += slot.netFlow;
        withProfile.push(station.stationId);
      } else {
        withoutProfile.push(station.stationId);
      }
    }

    // bikes arriving means docks being used up; `|| 0` keeps -0 out
    const netFlowDocks = -netFlowBikes || 0;
    const bikePct = capacity > 0 ? (bikes / capacity) * 100 : 0;
    const dockPct = capacity > 0 ? (docks / capacity) * 100 : 0;
    const thresholds = this.config.classification;

    return {
      bikeLikelihood: classifyLevel(bikePct, netFlowBikes, bikes, this.config.absoluteBikeFloor, thresholds),
      dockLikelihood: classifyLevel(dockPct, netFlowDocks, docks, this.config.absoluteDockFloor, thresholds),
      totalBikes: bikes,
      totalDocks: docks,
      totalCapacity: capacity,
      bikePct,
      dockPct,
      netFlowBikes,
      netFlowDocks,
      hasData: predictionSet.length > 0,
      coverage: { withProfile, withoutProfile },
    };
  }
}
