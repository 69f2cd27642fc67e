// src/forecast/engine/warning-generator.ts

/**
 * Warning Generator
 *
 * Anticipatory warnings for the prediction set:
 * - DEPLETION: a station that historically runs out of bikes within the horizon
 * - FILL: heavy inflow now, with a station that historically fills up within the horizon
 *
 * At most one of each. The earliest upcoming hour wins, not the most severe.
 */

import { Inject, Injectable } from '@nestjs/common';
import { PREDICTION_CONFIG, PredictionConfig } from '../config/prediction.config';
import { ForecastWarning } from '../types/forecast.types';
import { StationSnapshot } from '../types/station.types';
import { hoursAhead } from '../utils/time.util';
import { ProfileLookup } from './profile-lookup';

export interface GeneratedWarnings {
  depletionWarning?: ForecastWarning;
  fillWarning?: ForecastWarning;
}

@Injectable()
export class WarningGenerator {
  constructor(@Inject(PREDICTION_CONFIG) private readonly config: PredictionConfig) {}

  generate(
    predictionSet: readonly StationSnapshot[],
    lookup: ProfileLookup,
    day: number,
    hour: number,
  ): GeneratedWarnings {
    const warnings: GeneratedWarnings = {};

    const depletionWarning = this.findDepletion(predictionSet, lookup, day, hour);
    if (depletionWarning) {
      warnings.depletionWarning = depletionWarning;
    }

    const fillWarning = this.findFill(predictionSet, lookup, day, hour);
    if (fillWarning) {
      warnings.fillWarning = fillWarning;
    }

    return warnings;
  }

  findDepletion(
    predictionSet: readonly StationSnapshot[],
    lookup: ProfileLookup,
    day: number,
    hour: number,
  ): ForecastWarning | undefined {
    const { severityThreshold } = this.config.warnings;
    let earliest: ForecastWarning | undefined;

    for (const station of predictionSet) {
      const summary = lookup.getDepletion(station.stationId, day);
      if (!summary || summary.severity <= severityThreshold) {
        continue;
      }

      const delta = hoursAhead(summary.hour, hour);
      if (!this.withinHorizon(delta)) {
        continue;
      }

      if (!earliest || delta < earliest.hoursAhead) {
        earliest = {
          kind: 'DEPLETION',
          triggerHour: summary.hour,
          severity: summary.severity,
          hoursAhead: delta,
          stationId: station.stationId,
          stationName: station.name,
        };
      }
    }

    return earliest;
  }

  /**
   * Needs both an aggregate inflow above the set threshold and at least one
   * station with heavy inflow of its own; among those stations the earliest
   * fill hour inside the horizon is reported.
   */
  findFill(
    predictionSet: readonly StationSnapshot[],
    lookup: ProfileLookup,
    day: number,
    hour: number,
  ): ForecastWarning | undefined {
    const { fillAggregateNetFlow, fillStationNetFlow } = this.config.warnings;

    const stationFlows = predictionSet.map(station => ({
      station,
      netFlow: lookup.getFlow(station.stationId, day, hour)?.netFlow ?? 0,
    }));
    const aggregate = stationFlows.reduce((sum, entry) => sum + entry.netFlow, 0);
    if (aggregate <= fillAggregateNetFlow) {
      return undefined;
    }

    let earliest: ForecastWarning | undefined;
    for (const { station, netFlow } of stationFlows) {
      if (netFlow <= fillStationNetFlow) {
        continue;
      }

      const summary = lookup.getFill(station.stationId, day);
      if (!summary) {
        continue;
      }

      const delta = hoursAhead(summary.hour, hour);
      if (!this.withinHorizon(delta)) {
        continue;
      }

      if (!earliest || delta < earliest.hoursAhead) {
        earliest = {
          kind: 'FILL',
          triggerHour: summary.hour,
          severity: summary.magnitude,
          hoursAhead: delta,
          stationId: station.stationId,
          stationName: station.name,
        };
      }
    }

    return earliest;
  }

  private withinHorizon(delta: number): boolean {
    return delta > 0 && delta <= this.config.warnings.horizonHours;
  }
}
