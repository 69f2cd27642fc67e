// src/forecast/engine/trip-confidence-engine.ts

/**
 * Trip Confidence Engine
 *
 * Fuses the origin's bike likelihood with the destination's dock likelihood
 * into one verdict, and projects a "leave by" deadline from the origin's
 * historical loss rate.
 *
 * Gating: a LOW bike likelihood makes the whole trip LOW. Otherwise the
 * weighted score (bikes 60%, docks 40%) is mapped back onto a likelihood;
 * a missing dock can be recovered by riding on, a missing bike cannot.
 */

import { Inject, Injectable } from '@nestjs/common';
import { DateTime } from 'luxon';
import { PREDICTION_CONFIG, PredictionConfig } from '../config/prediction.config';
import { LIKELIHOOD_SCORES, Likelihood, TripVerdict } from '../types/forecast.types';

export interface TripInputs {
  /** Origin bike likelihood */
  bikeLikelihood: Likelihood;
  /** Destination dock likelihood */
  dockLikelihood: Likelihood;
  /** Bikes currently at the origin's prediction set */
  originBikes: number;
  /** Origin net flow for the current slot (bikes/hour) */
  originNetFlowBikes: number;
}

export const TRIP_MESSAGES = {
  SAFE: 'Safe to bike',
  CONSIDER_ALTERNATIVE: 'Consider transit/walking',
} as const;

@Injectable()
export class TripConfidenceEngine {
  constructor(@Inject(PREDICTION_CONFIG) private readonly config: PredictionConfig) {}

  score(bikeLikelihood: Likelihood, dockLikelihood: Likelihood): number {
    const { bikeWeight, dockWeight } = this.config.trip;
    return LIKELIHOOD_SCORES[bikeLikelihood] * bikeWeight + LIKELIHOOD_SCORES[dockLikelihood] * dockWeight;
  }

  fuse(bikeLikelihood: Likelihood, dockLikelihood: Likelihood): Likelihood {
    if (bikeLikelihood === 'LOW') {
      return 'LOW';
    }

    const score = this.score(bikeLikelihood, dockLikelihood);
    if (score >= this.config.trip.highThreshold) {
      return 'HIGH';
    }
    if (score >= this.config.trip.mediumThreshold) {
      return 'MEDIUM';
    }
    return 'LOW';
  }

  /**
   * Time the origin is expected to reach the absolute floor, minus the buffer.
   * Null unless bikes are draining. Already at or below the floor counts as
   * zero hours left.
   */
  projectLeaveBy(currentBikes: number, netFlowBikes: number, now: DateTime): DateTime | null {
    if (!(netFlowBikes < 0)) {
      return null;
    }

    const lossRate = Math.abs(netFlowBikes);
    const bikesAboveFloor = currentBikes - this.config.absoluteBikeFloor;
    const hoursUntilFloor = Math.max(0, bikesAboveFloor / lossRate);

    return now
      .plus({ milliseconds: Math.round(hoursUntilFloor * 3_600_000) })
      .minus({ minutes: this.config.trip.leaveByBufferMinutes });
  }

  /**
   * Shown only while strictly in the future and within the visibility window.
   */
  isLeaveByVisible(leaveBy: DateTime, now: DateTime): boolean {
    const msAhead = leaveBy.toMillis() - now.toMillis();
    return msAhead > 0 && msAhead <= this.config.trip.leaveByWindowHours * 3_600_000;
  }

  evaluate(inputs: TripInputs, now: DateTime, destinationLabel = 'destination'): TripVerdict {
    const confidence = this.fuse(inputs.bikeLikelihood, inputs.dockLikelihood);

    const projected = this.projectLeaveBy(inputs.originBikes, inputs.originNetFlowBikes, now);
    const leaveBy = projected && this.isLeaveByVisible(projected, now) ? projected : null;

    const verdict: TripVerdict = { confidence, reason: 'SAFE', message: TRIP_MESSAGES.SAFE };

    if (confidence === 'LOW') {
      verdict.reason = 'CONSIDER_ALTERNATIVE';
      verdict.message = TRIP_MESSAGES.CONSIDER_ALTERNATIVE;
    } else if (confidence === 'MEDIUM') {
      if (inputs.bikeLikelihood === 'HIGH' && inputs.dockLikelihood === 'LOW') {
        verdict.reason = 'DOCKS_TIGHT';
        verdict.message = `Docks may be tight at ${destinationLabel}`;
      } else if (leaveBy) {
        verdict.reason = 'LEAVE_BY';
        verdict.message = `${TRIP_MESSAGES.SAFE}, but leave by ${formatClockTime(leaveBy)}`;
      }
    }

    const leaveByIso = leaveBy?.toISO();
    if (leaveByIso) {
      verdict.leaveBy = leaveByIso;
    }

    return verdict;
  }
}

/** "8:30 AM" */
export function formatClockTime(time: DateTime): string {
  return time.setLocale('en-US').toFormat('h:mm a');
}
