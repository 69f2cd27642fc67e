// src/forecast/engine/profile-accumulator.ts

/**
 * Profile Accumulator
 *
 * Streaming half of the profile builder: trip records are added one at a
 * time (counts per station/day/hour), then build() turns the counts into the
 * per-week flow table and the depletion/fill summaries.
 */

import { DateTime } from 'luxon';
import {
  DAYS_OF_WEEK,
  DepletionSummary,
  DiscardReason,
  DiscardReport,
  FillSummary,
  HOURS_PER_DAY,
  ProfileArtifact,
  StationProfile,
  TripRecord,
} from '../types/flow-profile.types';
import {
  DEFAULT_TIMESTAMP_FORMATS,
  countCalendarWeeks,
  parseTripTimestamp,
  toDayOfWeek,
} from '../utils/time.util';

export interface AccumulatorOptions {
  timezone: string;
  timestampFormats?: readonly string[];
}

export interface BuildOptions {
  /** Force the week count instead of deriving it from the trip window */
  weeksOfData?: number;
  dataSource?: string;
  generatedAt?: DateTime;
}

export interface DayScan {
  depletion: DepletionSummary;
  fill: FillSummary;
}

const SLOTS_PER_STATION = DAYS_OF_WEEK.length * HOURS_PER_DAY;

function slotIndex(day: number, hour: number): number {
  return day * HOURS_PER_DAY + hour;
}

/**
 * Single forward pass over hours 0..23 tracking the running minimum and
 * maximum of cumulative net flow. Strict comparisons keep the earliest hour
 * on ties.
 */
export function scanCumulativeFlow(netByHour: readonly number[]): DayScan {
  let cumulative = 0;
  let minValue = Number.POSITIVE_INFINITY;
  let minHour = 0;
  let maxValue = Number.NEGATIVE_INFINITY;
  let maxHour = 0;

  for (let hour = 0; hour < HOURS_PER_DAY; hour++) {
    cumulative += netByHour[hour] ?? 0;
    if (cumulative < minValue) {
      minValue = cumulative;
      minHour = hour;
    }
    if (cumulative > maxValue) {
      maxValue = cumulative;
      maxHour = hour;
    }
  }

  return {
    depletion: { hour: minHour, severity: Math.max(0, -minValue) },
    fill: { hour: maxHour, magnitude: Math.max(0, maxValue) },
  };
}

export class ProfileAccumulator {
  private readonly departures = new Map<string, number[]>();
  private readonly arrivals = new Map<string, number[]>();
  private readonly discardsByReason: Record<DiscardReason, number> = {
    MISSING_STATION: 0,
    MISSING_START_TIME: 0,
    INVALID_START_TIME: 0,
    INVALID_END_TIME: 0,
  };
  private total = 0;
  private accepted = 0;
  private firstTrip: DateTime | null = null;
  private lastTrip: DateTime | null = null;

  constructor(private readonly options: AccumulatorOptions) {}

  /**
   * Count one trip. Returns the discard reason when the record is rejected.
   */
  add(record: TripRecord): DiscardReason | null {
    this.total++;

    const origin = record.originStationId?.trim();
    const destination = record.destinationStationId?.trim();
    if (!origin || !destination) {
      return this.discard('MISSING_STATION');
    }

    if (!record.startTime?.trim()) {
      return this.discard('MISSING_START_TIME');
    }

    const formats = this.options.timestampFormats ?? DEFAULT_TIMESTAMP_FORMATS;
    const start = parseTripTimestamp(record.startTime, this.options.timezone, formats);
    if (!start) {
      return this.discard('INVALID_START_TIME');
    }

    let end = start;
    if (record.endTime?.trim()) {
      const parsedEnd = parseTripTimestamp(record.endTime, this.options.timezone, formats);
      if (!parsedEnd) {
        return this.discard('INVALID_END_TIME');
      }
      end = parsedEnd;
    }

    this.increment(this.departures, origin, start);
    this.increment(this.arrivals, destination, end);
    this.accepted++;

    if (!this.firstTrip || start.toMillis() < this.firstTrip.toMillis()) {
      this.firstTrip = start;
    }
    if (!this.lastTrip || start.toMillis() > this.lastTrip.toMillis()) {
      this.lastTrip = start;
    }

    return null;
  }

  get report(): DiscardReport {
    return {
      total: this.total,
      accepted: this.accepted,
      discarded: this.total - this.accepted,
      byReason: { ...this.discardsByReason },
    };
  }

  /**
   * Number of calendar weeks the accepted trips span (1 for an empty window).
   */
  get weeksSpanned(): number {
    if (!this.firstTrip || !this.lastTrip) {
      return 1;
    }
    return countCalendarWeeks(this.firstTrip, this.lastTrip);
  }

  build(options: BuildOptions = {}): ProfileArtifact {
    const weeks = options.weeksOfData ?? this.weeksSpanned;
    if (!Number.isFinite(weeks) || weeks <= 0) {
      throw new Error(`weeksOfData must be a positive number, got ${weeks}`);
    }

    const stationIds = new Set<string>([...this.departures.keys(), ...this.arrivals.keys()]);
    const stations: Record<string, StationProfile> = {};

    for (const stationId of [...stationIds].sort()) {
      stations[stationId] = this.buildStation(stationId, weeks);
    }

    const generatedAt = options.generatedAt ?? DateTime.now().setZone(this.options.timezone);

    return {
      metadata: {
        generatedAt: generatedAt.toISO() ?? new Date().toISOString(),
        dataSource: options.dataSource ?? 'historical trip records',
        timezone: this.options.timezone,
        weeksOfData: weeks,
        totalStations: Object.keys(stations).length,
        windowStart: this.firstTrip?.toISO() ?? null,
        windowEnd: this.lastTrip?.toISO() ?? null,
        discards: this.report,
      },
      stations,
    };
  }

  private buildStation(stationId: string, weeks: number): StationProfile {
    const departures = this.departures.get(stationId);
    const arrivals = this.arrivals.get(stationId);
    const profile: StationProfile = { flows: {}, depletion: {}, fill: {} };

    for (const day of DAYS_OF_WEEK) {
      const netByHour: number[] = [];
      let observed = false;

      for (let hour = 0; hour < HOURS_PER_DAY; hour++) {
        const index = slotIndex(day, hour);
        const dep = departures?.[index] ?? 0;
        const arr = arrivals?.[index] ?? 0;
        netByHour.push(arr - dep);

        if (dep === 0 && arr === 0) {
          continue;
        }

        observed = true;
        const arrivalsPerWeek = arr / weeks;
        const departuresPerWeek = dep / weeks;
        if (!profile.flows[String(day)]) {
          profile.flows[String(day)] = {};
        }
        profile.flows[String(day)][String(hour)] = {
          arrivalsPerWeek,
          departuresPerWeek,
          netFlow: arrivalsPerWeek - departuresPerWeek,
        };
      }

      if (!observed) {
        continue;
      }

      // Severity is kept in whole-window units, not per week
      const scan = scanCumulativeFlow(netByHour);
      profile.depletion[String(day)] = scan.depletion;
      profile.fill[String(day)] = scan.fill;
    }

    return profile;
  }

  private increment(counts: Map<string, number[]>, stationId: string, time: DateTime): void {
    let slots = counts.get(stationId);
    if (!slots) {
      slots = new Array<number>(SLOTS_PER_STATION).fill(0);
      counts.set(stationId, slots);
    }
    slots[slotIndex(toDayOfWeek(time), time.hour)]++;
  }

  private discard(reason: DiscardReason): DiscardReason {
    this.discardsByReason[reason]++;
    return reason;
  }
}
