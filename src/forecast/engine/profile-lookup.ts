// src/forecast/engine/profile-lookup.ts

/**
 * Profile Lookup
 *
 * Read-only O(1) view over the artifact. Absent entries come back as
 * undefined and mean "no data", never "no flow".
 */

import {
  DepletionSummary,
  FillSummary,
  FlowProfile,
  ProfileArtifact,
  StationProfile,
} from '../types/flow-profile.types';

export class ProfileLookup {
  private readonly stations: Record<string, StationProfile>;

  constructor(private readonly artifact: ProfileArtifact | null) {
    this.stations = artifact?.stations ?? {};
  }

  /** An empty lookup: every slot is a coverage gap */
  static empty(): ProfileLookup {
    return new ProfileLookup(null);
  }

  get hasArtifact(): boolean {
    return this.artifact !== null;
  }

  get dataSource(): string {
    return this.artifact?.metadata.dataSource ?? 'unknown';
  }

  getFlow(stationId: string, day: number, hour: number): FlowProfile | undefined {
    return this.station(stationId)?.flows[String(day)]?.[String(hour)];
  }

  getDepletion(stationId: string, day: number): DepletionSummary | undefined {
    return this.station(stationId)?.depletion[String(day)];
  }

  getFill(stationId: string, day: number): FillSummary | undefined {
    return this.station(stationId)?.fill[String(day)];
  }

  private station(stationId: string): StationProfile | undefined {
    return Object.prototype.hasOwnProperty.call(this.stations, stationId) ? this.stations[stationId] : undefined;
  }
}
