// src/forecast/services/trip-csv-reader.service.ts

/**
 * Trip CSV Reader
 *
 * Streams ridership exports (one trip per row, header row first) into
 * TripRecords without loading whole files into memory.
 */

import { Injectable, Logger } from '@nestjs/common';
import { parse } from 'csv-parse';
import { createReadStream } from 'fs';
import { readdir, stat } from 'fs/promises';
import { join } from 'path';
import { TripRecord } from '../types/flow-profile.types';

export interface TripCsvColumns {
  originStationId: string;
  destinationStationId: string;
  startTime: string;
  endTime: string;
}

export const DEFAULT_TRIP_CSV_COLUMNS: TripCsvColumns = {
  originStationId: 'Start Station Id',
  destinationStationId: 'End Station Id',
  startTime: 'Start Time',
  endTime: 'End Time',
};

export interface TripCsvReadOptions {
  columns?: Partial<TripCsvColumns>;
  /** Operator exports are latin1 */
  encoding?: BufferEncoding;
}

type CsvRow = Record<string, string>;

function isCsvRow(row: unknown): row is CsvRow {
  return typeof row === 'object' && row !== null && !Array.isArray(row);
}

/**
 * Map one parsed CSV row onto a TripRecord. Missing cells become empty
 * strings, which the builder counts as discards.
 */
export function mapCsvRow(row: CsvRow, columns: TripCsvColumns = DEFAULT_TRIP_CSV_COLUMNS): TripRecord {
  const endTime = row[columns.endTime]?.trim();
  return {
    originStationId: row[columns.originStationId]?.trim() ?? '',
    destinationStationId: row[columns.destinationStationId]?.trim() ?? '',
    startTime: row[columns.startTime]?.trim() ?? '',
    ...(endTime ? { endTime } : {}),
  };
}

@Injectable()
export class TripCsvReaderService {
  private readonly logger = new Logger(TripCsvReaderService.name);

  /**
   * Resolve a file or a directory of *.csv files, sorted by name.
   */
  async listCsvFiles(inputPath: string): Promise<string[]> {
    const info = await stat(inputPath);
    if (!info.isDirectory()) {
      return [inputPath];
    }

    const entries = await readdir(inputPath, { withFileTypes: true });
    return entries
      .filter(entry => entry.isFile() && entry.name.toLowerCase().endsWith('.csv'))
      .map(entry => entry.name)
      .sort()
      .map(name => join(inputPath, name));
  }

  async *readFile(filePath: string, options: TripCsvReadOptions = {}): AsyncGenerator<TripRecord> {
    const columns: TripCsvColumns = { ...DEFAULT_TRIP_CSV_COLUMNS, ...options.columns };
    const fileStream = createReadStream(filePath, { encoding: options.encoding ?? 'latin1' });
    const parser = parse({
      columns: true,
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
      trim: true,
    });

    // pipe() does not forward read errors; end the iteration with them instead
    fileStream.on('error', error => parser.destroy(error));
    fileStream.pipe(parser);

    let rows = 0;
    for await (const row of parser) {
      if (!isCsvRow(row)) {
        continue;
      }
      rows++;
      yield mapCsvRow(row, columns);
    }

    this.logger.log(`Read ${rows} rows from ${filePath}`);
  }

  async *readFiles(filePaths: string[], options: TripCsvReadOptions = {}): AsyncGenerator<TripRecord> {
    for (const filePath of filePaths) {
      yield* this.readFile(filePath, options);
    }
  }
}
