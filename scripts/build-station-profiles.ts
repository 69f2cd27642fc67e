// scripts/build-station-profiles.ts

/**
 * Build the station flow lookup artifact from ridership CSV exports.
 *
 * Usage:
 *   npm run build:profiles -- <csv file or directory> [more paths...] [options]
 *
 * Options:
 *   --out=<path>        artifact path (default: PROFILE_ARTIFACT_PATH or data/station_profiles.json)
 *   --weeks=<n>         force the number of weeks instead of deriving it from the data
 *   --source=<label>    data source label stored in the artifact metadata
 *
 * Example:
 *   npm run build:profiles -- data/ --source="Ridership 2024 (Jan-Sep)"
 */

import 'reflect-metadata';
import * as dotenv from 'dotenv';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../src/app.module';
import { ProfileBuilderService } from '../src/forecast/services/profile-builder.service';
import { TripCsvReaderService } from '../src/forecast/services/trip-csv-reader.service';
import { ProfileArtifactStore } from '../src/forecast/storage/profile-artifact.store';

dotenv.config();

export interface ScriptOptions {
  inputs: string[];
  out?: string;
  weeksOfData?: number;
  dataSource?: string;
}

export function parseArgs(args: string[]): ScriptOptions {
  const options: ScriptOptions = {
    inputs: args.filter(arg => !arg.startsWith('--')),
  };

  const outArg = args.find(arg => arg.startsWith('--out='));
  const weeksArg = args.find(arg => arg.startsWith('--weeks='));
  const sourceArg = args.find(arg => arg.startsWith('--source='));

  if (outArg) {
    options.out = outArg.slice('--out='.length).trim();
  }
  if (weeksArg) {
    const weeks = Number(weeksArg.slice('--weeks='.length).trim());
    if (!Number.isFinite(weeks) || weeks <= 0) {
      throw new Error(`--weeks must be a positive number, got "${weeksArg}"`);
    }
    options.weeksOfData = weeks;
  }
  if (sourceArg) {
    options.dataSource = sourceArg.slice('--source='.length).trim();
  }

  return options;
}

async function main() {
  const options = parseArgs(process.argv.slice(2));
  if (options.inputs.length === 0) {
    console.error('Usage: build-station-profiles <csv file or directory> [--out=path] [--weeks=n] [--source=label]');
    process.exit(1);
  }

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['log', 'warn', 'error'],
  });

  try {
    const reader = app.get(TripCsvReaderService);
    const builder = app.get(ProfileBuilderService);
    const store = app.get(ProfileArtifactStore);

    const files: string[] = [];
    for (const input of options.inputs) {
      files.push(...(await reader.listCsvFiles(input)));
    }
    if (files.length === 0) {
      throw new Error('No CSV files found');
    }

    console.log(`🚲 Building station profiles from ${files.length} file(s)`);
    files.forEach(file => console.log(`  - ${file}`));

    const artifact = await builder.build(reader.readFiles(files), {
      weeksOfData: options.weeksOfData,
      dataSource: options.dataSource,
      onProgress: processed => console.log(`  processed ${processed.toLocaleString('en-US')} trips`),
    });

    const outPath = await store.save(artifact, options.out ?? store.defaultPath);

    const { metadata } = artifact;
    console.log('\n✅ Done');
    console.log(`  - stations:  ${metadata.totalStations}`);
    console.log(`  - weeks:     ${metadata.weeksOfData}`);
    console.log(`  - accepted:  ${metadata.discards.accepted}`);
    console.log(`  - discarded: ${metadata.discards.discarded}`);
    console.log(`  - output:    ${outPath}`);
  } finally {
    await app.close();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('❌ Profile build failed:', error instanceof Error ? error.message : error);
    if (error instanceof Error && error.stack) {
      console.error(error.stack);
    }
    process.exit(1);
  });
}
