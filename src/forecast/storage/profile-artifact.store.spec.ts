// src/forecast/storage/profile-artifact.store.spec.ts

import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join, resolve } from 'path';
import { makeArtifact, slot, testConfig } from '../__tests__/fixtures';
import { PREDICTION_CONFIG } from '../config/prediction.config';
import { ProfileArtifactValidatorService } from './profile-artifact-validator.service';
import { DEFAULT_ARTIFACT_PATH, ProfileArtifactStore } from './profile-artifact.store';

describe('ProfileArtifactStore', () => {
  let store: ProfileArtifactStore;
  let dir: string;

  async function createStore(env: Record<string, string> = {}): Promise<ProfileArtifactStore> {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ProfileArtifactStore,
        ProfileArtifactValidatorService,
        { provide: ConfigService, useValue: new ConfigService(env) },
        { provide: PREDICTION_CONFIG, useValue: testConfig() },
      ],
    }).compile();

    return module.get<ProfileArtifactStore>(ProfileArtifactStore);
  }

  const artifact = makeArtifact({
    '7000': {
      flows: { '4': { '8': slot(-2) } },
      depletion: { '4': { hour: 8, severity: 2 } },
      fill: { '4': { hour: 0, magnitude: 0 } },
    },
  });

  beforeEach(async () => {
    store = await createStore();
    dir = await mkdtemp(join(tmpdir(), 'station-profiles-'));
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  describe('defaultPath', () => {
    it('should resolve the built-in path', () => {
      expect(store.defaultPath).toBe(resolve(DEFAULT_ARTIFACT_PATH));
    });

    it('should honour PROFILE_ARTIFACT_PATH', async () => {
      const configured = await createStore({ PROFILE_ARTIFACT_PATH: join(dir, 'custom.json') });

      expect(configured.defaultPath).toBe(join(dir, 'custom.json'));
    });
  });

  describe('save', () => {
    it('should write the artifact as JSON, creating directories', async () => {
      const filePath = join(dir, 'nested', 'profiles.json');

      const saved = await store.save(artifact, filePath);

      expect(saved).toBe(filePath);
      expect(JSON.parse(await readFile(filePath, 'utf-8'))).toEqual(artifact);
    });

    it('should refuse to write an invalid artifact', async () => {
      const broken = makeArtifact({});
      broken.metadata.weeksOfData = -1;

      await expect(store.save(broken, join(dir, 'broken.json'))).rejects.toThrow('Invalid profile artifact');
    });
  });

  describe('load', () => {
    it('should read back what was saved', async () => {
      const filePath = join(dir, 'profiles.json');
      await store.save(artifact, filePath);

      expect(await store.load(filePath)).toEqual(artifact);
    });

    it('should warn when the artifact was built in another timezone', async () => {
      const warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
      const elsewhere = makeArtifact({ '7000': { flows: { '4': { '8': slot(-2) } } } });
      elsewhere.metadata.timezone = 'America/Vancouver';
      const filePath = join(dir, 'vancouver.json');
      await writeFile(filePath, JSON.stringify(elsewhere), 'utf-8');

      expect(await store.load(filePath)).toEqual(elsewhere);
      expect(warn).toHaveBeenCalledWith(
        'Profile artifact was built in America/Vancouver but forecasts run in America/Toronto; ' +
          'hour slots will not line up',
      );
    });

    it('should not warn when the timezones agree', async () => {
      const warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
      const filePath = join(dir, 'profiles.json');
      await store.save(artifact, filePath);

      await store.load(filePath);

      expect(warn).not.toHaveBeenCalled();
    });

    it('should return null when the file does not exist', async () => {
      expect(await store.load(join(dir, 'missing.json'))).toBeNull();
    });

    it('should fail on a file that is not JSON', async () => {
      const filePath = join(dir, 'corrupt.json');
      await writeFile(filePath, '{ "metadata": ', 'utf-8');

      await expect(store.load(filePath)).rejects.toThrow(`Profile artifact ${filePath} is not valid JSON`);
    });

    it('should fail on JSON that is not an artifact', async () => {
      const filePath = join(dir, 'other.json');
      await writeFile(filePath, JSON.stringify({ stations: [] }), 'utf-8');

      await expect(store.load(filePath)).rejects.toThrow(
        'Invalid profile artifact: metadata: metadata is required; stations: stations is required',
      );
    });
  });
});
