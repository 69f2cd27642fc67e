// src/forecast/storage/profile-artifact-validator.service.spec.ts

import { Test, TestingModule } from '@nestjs/testing';
import { makeArtifact, slot } from '../__tests__/fixtures';
import { ProfileArtifactValidatorService } from './profile-artifact-validator.service';

describe('ProfileArtifactValidatorService', () => {
  let validator: ProfileArtifactValidatorService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [ProfileArtifactValidatorService],
    }).compile();

    validator = module.get<ProfileArtifactValidatorService>(ProfileArtifactValidatorService);
  });

  function validArtifact() {
    return makeArtifact({
      '7000': {
        flows: { '0': { '8': slot(-2.5), '17': slot(3) } },
        depletion: { '0': { hour: 8, severity: 4 } },
        fill: { '0': { hour: 17, magnitude: 3 } },
      },
    });
  }

  describe('validate', () => {
    it('should accept a well-formed artifact', () => {
      expect(validator.validate(validArtifact())).toEqual({ valid: true, errors: [], warnings: [] });
    });

    it('should reject values that are not objects', () => {
      const result = validator.validate([]);

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([{ path: '', message: 'artifact must be a JSON object', code: 'INVALID_TYPE' }]);
    });

    it('should require metadata and stations', () => {
      const result = validator.validate({});

      expect(result.errors.map(error => error.path)).toEqual(['metadata', 'stations']);
    });

    it('should require a positive week count', () => {
      const artifact = validArtifact();
      artifact.metadata.weeksOfData = 0;

      const result = validator.validate(artifact);

      expect(result.valid).toBe(false);
      expect(result.errors[0]).toEqual({
        path: 'metadata.weeksOfData',
        message: 'weeksOfData must be a positive number',
        code: 'INVALID_VALUE',
      });
    });

    it('should reject out-of-range day and hour keys', () => {
      const result = validator.validate({
        ...validArtifact(),
        stations: {
          '7000': {
            flows: { '7': { '8': slot(1) }, '1': { '24': slot(1) } },
            depletion: {},
            fill: {},
          },
        },
      });

      expect(result.errors.map(error => [error.path, error.code])).toEqual([
        ['stations.7000.flows.1.24', 'INVALID_KEY'],
        ['stations.7000.flows.7', 'INVALID_KEY'],
      ]);
    });

    it('should reject zero-padded keys', () => {
      const result = validator.validate({
        ...validArtifact(),
        stations: {
          '7000': {
            flows: { '0': { '08': slot(1) } },
            depletion: { '04': { hour: 8, severity: 2 } },
            fill: {},
          },
        },
      });

      expect(result.errors.map(error => [error.path, error.message])).toEqual([
        ['stations.7000.flows.0.08', 'hour must be 0..23'],
        ['stations.7000.depletion.04', 'day must be 0..6'],
      ]);
    });

    it('should reject a net flow that disagrees with its counts', () => {
      const result = validator.validate({
        ...validArtifact(),
        stations: {
          '7000': {
            flows: { '0': { '8': { arrivalsPerWeek: 1, departuresPerWeek: 2, netFlow: 1 } } },
            depletion: {},
            fill: {},
          },
        },
      });

      expect(result.errors).toEqual([
        {
          path: 'stations.7000.flows.0.8',
          message: 'netFlow must equal arrivalsPerWeek - departuresPerWeek',
          code: 'INCONSISTENT_FLOW',
        },
      ]);
    });

    it('should reject malformed summaries', () => {
      const result = validator.validate({
        ...validArtifact(),
        stations: {
          '7000': {
            flows: { '0': { '8': slot(1) } },
            depletion: { '0': { hour: 8.5, severity: 2 } },
            fill: { '0': { hour: 8, magnitude: -1 } },
          },
        },
      });

      expect(result.errors.map(error => error.message)).toEqual([
        'hour must be an integer 0..23',
        'magnitude must be a non-negative number',
      ]);
    });

    it('should warn about empty profiles and a wrong station count', () => {
      const artifact = makeArtifact({ '7000': {} });
      artifact.metadata.totalStations = 2;

      const result = validator.validate(artifact);

      expect(result.valid).toBe(true);
      expect(result.warnings.map(warning => warning.code)).toEqual(['EMPTY_PROFILE', 'COUNT_MISMATCH']);
    });
  });

  describe('assertValid', () => {
    it('should pass a valid artifact through', () => {
      expect(() => validator.assertValid(validArtifact())).not.toThrow();
    });

    it('should throw with every error', () => {
      expect(() => validator.assertValid({ metadata: {}, stations: {} })).toThrow(
        'Invalid profile artifact: metadata.weeksOfData: weeksOfData must be a positive number; ' +
          'metadata.generatedAt: generatedAt must be a string; ' +
          'metadata.dataSource: dataSource must be a string; ' +
          'metadata.timezone: timezone must be a string',
      );
    });
  });
});
