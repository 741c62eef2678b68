import { HttpException, HttpStatus } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { unit } from 'mathjs';

import { TleConfig, tleConfig } from './config/configuration';
import { ParseBatchDto } from './dto/parse-batch.dto';
import { ParseTleDto } from './dto/parse-tle.dto';
import { OrbitService } from './orbit.service';
import { TleService } from './tle.service';
import { CATALOG, ISS_FIELDS, ISS_LINES, TESTSAT_2, TESTSAT_3, thrown } from '../test/fixtures';

const DEFAULTS: TleConfig = { verifyChecksum: false, keepRemainder: false, batchPolicy: 'abort' };

const BROKEN_LINE1 = TESTSAT_2[1].slice(0, 40);
const BROKEN = [...ISS_LINES, TESTSAT_2[0], BROKEN_LINE1, TESTSAT_2[2], ...TESTSAT_3].join('\n');

function tleDto(overrides: Partial<ParseTleDto> = {}): ParseTleDto {
  return Object.assign(new ParseTleDto(), {
    name: ISS_LINES[0],
    line1: ISS_LINES[1],
    line2: ISS_LINES[2],
    ...overrides,
  });
}

function batchDto(overrides: Partial<ParseBatchDto> = {}): ParseBatchDto {
  return Object.assign(new ParseBatchDto(), { text: CATALOG, ...overrides });
}

function statusOf(err: unknown): number | undefined {
  return err instanceof HttpException ? err.getStatus() : undefined;
}

async function createService(config: Partial<TleConfig> = {}): Promise<TleService> {
  const module: TestingModule = await Test.createTestingModule({
    providers: [TleService, OrbitService, { provide: tleConfig.KEY, useValue: { ...DEFAULTS, ...config } }],
  }).compile();
  return module.get<TleService>(TleService);
}

describe('TleService', () => {
  let service: TleService;

  beforeEach(async () => {
    service = await createService();
  });

  describe('parse', () => {
    it('returns the stored fields', () => {
      expect(service.parse(tleDto())).toEqual(ISS_FIELDS);
    });

    it('adds derived values and the epoch on request', () => {
      const response = service.parse(tleDto({ computed: true, epoch: true }));
      expect(response.epoch).toBe('2019-09-06T01:10:02.796672Z');
      expect(response.a).toBeCloseTo(6793.584702357316, 6);
      expect(response.nu).toBeCloseTo(53.36282588304321, 8);
    });

    it('answers malformed input with 400', () => {
      const err = thrown(() => service.parse(tleDto({ line1: ISS_LINES[2], line2: ISS_LINES[1] })));
      expect(statusOf(err)).toBe(HttpStatus.BAD_REQUEST);
      expect(err instanceof HttpException && err.message).toBe('Expected line 1, found marker "2"');
    });

    it('checks checksums when configured to', async () => {
      const tampered = tleDto({ line1: `${ISS_LINES[1].slice(0, 68)}1` });
      expect(service.parse(tampered).noradId).toBe('25544');

      const strict = await createService({ verifyChecksum: true });
      expect(statusOf(thrown(() => strict.parse(tampered)))).toBe(HttpStatus.BAD_REQUEST);
      expect(strict.parse({ ...tampered, verifyChecksum: false }).noradId).toBe('25544');
    });
  });

  describe('parseBatch', () => {
    it('parses a catalog', () => {
      const response = service.parseBatch(batchDto({ computed: true }));
      expect(response.records.map((r) => r.noradId)).toEqual(['90001', '90002', '90003']);
      expect(response.records[0].a).toBeCloseTo(7203.489791894085, 6);
      expect(response.errors).toEqual([]);
    });

    it('fails the whole batch under the abort policy', () => {
      const err = thrown(() => service.parseBatch(batchDto({ text: BROKEN })));
      expect(statusOf(err)).toBe(HttpStatus.BAD_REQUEST);
      expect(err instanceof HttpException && err.message).toBe(
        'TLE #1 could not be parsed: Line has 40 characters, at least 68 required to read "line1"',
      );
    });

    it('reports failures per record under the collect policy', () => {
      const response = service.parseBatch(batchDto({ text: BROKEN, policy: 'collect' }));
      expect(response.records.map((r) => r.name)).toEqual(['ISS (ZARYA)', 'TESTSAT-3']);
      expect(response.errors).toEqual([
        {
          index: 1,
          error: 'MalformedLineError',
          message: 'Line has 40 characters, at least 68 required to read "line1"',
          lines: [TESTSAT_2[0], BROKEN_LINE1, TESTSAT_2[2]],
        },
      ]);
    });

    it('takes the policy and remainder handling from config', async () => {
      const collecting = await createService({ batchPolicy: 'collect', keepRemainder: true });
      const response = collecting.parseBatch(batchDto({ text: `${CATALOG}\nTESTSAT-4` }));
      expect(response.records).toHaveLength(3);
      expect(response.errors.map((e) => [e.index, e.error])).toEqual([[3, 'MalformedLineError']]);
    });
  });

  describe('orbit', () => {
    it('returns elements and the state at epoch', () => {
      const response = service.orbit(tleDto());
      expect(response.epoch).toBe('2019-09-06T01:10:02.796672Z');
      expect(response.ecc).toBe(0.0007999);
      expect(response.position).toHaveLength(3);
      expect(Math.hypot(...response.position)).toBeCloseTo(6790.339076645899, 6);
      expect(Math.hypot(...response.velocity)).toBeCloseTo(7.663494926011246, 9);
    });
  });

  describe('quantities', () => {
    it('returns every field with its unit', () => {
      const response = service.quantities(tleDto());
      expect(response.name).toBe('ISS (ZARYA)');
      expect(response.fields.revNumber).toBe(18780);
      expect(response.fields.eccentricity).toBe(0.0007999);
      expect(unit(String(response.fields.inclination)).toNumber('deg')).toBeCloseTo(51.6464, 8);
      expect(unit(response.semiMajorAxis).toNumber('km')).toBeCloseTo(6793.584702357316, 6);
      expect(unit(response.trueAnomaly).toNumber('deg')).toBeCloseTo(53.36282588304321, 8);
    });

    it('writes the semi-major axis in meters and the true anomaly in degrees', () => {
      const response = service.quantities(tleDto());
      expect(response.semiMajorAxis).toMatch(/^6793584\.70\d* m$/);
      expect(response.trueAnomaly).toMatch(/^53\.3628\d* deg$/);
    });
  });
});
