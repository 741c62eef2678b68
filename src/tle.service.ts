import { HttpException, HttpStatus, Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';

import { tleConfig } from './config/configuration';
import { ParseBatchDto } from './dto/parse-batch.dto';
import { ParseTleDto } from './dto/parse-tle.dto';
import {
  BatchFailure,
  BatchResponse,
  OrbitResponse,
  QuantitiesResponse,
  TleResponse,
} from './dto/tle-response.dto';
import { OrbitService } from './orbit.service';
import {
  BatchParseError,
  TleRecord,
  UnitTaggedRecord,
  isNumericError,
  isParseError,
  parseAll,
  parseAllSettled,
} from './tle';

// plain notation up to 1e12, so a semi-major axis prints in meters without an exponent
const QUANTITY_FORMAT = { upperExp: 12 };

@Injectable()
export class TleService {
  private readonly logger = new Logger(TleService.name);

  constructor(
    @Inject(tleConfig.KEY)
    private readonly config: ConfigType<typeof tleConfig>,
    private readonly orbitService: OrbitService,
  ) {}

  parse(dto: ParseTleDto): TleResponse {
    const record = this.fromDto(dto);
    return this.guard(() => this.toResponse(record, dto.computed, dto.epoch));
  }

  /**
   * Batch logic:
   *  - Splits the text into name / line 1 / line 2 groups
   *  - "abort": the first bad group fails the whole request
   *  - "collect": bad groups are reported next to the good ones
   */
  parseBatch(dto: ParseBatchDto): BatchResponse {
    const options = {
      keepRemainder: dto.keepRemainder ?? this.config.keepRemainder,
      verifyChecksum: dto.verifyChecksum ?? this.config.verifyChecksum,
    };
    const policy = dto.policy ?? this.config.batchPolicy;

    if (policy === 'abort') {
      const records = this.guard(() => parseAll(dto.text, options));
      this.logger.debug(`Parsed batch of ${records.length} records`);
      return {
        records: this.guard(() => records.map((record) => this.toResponse(record, dto.computed))),
        errors: [],
      };
    }

    const records: TleResponse[] = [];
    const errors: BatchFailure[] = [];
    for (const result of parseAllSettled(dto.text, options)) {
      if (result.ok) {
        records.push(this.guard(() => this.toResponse(result.record, dto.computed)));
      } else {
        this.logger.warn(`Record #${result.index} rejected: ${result.error.message}`);
        errors.push({
          index: result.index,
          error: result.error.name,
          message: result.error.message,
          lines: result.lines,
        });
      }
    }
    this.logger.debug(`Parsed batch: ${records.length} records, ${errors.length} rejected`);
    return { records, errors };
  }

  orbit(dto: ParseTleDto): OrbitResponse {
    const record = this.fromDto(dto);
    return this.guard<OrbitResponse>(() => {
      const orbit = this.orbitService.toOrbit(record);
      const { r, v } = this.orbitService.toStateVector(orbit);
      return {
        ...orbit,
        epoch: orbit.epoch.toISOString(),
        position: [r.x, r.y, r.z],
        velocity: [v.x, v.y, v.z],
      };
    });
  }

  quantities(dto: ParseTleDto): QuantitiesResponse {
    const record = UnitTaggedRecord.fromRecord(this.fromDto(dto));
    return this.guard<QuantitiesResponse>(() => {
      const fields: Record<string, string | number> = {};
      for (const [key, value] of Object.entries(record.quantities)) {
        fields[key] = typeof value === 'object' ? value.toString() : value;
      }
      return {
        name: record.name,
        fields,
        semiMajorAxis: record.semiMajorAxis.format(QUANTITY_FORMAT),
        trueAnomaly: record.trueAnomaly.format(QUANTITY_FORMAT),
      };
    });
  }

  private fromDto(dto: ParseTleDto): TleRecord {
    const record = this.guard(() =>
      TleRecord.fromLines(dto.name, dto.line1, dto.line2, {
        verifyChecksum: dto.verifyChecksum ?? this.config.verifyChecksum,
      }),
    );
    this.logger.debug(`Parsed ${record.toString()}`);
    return record;
  }

  private toResponse(record: TleRecord, computed = false, epoch = false): TleResponse {
    const { epoch: at, ...mapping } = record.asMapping({ computed, epoch });
    return at === undefined ? mapping : { ...mapping, epoch: at.toISOString() };
  }

  /**
   * Runs `fn`, turning domain errors into HTTP errors: bad input is a 400,
   * a derived quantity that cannot be computed is a 422.
   */
  private guard<T>(fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (isParseError(err) || err instanceof BatchParseError) {
        throw new HttpException(err.message, HttpStatus.BAD_REQUEST);
      }
      if (isNumericError(err)) {
        throw new HttpException(err.message, HttpStatus.UNPROCESSABLE_ENTITY);
      }
      throw err;
    }
  }
}
