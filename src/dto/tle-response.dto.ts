import { ApiProperty } from '@nestjs/swagger';

import { Classification } from '../tle';

/** One record as returned by the API */
export class TleResponse {
  @ApiProperty({ example: 'ISS (ZARYA)' })
  name!: string;

  @ApiProperty({ example: '25544' })
  noradId!: string;

  @ApiProperty({ enum: ['U', 'C', 'S'], example: 'U' })
  classification!: Classification;

  @ApiProperty({ example: '98067A' })
  internationalDesignator!: string;

  @ApiProperty({ example: 2019 })
  epochYear!: number;

  @ApiProperty({ example: 249.04864348 })
  epochDay!: number;

  @ApiProperty({ example: 1.909e-5 })
  meanMotionDot!: number;

  @ApiProperty({ example: 0 })
  meanMotionDdot!: number;

  @ApiProperty({ example: 4.0858e-5 })
  bstar!: number;

  @ApiProperty({ example: 999 })
  elementSetNumber!: number;

  @ApiProperty({ example: 51.6464 })
  inclination!: number;

  @ApiProperty({ example: 320.1755 })
  raan!: number;

  @ApiProperty({ example: 0.0007999 })
  eccentricity!: number;

  @ApiProperty({ example: 10.9066 })
  argPerigee!: number;

  @ApiProperty({ example: 53.2893 })
  meanAnomaly!: number;

  @ApiProperty({ example: 15.50437522 })
  meanMotion!: number;

  @ApiProperty({ example: 18780 })
  revNumber!: number;

  @ApiProperty({ example: 6793.58, required: false, description: 'Semi-major axis (km)' })
  a?: number;

  @ApiProperty({ example: 53.36, required: false, description: 'True anomaly (deg)' })
  nu?: number;

  @ApiProperty({ example: '2019-09-06T01:10:02.796672Z', required: false })
  epoch?: string;
}

export class BatchFailure {
  @ApiProperty({ example: 1, description: 'Position of the record in the batch' })
  index!: number;

  @ApiProperty({ example: 'FieldDecodeError' })
  error!: string;

  @ApiProperty({ example: 'Cannot decode field "eccentricity" from "00O7999": expected digits only' })
  message!: string;

  @ApiProperty({ type: [String] })
  lines!: string[];
}

export class BatchResponse {
  @ApiProperty({ type: [TleResponse] })
  records!: TleResponse[];

  @ApiProperty({ type: [BatchFailure] })
  errors!: BatchFailure[];
}

export class OrbitResponse {
  @ApiProperty({ example: 6793.58, description: 'Semi-major axis (km)' })
  a!: number;

  @ApiProperty({ example: 0.0007999 })
  ecc!: number;

  @ApiProperty({ example: 51.6464, description: 'Inclination (deg)' })
  inc!: number;

  @ApiProperty({ example: 320.1755, description: 'RAAN (deg)' })
  raan!: number;

  @ApiProperty({ example: 10.9066, description: 'Argument of perigee (deg)' })
  argp!: number;

  @ApiProperty({ example: 53.36, description: 'True anomaly (deg)' })
  nu!: number;

  @ApiProperty({ example: '2019-09-06T01:10:02.796672Z' })
  epoch!: string;

  @ApiProperty({ example: [4502.1, -2954.3, 4018.9], description: 'ECI position (km)' })
  position!: [number, number, number];

  @ApiProperty({ example: [4.5, 5.8, 1.7], description: 'ECI velocity (km/s)' })
  velocity!: [number, number, number];
}

export class QuantitiesResponse {
  @ApiProperty({ example: 'ISS (ZARYA)' })
  name!: string;

  @ApiProperty({
    example: { inclination: '51.6464 deg', meanMotion: '15.50437522 rev / day' },
    description: 'Every field, quantities formatted with their unit',
  })
  fields!: Record<string, string | number>;

  @ApiProperty({ example: '6793584.702357316 m' })
  semiMajorAxis!: string;

  @ApiProperty({ example: '53.36282588304321 deg' })
  trueAnomaly!: string;
}
