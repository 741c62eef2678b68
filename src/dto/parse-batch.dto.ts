import { ApiProperty } from '@nestjs/swagger';
import { IsBoolean, IsIn, IsNotEmpty, IsOptional, IsString } from 'class-validator';

import { BATCH_POLICIES, BatchPolicy } from '../config/configuration';

export class ParseBatchDto {
  @ApiProperty({
    example:
      'ISS (ZARYA)\n' +
      '1 25544U 98067A   19249.04864348  .00001909  00000-0  40858-4 0  9990\n' +
      '2 25544  51.6464 320.1755 0007999  10.9066  53.2893 15.50437522187805',
    description: 'Three lines per record: name, line 1, line 2',
  })
  @IsString()
  @IsNotEmpty()
  text!: string;

  @ApiProperty({
    example: false,
    description: 'Parse a short trailing group instead of dropping it. Defaults to TLE_KEEP_REMAINDER.',
    required: false,
  })
  @IsBoolean()
  @IsOptional()
  keepRemainder?: boolean;

  @ApiProperty({
    enum: BATCH_POLICIES,
    example: 'collect',
    description:
      '"abort" fails the request on the first bad record, "collect" reports failures per record. Defaults to TLE_BATCH_POLICY.',
    required: false,
  })
  @IsIn(BATCH_POLICIES)
  @IsOptional()
  policy?: BatchPolicy;

  @ApiProperty({
    example: false,
    description: 'Include `a` and `nu` for every record',
    required: false,
  })
  @IsBoolean()
  @IsOptional()
  computed?: boolean;

  @ApiProperty({ example: false, required: false })
  @IsBoolean()
  @IsOptional()
  verifyChecksum?: boolean;
}
