import { ApiProperty } from '@nestjs/swagger';
import { IsBoolean, IsNotEmpty, IsOptional, IsString } from 'class-validator';

export class ParseTleDto {
  @ApiProperty({
    example: 'ISS (ZARYA)',
    description: 'Name line (line 0); surrounding blanks are trimmed',
  })
  @IsString()
  name!: string;

  @ApiProperty({
    example: '1 25544U 98067A   19249.04864348  .00001909  00000-0  40858-4 0  9990',
    description: 'First element line',
  })
  @IsString()
  @IsNotEmpty()
  line1!: string;

  @ApiProperty({
    example: '2 25544  51.6464 320.1755 0007999  10.9066  53.2893 15.50437522187805',
    description: 'Second element line',
  })
  @IsString()
  @IsNotEmpty()
  line2!: string;

  @ApiProperty({
    example: true,
    description: 'Include the semi-major axis `a` (km) and true anomaly `nu` (deg)',
    required: false,
  })
  @IsBoolean()
  @IsOptional()
  computed?: boolean;

  @ApiProperty({
    example: true,
    description: 'Include the epoch as an ISO8601 timestamp',
    required: false,
  })
  @IsBoolean()
  @IsOptional()
  epoch?: boolean;

  @ApiProperty({
    example: false,
    description: 'Reject lines whose checksum does not match. Defaults to TLE_VERIFY_CHECKSUM.',
    required: false,
  })
  @IsBoolean()
  @IsOptional()
  verifyChecksum?: boolean;
}
