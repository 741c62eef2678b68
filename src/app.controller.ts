import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiOkResponse, ApiOperation, ApiTags } from '@nestjs/swagger';

import { ParseBatchDto } from './dto/parse-batch.dto';
import { ParseTleDto } from './dto/parse-tle.dto';
import { BatchResponse, OrbitResponse, QuantitiesResponse, TleResponse } from './dto/tle-response.dto';
import { TleService } from './tle.service';

@ApiTags('tle')
@Controller('v01/tle')
export class AppController {
  constructor(private readonly tleService: TleService) {}

  @Post('parse')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Parses a single element set, optionally with semi-major axis, true anomaly and epoch',
  })
  @ApiOkResponse({ type: TleResponse })
  parse(@Body() dto: ParseTleDto): TleResponse {
    return this.tleService.parse(dto);
  }

  @Post('batch')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Parses consecutive name / line 1 / line 2 groups',
  })
  @ApiOkResponse({ type: BatchResponse })
  batch(@Body() dto: ParseBatchDto): BatchResponse {
    return this.tleService.parseBatch(dto);
  }

  @Post('orbit')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Returns the classical orbital elements and the two-body ECI state at epoch',
  })
  @ApiOkResponse({ type: OrbitResponse })
  orbit(@Body() dto: ParseTleDto): OrbitResponse {
    return this.tleService.orbit(dto);
  }

  @Post('quantities')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Returns every field with its physical unit',
  })
  @ApiOkResponse({ type: QuantitiesResponse })
  quantities(@Body() dto: ParseTleDto): QuantitiesResponse {
    return this.tleService.quantities(dto);
  }
}
