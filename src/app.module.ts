import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { AppController } from './app.controller';
import { tleConfig } from './config/configuration';
import { validate } from './config/env.validation';
import { OrbitService } from './orbit.service';
import { TleService } from './tle.service';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [tleConfig],
      validate,
    }),
  ],
  controllers: [AppController],
  providers: [TleService, OrbitService],
  exports: [TleService, OrbitService],
})
export class AppModule {}
