import { Module } from '@nestjs/common';
import { WeatherClient } from './weather.client';

@Module({
  providers: [WeatherClient],
  exports: [WeatherClient],
})
export class WeatherModule {}
