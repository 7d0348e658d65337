import { Module } from '@nestjs/common';
import { RngService } from './rng/rng.service.js';
import { WindService } from './wind/wind.service.js';
import { WeatherTypeService } from './weather/weather-type.service.js';
import { TemperatureEventService } from './temperature/temperature-event.service.js';
import { DailyWeatherService } from './daily/daily-weather.service.js';

const providers = [
  // 난수
  RngService,
  // 개별 생성기
  WindService,
  WeatherTypeService,
  TemperatureEventService,
  // 하루 조립
  DailyWeatherService,
];

@Module({
  providers,
  exports: providers,
})
export class EngineModule {}
