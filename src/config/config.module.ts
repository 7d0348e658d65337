import { Global, Module } from '@nestjs/common';
import { WeatherConfigService } from './weather-config.service.js';

@Global()
@Module({
  providers: [
    {
      provide: WeatherConfigService,
      useFactory: () => new WeatherConfigService(),
    },
  ],
  exports: [WeatherConfigService],
})
export class ConfigModule {}
