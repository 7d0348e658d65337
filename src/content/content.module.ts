import { Global, Module } from '@nestjs/common';
import { WeatherTablesService } from './weather-tables.service.js';

@Global()
@Module({
  providers: [WeatherTablesService],
  exports: [WeatherTablesService],
})
export class ContentModule {}
