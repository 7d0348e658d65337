import { Global, Module } from '@nestjs/common';
import { drizzle } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import { WeatherConfigService } from '../config/weather-config.service.js';
import * as schema from './schema/index.js';

export const DB = Symbol('DB');
export type DrizzleDB = ReturnType<typeof drizzle<typeof schema>>;

@Global()
@Module({
  providers: [
    {
      provide: DB,
      inject: [WeatherConfigService],
      useFactory: (config: WeatherConfigService) => {
        const pool = new Pool({
          connectionString: config.get().databaseUrl,
        });
        return drizzle(pool, { schema });
      },
    },
  ],
  exports: [DB],
})
export class DrizzleModule {}
