import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { drizzle, MySql2Database } from 'drizzle-orm/mysql2';
import { createPool, Pool } from 'mysql2/promise';
import { getInteger } from '../common/config/config.utils';
import * as schema from './schema';

export const DATABASE_CONNECTION = 'DATABASE_CONNECTION';

export type Database = MySql2Database<typeof schema>;

@Global()
@Module({
  providers: [
    {
      provide: DATABASE_CONNECTION,
      useFactory: (configService: ConfigService): Database => {
        const pool: Pool = createPool({
          host: configService.get<string>('DB_HOST', 'localhost'),
          port: getInteger(configService, 'DB_PORT', 3306),
          user: configService.get<string>('DB_USER', 'root'),
          password: configService.get<string>('DB_PASSWORD', 'root'),
          database: configService.get<string>('DB_NAME', 'document_analysis_db'),
          waitForConnections: true,
          connectionLimit: getInteger(configService, 'DB_POOL_MAX', 10),
          queueLimit: 0,
          charset: 'utf8mb4',
        });

        return drizzle(pool, { schema, mode: 'default' });
      },
      inject: [ConfigService],
    },
  ],
  exports: [DATABASE_CONNECTION],
})
export class DatabaseModule {}
