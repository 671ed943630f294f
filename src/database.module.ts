import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool } from 'pg';
import * as schema from './db/schema';
import { NodePgDatabase, drizzle } from 'drizzle-orm/node-postgres';

export const DRIZLE = Symbol('drizzle-connection');

@Module({
  providers: [
    {
      provide: DRIZLE,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): NodePgDatabase<typeof schema> => {
        const logger = new Logger('DatabaseModule');
        const pool = new Pool({
          connectionString: configService.getOrThrow<string>('DATABASE_URL'),
        });
        pool.on('error', (err) => logger.error(`Idle client error: ${err.message}`));
        return drizzle(pool, { schema });
      },
    },
  ],
  exports: [DRIZLE],
})
export class DatabaseModule {}
