import { Global, Logger, Module } from '@nestjs/common';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import * as schema from './schema/index.js';

export const DB = Symbol('DB');
export type DrizzleDB = NodePgDatabase<typeof schema>;

/** `null` when DATABASE_URL is unset; postgres-only features switch off then. */
export type OptionalDB = DrizzleDB | null;

@Global()
@Module({
  providers: [
    {
      provide: DB,
      useFactory: (): OptionalDB => {
        const connectionString = process.env.DATABASE_URL;
        if (!connectionString) {
          new Logger('DrizzleModule').log('DATABASE_URL not set, running without postgres');
          return null;
        }
        const pool = new Pool({ connectionString });
        return drizzle(pool, { schema });
      },
    },
  ],
  exports: [DB],
})
export class DrizzleModule {}
