import { Module } from '@nestjs/common';
import { join } from 'path';
import { z } from 'zod';
import { DB, type OptionalDB } from '../db/drizzle.module.js';
import { ConfigurationError } from '../common/errors/game-errors.js';
import { SaveStore } from './save-store.js';
import { FileSaveStore } from './file-save.store.js';
import { PgSaveStore } from './pg-save.store.js';
import { SaveService } from './save.service.js';

const PersistenceEnvSchema = z.object({
  SAVE_BACKEND: z.enum(['file', 'postgres']).default('file'),
  SAVE_DIR: z.string().min(1).default(join(process.cwd(), 'saves')),
});

export function createSaveStore(env: Record<string, string | undefined>, db: OptionalDB): SaveStore {
  const result = PersistenceEnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigurationError('Invalid persistence configuration', {
      issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }
  const { SAVE_BACKEND, SAVE_DIR } = result.data;
  if (SAVE_BACKEND === 'postgres') {
    if (!db) {
      throw new ConfigurationError('SAVE_BACKEND=postgres requires DATABASE_URL');
    }
    return new PgSaveStore(db);
  }
  return new FileSaveStore(SAVE_DIR);
}

@Module({
  providers: [
    {
      provide: SaveStore,
      inject: [DB],
      useFactory: (db: OptionalDB): SaveStore => createSaveStore(process.env, db),
    },
    SaveService,
  ],
  exports: [SaveService],
})
export class PersistenceModule {}
