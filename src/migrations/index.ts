import { Knex } from 'knex';
import * as commerceBaseline from './001_commerce_baseline';

interface NamedMigration {
  name: string;
  migration: Knex.Migration;
}

const MIGRATIONS: NamedMigration[] = [{ name: '001_commerce_baseline', migration: commerceBaseline }];

/**
 * Migrations compiled into the build, so knex does not scan the filesystem.
 */
export const commerceMigrationSource: Knex.MigrationSource<NamedMigration> = {
  getMigrations: async () => MIGRATIONS,
  getMigrationName: (entry) => entry.name,
  getMigration: async (entry) => entry.migration,
};
