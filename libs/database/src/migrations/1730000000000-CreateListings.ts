import { MigrationInterface, QueryRunner } from 'typeorm';
import { LISTINGS_TABLE } from '@libs/common';
import { LISTING_FIELD_NAMES, LISTING_FIELDS, SqlStorageClass, sqlStorageClass, toColumnName } from '@libs/models';

const POSTGRES_TYPES: Record<SqlStorageClass, string> = {
  INTEGER: 'INTEGER',
  REAL: 'DOUBLE PRECISION',
  TEXT: 'TEXT',
  BLOB: 'BYTEA',
};

export class CreateListings1730000000000 implements MigrationInterface {
  name = 'CreateListings1730000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    const postgres = queryRunner.connection.options.type === 'postgres';

    const columns = LISTING_FIELD_NAMES.map((field) => {
      const kind = LISTING_FIELDS[field];
      const storageClass = sqlStorageClass(kind);
      const type = postgres ? POSTGRES_TYPES[storageClass] : storageClass;
      const constraint = field === 'id' ? 'NOT NULL PRIMARY KEY' : `NOT NULL DEFAULT ${kind === 'text' ? "''" : '0'}`;

      return `"${toColumnName(field)}" ${type} ${constraint}`;
    });

    await queryRunner.query(`CREATE TABLE IF NOT EXISTS "${LISTINGS_TABLE}" (${columns.join(', ')})`);

    await queryRunner.query(`
      CREATE INDEX IF NOT EXISTS "IDX_listings_portal_active"
      ON "${LISTINGS_TABLE}" ("portal", "active")
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS "${LISTINGS_TABLE}"`);
  }
}
