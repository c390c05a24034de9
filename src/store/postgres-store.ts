import type { Sql } from 'postgres';
import type { RecordFields, RecordStore } from '../types/record.js';
import { logger } from '../utils/logger.js';

export const KEY_COLUMN = 'game_key';

/**
 * Record store backed by one Postgres table. Recognized fields are the
 * table's columns, read once from information_schema.
 */
export class PostgresRecordStore implements RecordStore {
  private columns: ReadonlySet<string> | null = null;

  constructor(
    private readonly sql: Sql,
    private readonly table: string,
  ) {}

  async knownFields(): Promise<ReadonlySet<string>> {
    if (this.columns) return this.columns;

    let columns = await this.readColumns();
    if (columns.size === 0) {
      throw new Error(`Record table "${this.table}" not found; run the migrations first`);
    }
    if (!columns.has(KEY_COLUMN)) {
      logger.warn({ table: this.table }, `Adding missing ${KEY_COLUMN} column`);
      await this.sql`
        ALTER TABLE ${this.sql(this.table)} ADD COLUMN IF NOT EXISTS ${this.sql(KEY_COLUMN)} TEXT UNIQUE
      `;
      columns = await this.readColumns();
    }

    this.columns = columns;
    return columns;
  }

  async findIdByKey(key: string): Promise<string | null> {
    const [row] = await this.sql<{ id: string }[]>`
      SELECT id::text AS id FROM ${this.sql(this.table)}
      WHERE ${this.sql(KEY_COLUMN)} = ${key}
      LIMIT 1
    `;
    return row?.id ?? null;
  }

  async create(fields: RecordFields): Promise<string> {
    const [row] = await this.sql<{ id: string }[]>`
      INSERT INTO ${this.sql(this.table)} ${this.sql(fields)}
      RETURNING id::text AS id
    `;
    if (!row) throw new Error(`Insert into "${this.table}" returned no id`);
    return row.id;
  }

  async update(id: string, fields: RecordFields): Promise<void> {
    const touch = (await this.knownFields()).has('updated_at');
    await this.sql`
      UPDATE ${this.sql(this.table)}
      SET ${this.sql(fields)}${touch ? this.sql`, updated_at = NOW()` : this.sql``}
      WHERE id = ${id}::bigint
    `;
  }

  private async readColumns(): Promise<Set<string>> {
    const rows = await this.sql<{ column_name: string }[]>`
      SELECT column_name FROM information_schema.columns
      WHERE table_schema = current_schema() AND table_name = ${this.table}
    `;
    return new Set(rows.map((r) => r.column_name));
  }
}
