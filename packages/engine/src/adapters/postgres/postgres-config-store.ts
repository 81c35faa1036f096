import { Pool, type PoolConfig } from "pg"
import { z } from "zod"
import { ConfigNotFoundError, ConfigStoreError } from "../../core/errors"
import type { ConfigId, ConfigStore, ConfigSummary } from "../../ports/config-store"

export type PgQueryable = {
  query: (sql: string, params?: unknown[]) => Promise<{ rows: Array<Record<string, unknown>> }>
}

const SCHEMA_SQL = [
  `CREATE TABLE IF NOT EXISTS sys_cfg (
    config_data_id BIGSERIAL PRIMARY KEY,
    config_data_json TEXT NOT NULL,
    config_comments TEXT NOT NULL DEFAULT '',
    sys_create_dt TIMESTAMPTZ NOT NULL DEFAULT now()
  )`,
  `CREATE TABLE IF NOT EXISTS sys_cfg_default (
    singleton BOOLEAN PRIMARY KEY DEFAULT TRUE CHECK (singleton),
    config_data_id BIGINT NOT NULL REFERENCES sys_cfg (config_data_id)
  )`,
] as const

// BIGINT columns arrive as strings.
const IdColumn = z.coerce.number().int().positive()

const IdRow = z.object({ config_data_id: IdColumn })
const DocumentRow = z.object({ config_data_json: z.string() })
const SummaryRow = z.object({
  config_data_id: IdColumn,
  config_comments: z.string(),
  sys_create_dt: z.coerce.date(),
})

/** Snapshots in `sys_cfg`, the default pointer in the one-row `sys_cfg_default`. */
export class PostgresConfigStore implements ConfigStore {
  constructor(private readonly db: PgQueryable) {}

  static fromPool(pool: Pool): PostgresConfigStore {
    return new PostgresConfigStore({ query: (sql, params) => pool.query(sql, params) })
  }

  /** Lazy; no connection is opened until the first query. */
  static createPool(config: PoolConfig): Pool {
    return new Pool(config)
  }

  async ensureSchema(): Promise<void> {
    for (const sql of SCHEMA_SQL) await this.run("ensureSchema", sql)
  }

  async getDefaultConfigId(): Promise<ConfigId | null> {
    const rows = await this.run(
      "getDefaultConfigId",
      "SELECT config_data_id FROM sys_cfg_default LIMIT 1",
    )
    const first = rows[0]
    if (first === undefined) return null

    return this.parse("getDefaultConfigId", IdRow, first).config_data_id
  }

  async getConfig(id: ConfigId): Promise<string> {
    const rows = await this.run(
      "getConfig",
      "SELECT config_data_json FROM sys_cfg WHERE config_data_id = $1",
      [id],
    )
    const first = rows[0]
    if (first === undefined) throw ConfigNotFoundError.forId(id)

    return this.parse("getConfig", DocumentRow, first).config_data_json
  }

  async addConfig(document: string, comment: string): Promise<ConfigId> {
    const rows = await this.run(
      "addConfig",
      "INSERT INTO sys_cfg (config_data_json, config_comments) VALUES ($1, $2) RETURNING config_data_id",
      [document, comment],
    )

    return this.parse("addConfig", IdRow, rows[0]).config_data_id
  }

  async setDefaultConfigId(id: ConfigId): Promise<void> {
    const exists = await this.run(
      "setDefaultConfigId",
      "SELECT config_data_id FROM sys_cfg WHERE config_data_id = $1",
      [id],
    )
    if (exists.length === 0) throw ConfigNotFoundError.forId(id)

    await this.run(
      "setDefaultConfigId",
      `INSERT INTO sys_cfg_default (singleton, config_data_id) VALUES (TRUE, $1)
       ON CONFLICT (singleton) DO UPDATE SET config_data_id = EXCLUDED.config_data_id`,
      [id],
    )
  }

  async listConfigs(): Promise<ConfigSummary[]> {
    const rows = await this.run(
      "listConfigs",
      "SELECT config_data_id, config_comments, sys_create_dt FROM sys_cfg ORDER BY config_data_id",
    )

    return rows.map((row) => {
      const parsed = this.parse("listConfigs", SummaryRow, row)
      return {
        id: parsed.config_data_id,
        comment: parsed.config_comments,
        createdAt: parsed.sys_create_dt,
      }
    })
  }

  private async run(
    operation: string,
    sql: string,
    params?: unknown[],
  ): Promise<Array<Record<string, unknown>>> {
    try {
      const result = await this.db.query(sql, params)
      return result.rows
    } catch (err) {
      throw ConfigStoreError.unavailable(operation, err)
    }
  }

  private parse<T>(operation: string, schema: z.ZodType<T>, row: unknown): T {
    const parsed = schema.safeParse(row)
    if (!parsed.success) throw ConfigStoreError.unavailable(operation, parsed.error)

    return parsed.data
  }
}
