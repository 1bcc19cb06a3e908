import type { SqlClient } from './client.js';

/**
 * Ensures the `libra_logs` table and its indexes exist.
 *
 * Lightweight bootstrap via raw SQL for local development; mirrors
 * `schema.ts`. Production deployments run drizzle-kit migrations instead.
 */
export async function ensureSchema(sql: SqlClient): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS libra_logs (
      sequence     BIGSERIAL PRIMARY KEY,
      model        VARCHAR(64)      NOT NULL,
      device_id    VARCHAR(255)     NOT NULL,
      timestamp    VARCHAR(64)      NOT NULL,
      action       VARCHAR(64)      NOT NULL,
      amount       DOUBLE PRECISION NOT NULL,
      location     VARCHAR(255)     NOT NULL,
      ingredient   VARCHAR(255)     NOT NULL,
      synced       BOOLEAN          NOT NULL DEFAULT false
    )
  `);

  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_libra_logs_device_sequence ON libra_logs (device_id, sequence)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_libra_logs_action ON libra_logs (action)`);
}
