import { readPackageAsset } from '../assets.js';
import { getPool } from './pool.js';
import type { PoolLike } from './pool.js';

const MIGRATIONS = ['sql/001_layers.sql'];

/** Applies the layer schema. Every statement is idempotent, so this runs on each boot. */
export async function applySchema(pool: PoolLike = getPool()): Promise<void> {
  let statements = 0;
  for (const file of MIGRATIONS) {
    const sql = readPackageAsset(file);
    // Split on semicolons, skip comment lines and blank statements
    const parts = sql
      .split(';')
      .map((s) => s.replace(/--.*$/gm, '').trim())
      .filter((s) => s.length > 0);
    for (const stmt of parts) {
      await pool.query(stmt);
    }
    statements += parts.length;
  }
  console.log(`[pg] layer schema applied (${statements} statements)`);
}
