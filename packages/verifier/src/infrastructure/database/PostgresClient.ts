import pg from 'pg';

const { Pool } = pg;

let pool: pg.Pool | null = null;

/**
 * PostgreSQL コネクションプールを取得
 *
 * 初回呼び出し時の接続文字列でシングルトンの Pool を作る
 */
export function getPool(databaseUrl: string): pg.Pool {
  if (!pool) {
    pool = new Pool({
      connectionString: databaseUrl,
      max: 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
    });

    pool.on('error', (err) => {
      console.error('❌ [PostgreSQL] Unexpected pool error:', err);
    });
  }

  return pool;
}

/**
 * PostgreSQL コネクションプールを閉じる
 */
export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
