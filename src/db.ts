import { Pool, type PoolClient, types } from 'pg';

// DATE columns stay "YYYY-MM-DD" strings; expiry comparisons are on calendar dates.
types.setTypeParser(1082, (value) => value);

export function createPool(connectionString: string): Pool {
  const pool = new Pool({ connectionString });
  pool.on('error', (err) => {
    console.error('Unexpected DB pool error', err);
  });
  return pool;
}

export async function withTransaction<T>(
  handler: (client: PoolClient) => Promise<T>,
  pool: Pool
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await handler(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}
