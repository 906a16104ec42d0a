import { Pool, PoolClient, types } from 'pg';
import { getConfig } from '../config';

// Keep DATE columns as 'YYYY-MM-DD' strings instead of local-midnight Date objects
const DATE_OID = 1082;
types.setTypeParser(DATE_OID, (value: string) => value);

/**
 * PostgreSQL connection pool for database operations.
 * Configured via DATABASE_URL environment variable.
 * Automatically uses test database when NODE_ENV=test.
 */
let pool: Pool | null = null;

const getPool = (): Pool => {
  if (!pool) {
    const { databaseUrl } = getConfig();
    if (!databaseUrl) {
      throw new Error('Missing required database environment variable (DATABASE_URL)');
    }
    pool = new Pool({
      connectionString: databaseUrl,
      // ssl: { rejectUnauthorized: false }, // Uncomment if using SSL with self-signed certs
    });
  }
  return pool;
};

/**
 * Tests the database connection by executing a simple query.
 * Should be called during application startup to ensure database connectivity.
 *
 * @throws {Error} If database connection fails
 */
const testConnection = async (): Promise<void> => {
  try {
    const db = getPool();
    await db.query('SELECT NOW()');
    console.log('✅ Database connection successful.');
  } catch (err) {
    console.error('❌ Database connection failed:', err);
    throw err; // Rethrow to be caught by the caller
  }
};

/**
 * Runs `work` on a dedicated pooled client inside BEGIN/COMMIT.
 * Any error rolls the transaction back and is rethrown; the client is always released.
 *
 * @example
 * await withTransaction(async (client) => {
 *   await client.query('UPDATE invoices SET ... WHERE id = $1', [id]);
 * });
 */
const withTransaction = async <T>(work: (client: PoolClient) => Promise<T>): Promise<T> => {
  const client = await getPool().connect();
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
};

/**
 * Runs `work` on a dedicated pooled client without opening a transaction.
 */
const withClient = async <T>(work: (client: PoolClient) => Promise<T>): Promise<T> => {
  const client = await getPool().connect();
  try {
    return await work(client);
  } finally {
    client.release();
  }
};

/**
 * Closes the database connection pool.
 * Should be called when shutting down the application.
 */
const closeDbConnection = async (): Promise<void> => {
  if (pool) {
    await pool.end();
    pool = null;
    console.log('✅ Database connection closed.');
  }
};

export { testConnection, withClient, withTransaction, closeDbConnection };
