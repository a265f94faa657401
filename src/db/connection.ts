import pg from 'pg';
import { DatabaseError } from '../errors.js';

/**
 * Open a client for a libpq connection string or URI.
 */
export async function createConnection(connectionString: string): Promise<pg.Client> {
  const client = new pg.Client({ connectionString });
  try {
    await client.connect();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new DatabaseError(`Failed to connect: ${message}`, { cause: error });
  }
  return client;
}

/**
 * Close the database connection.
 */
export async function closeConnection(client: pg.Client): Promise<void> {
  await client.end();
}

/**
 * Run a function with an open connection, ensuring it's closed afterward.
 */
export async function withConnection<T>(connectionString: string, fn: (client: pg.Client) => Promise<T>): Promise<T> {
  const client = await createConnection(connectionString);
  try {
    return await fn(client);
  } finally {
    await closeConnection(client);
  }
}
