import { drizzle } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import { poolConfigFromEnv } from './pool-config.js';
import * as schema from './schema.js';

const { Pool } = pg;

// The pool connects lazily, so importing this module opens no connection
export const pool = new Pool(poolConfigFromEnv());

export const db = drizzle(pool, { schema });

/**
 * Check if the database connection is healthy
 */
export async function checkDatabaseHealth(): Promise<boolean> {
  try {
    const client = await pool.connect();
    try {
      await client.query('SELECT 1');
      return true;
    } finally {
      client.release();
    }
  } catch (error) {
    console.error('Database health check failed:', error);
    return false;
  }
}

/**
 * Gracefully close all database connections
 */
export async function closeDatabaseConnection(): Promise<void> {
  console.log('Closing database connections...');
  try {
    await pool.end();
    console.log('Database connections closed successfully');
  } catch (error) {
    console.error('Error closing database connections:', error);
    throw error;
  }
}

/**
 * Initialize database connection
 */
export async function initializeDatabase(): Promise<void> {
  console.log('Initializing database connection...');

  const isHealthy = await checkDatabaseHealth();
  if (!isHealthy) {
    throw new Error('Failed to connect to database');
  }

  console.log('Database connection established successfully');
}
