import 'dotenv/config';
import fs from 'fs';
import path from 'path';
import { closeDatabase, pool } from '../db';
import { logger } from '../utils/logger';

const SCHEMA_PATH = path.resolve(process.cwd(), 'src/db/schema.sql');

/**
 * Apply the table DDL. Every statement is `IF NOT EXISTS`, so running it again is harmless.
 */
async function main() {
  try {
    const sql = fs.readFileSync(SCHEMA_PATH, 'utf-8');
    await pool.query(sql);
    logger.info(`[DB] Schema applied from ${SCHEMA_PATH}`);
    await closeDatabase();
    process.exit(0);
  } catch (error) {
    logger.error('[DB] Failed to apply schema', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}

void main();
