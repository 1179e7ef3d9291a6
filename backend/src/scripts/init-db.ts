import { readFile } from 'fs/promises';
import path from 'path';
import { createPool } from '../config/database';
import { config } from '../config/environment';

// Run from the repository root
const SCHEMA_PATH = path.resolve(process.cwd(), 'backend/database/schema.sql');

async function initDatabase(): Promise<void> {
  const pool = createPool(config);

  try {
    const schema = await readFile(SCHEMA_PATH, 'utf8');
    await pool.query(schema);
    console.log(`Applied schema from ${SCHEMA_PATH}`);
  } finally {
    await pool.end();
  }
}

initDatabase().catch((error: unknown) => {
  console.error('Database initialisation failed:', error);
  process.exit(1);
});
