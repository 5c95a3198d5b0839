import 'dotenv/config';
import { readFile } from 'fs/promises';
import path from 'path';
import { config } from '../config';
import { createDatabase } from '../lib/db';

const SQL_DIR = path.resolve(__dirname, '../../db');
const FILES = ['schema.sql', 'seed.sql'];

async function migrate() {
  const database = createDatabase(config.database);

  try {
    for (const file of FILES) {
      const sql = await readFile(path.join(SQL_DIR, file), 'utf8');
      await database.query(sql);
      console.log(`Applied ${file}`);
    }
  } finally {
    await database.close();
  }
}

migrate().catch((err: unknown) => {
  console.error('Migration failed', err);
  process.exit(1);
});
