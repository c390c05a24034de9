import 'dotenv/config';
import { loadConfig } from '../src/config.js';
import { createSql } from '../src/db/pool.js';
import { runMigrations } from '../migrations/runner.js';

const config = loadConfig();
const sql = createSql(config.DATABASE_URL);
await runMigrations(sql);
await sql.end();
