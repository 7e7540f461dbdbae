// src/db/db.ts
import type Database from 'better-sqlite3';
import { dirname, resolve } from 'path';
import { mkdirSync, existsSync } from 'fs';
import { openDatabase } from './schema.js';

// Environment variable for DB path, defaults to ./data/assistant.db
// In Docker, this will be mounted as a volume for persistence
const DB_PATH = resolve(process.env.DB_PATH || './data/assistant.db');

// Ensure data directory exists
const dataDir = dirname(DB_PATH);
if (!existsSync(dataDir)) {
  mkdirSync(dataDir, { recursive: true });
}

const db: Database.Database = openDatabase(DB_PATH);

export default db;
