import { config } from '../config.js';
import { openDatabase } from './connection.js';

// Process-wide database handle. Modules that need storage receive it through
// their constructors; only the entry point imports it directly.
const handle = openDatabase(config.dbPath);

export const db = handle.db;
export const sqlite = handle.sqlite;
