/**
 * Database connection — opens the SQLite file, sets pragmas and applies the schema.
 *
 * Pass ':memory:' for an ephemeral database (tests).
 */

import fs from 'node:fs'
import path from 'node:path'
import Database, { type Database as DatabaseType } from 'better-sqlite3'
import { applySchema } from './schema.js'

export type { DatabaseType }

export function createDatabase(dbPath: string): DatabaseType {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true })
  }

  const db = new Database(dbPath)

  // DELETE journal mode: the data directory may sit on a network volume where
  // WAL's shared-memory semantics are not guaranteed.
  db.pragma('journal_mode = DELETE')
  db.pragma('synchronous = FULL')
  db.pragma('foreign_keys = ON')

  applySchema(db)
  return db
}
