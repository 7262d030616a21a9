/**
 * Database Migration Runner
 * Applies SQL migrations in order, tracking applied migrations
 */

import 'dotenv/config';
import { readdir, readFile } from 'fs/promises';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { getConnection, closeConnection } from './connection.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// SQL files stay in the source tree; the build does not copy them
const MIGRATIONS_DIR = join(__dirname, '..', '..', 'src', 'db', 'migrations');

interface Migration {
  name: string;
  sql: string;
}

interface AppliedMigration {
  name: string;
}

async function ensureMigrationsTable(): Promise<void> {
  const sql = getConnection();
  await sql`
    CREATE TABLE IF NOT EXISTS migrations (
      id SERIAL PRIMARY KEY,
      name VARCHAR(255) NOT NULL UNIQUE,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `;
}

async function getAppliedMigrations(): Promise<Set<string>> {
  const sql = getConnection();
  const results = await sql<AppliedMigration[]>`
    SELECT name FROM migrations ORDER BY id
  `;
  return new Set(results.map(r => r.name));
}

async function loadMigrations(): Promise<Migration[]> {
  const files = await readdir(MIGRATIONS_DIR);
  const sqlFiles = files
    .filter(f => f.endsWith('.sql'))
    .sort();

  const migrations: Migration[] = [];
  for (const file of sqlFiles) {
    const content = await readFile(join(MIGRATIONS_DIR, file), 'utf-8');
    migrations.push({
      name: file,
      sql: content,
    });
  }

  return migrations;
}

async function applyMigration(migration: Migration): Promise<void> {
  const sql = getConnection();

  console.log(`Applying migration: ${migration.name}`);

  // Run the migration in a transaction
  await sql.begin(async (tx) => {
    // Execute the migration SQL
    await tx.unsafe(migration.sql);

    // Record the migration
    await tx`
      INSERT INTO migrations (name)
      VALUES (${migration.name})
    `;
  });

  console.log(`  Applied: ${migration.name}`);
}

export async function migrate(): Promise<void> {
  console.log('Starting database migrations...\n');

  try {
    // Ensure migrations table exists
    await ensureMigrationsTable();

    // Get already applied migrations
    const applied = await getAppliedMigrations();
    console.log(`Already applied: ${applied.size} migrations`);

    // Load all migrations
    const migrations = await loadMigrations();
    console.log(`Found: ${migrations.length} migration files\n`);

    // Apply pending migrations
    let appliedCount = 0;
    for (const migration of migrations) {
      if (!applied.has(migration.name)) {
        await applyMigration(migration);
        appliedCount++;
      }
    }

    if (appliedCount === 0) {
      console.log('\nNo new migrations to apply.');
    } else {
      console.log(`\nSuccessfully applied ${appliedCount} migration(s).`);
    }
  } finally {
    await closeConnection();
  }
}

export async function status(): Promise<void> {
  console.log('Migration Status\n');

  try {
    await ensureMigrationsTable();

    const applied = await getAppliedMigrations();
    const migrations = await loadMigrations();

    console.log('Applied migrations:');
    for (const name of applied) {
      console.log(`  [x] ${name}`);
    }

    console.log('\nPending migrations:');
    const pending = migrations.filter(m => !applied.has(m.name));
    if (pending.length === 0) {
      console.log('  (none)');
    } else {
      for (const m of pending) {
        console.log(`  [ ] ${m.name}`);
      }
    }
  } finally {
    await closeConnection();
  }
}

// CLI entry point
if (process.argv[1] === __filename) {
  const command = process.argv[2] || 'migrate';
  const run = command === 'status' ? status : command === 'migrate' || command === 'up' ? migrate : null;

  if (run) {
    run().catch((error: unknown) => {
      console.error('Migration failed:', error);
      process.exit(1);
    });
  } else {
    console.log('Usage: migrate [migrate|status]');
    process.exit(1);
  }
}
