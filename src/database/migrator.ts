// =============================================================================
// Database Migrator
// Applies the numbered SQL files under ./migrations, verifying checksums
// =============================================================================

import * as fs from 'fs';
import * as path from 'path';
import * as crypto from 'crypto';
import { QueryResultRow } from 'pg';
import { SqlPool, createPool, withTransaction } from './pool';
import config from '../config/default';
import { errorMessage } from '../errors';

// =============================================================================
// Types
// =============================================================================

export interface Migration {
  id: number;
  name: string;
  filename: string;
  checksum: string;
  appliedAt?: Date;
}

export interface MigrationResult {
  success: boolean;
  migrationsRun: string[];
  error?: string;
}

export interface MigrationFile {
  filename: string;
  content: string;
}

interface MigratorOptions {
  migrationsPath: string;
  schemaTable: string;
}

interface AppliedRow extends QueryResultRow {
  id: number;
  name: string;
  filename: string;
  checksum: string;
  applied_at: Date;
}

const MIGRATION_FILE = /^(\d+)_(.+)\.sql$/;

// =============================================================================
// Planning
// =============================================================================

export function checksum(content: string): string {
  return crypto.createHash('sha256').update(content).digest('hex');
}

/**
 * Up-migrations not applied yet, in id order. An applied file whose content
 * changed since is an error.
 */
export function planMigrations(files: MigrationFile[], applied: Map<number, string>): Migration[] {
  const pending: Migration[] = [];

  const ordered = files
    .filter(f => MIGRATION_FILE.test(f.filename) && !f.filename.includes('.down.'))
    .sort((a, b) => a.filename.localeCompare(b.filename));

  for (const file of ordered) {
    const match = MIGRATION_FILE.exec(file.filename);
    if (!match) continue;

    const id = parseInt(match[1], 10);
    const sum = checksum(file.content);
    const appliedChecksum = applied.get(id);

    if (appliedChecksum === undefined) {
      pending.push({ id, name: match[2].replace(/_/g, ' '), filename: file.filename, checksum: sum });
    } else if (appliedChecksum !== sum) {
      throw new Error(
        `Migration ${file.filename} has been modified after being applied. ` +
        `Expected checksum: ${appliedChecksum}, got: ${sum}`
      );
    }
  }

  return pending;
}

export function validateSchemaTable(name: string): void {
  if (!/^[a-z_][a-z0-9_]*$/i.test(name) || name.length > 63) {
    throw new Error(`Invalid schema table name: "${name}"`);
  }
}

// =============================================================================
// Migrator
// =============================================================================

export class DatabaseMigrator {
  private readonly options: MigratorOptions;

  constructor(private readonly pool: SqlPool, options: Partial<MigratorOptions> = {}) {
    this.options = {
      migrationsPath: options.migrationsPath ?? path.join(__dirname, 'migrations'),
      schemaTable: options.schemaTable ?? '_migrations',
    };
    validateSchemaTable(this.options.schemaTable);
  }

  async migrate(): Promise<MigrationResult> {
    const migrationsRun: string[] = [];

    try {
      await this.ensureMigrationsTable();
      const pending = planMigrations(this.readFiles(), await this.appliedChecksums());

      if (pending.length === 0) {
        console.log('[Migrator] No pending migrations');
        return { success: true, migrationsRun };
      }
      console.log(`[Migrator] Found ${pending.length} pending migration(s)`);

      for (const migration of pending) {
        console.log(`[Migrator] Running migration: ${migration.name}`);
        const sql = this.readFile(migration.filename);

        await withTransaction(this.pool, async session => {
          await session.query(sql);
          await session.query(
            `INSERT INTO ${this.options.schemaTable} (id, name, filename, checksum, applied_at)
             VALUES ($1, $2, $3, $4, NOW())`,
            [migration.id, migration.name, migration.filename, migration.checksum],
          );
        });
        migrationsRun.push(migration.name);
      }

      console.log(`[Migrator] Successfully ran ${migrationsRun.length} migration(s)`);
      return { success: true, migrationsRun };
    } catch (error) {
      const message = errorMessage(error);
      console.error(`[Migrator] Migration failed: ${message}`);
      return { success: false, migrationsRun, error: message };
    }
  }

  async rollback(steps: number = 1): Promise<MigrationResult> {
    const rolledBack: string[] = [];

    try {
      const applied = await this.pool.query<AppliedRow>(
        `SELECT id, name, filename, checksum, applied_at
         FROM ${this.options.schemaTable}
         ORDER BY id DESC
         LIMIT $1`,
        [steps],
      );

      for (const row of applied.rows) {
        const downFile = row.filename.replace(/\.sql$/, '.down.sql');
        const downPath = path.join(this.options.migrationsPath, downFile);

        await withTransaction(this.pool, async session => {
          if (fs.existsSync(downPath)) {
            await session.query(fs.readFileSync(downPath, 'utf8'));
          } else {
            console.warn(`[Migrator] No down migration found for ${row.name}`);
          }
          await session.query(`DELETE FROM ${this.options.schemaTable} WHERE id = $1`, [row.id]);
        });
        rolledBack.push(row.name);
        console.log(`[Migrator] Rolled back: ${row.name}`);
      }

      return { success: true, migrationsRun: rolledBack };
    } catch (error) {
      const message = errorMessage(error);
      console.error(`[Migrator] Rollback failed: ${message}`);
      return { success: false, migrationsRun: rolledBack, error: message };
    }
  }

  async status(): Promise<{ applied: Migration[]; pending: Migration[] }> {
    await this.ensureMigrationsTable();

    const result = await this.pool.query<AppliedRow>(
      `SELECT id, name, filename, checksum, applied_at FROM ${this.options.schemaTable} ORDER BY id ASC`,
    );
    const applied = result.rows.map(row => ({
      id: row.id,
      name: row.name,
      filename: row.filename,
      checksum: row.checksum,
      appliedAt: row.applied_at,
    }));

    const pending = planMigrations(this.readFiles(), new Map(applied.map(m => [m.id, m.checksum])));
    return { applied, pending };
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private async ensureMigrationsTable(): Promise<void> {
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS ${this.options.schemaTable} (
        id INTEGER PRIMARY KEY,
        name VARCHAR(255) NOT NULL,
        filename VARCHAR(255) NOT NULL,
        checksum VARCHAR(64) NOT NULL,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
  }

  private async appliedChecksums(): Promise<Map<number, string>> {
    const result = await this.pool.query<{ id: number; checksum: string }>(
      `SELECT id, checksum FROM ${this.options.schemaTable}`,
    );
    return new Map(result.rows.map(row => [row.id, row.checksum]));
  }

  private readFiles(): MigrationFile[] {
    return fs.readdirSync(this.options.migrationsPath).map(filename => ({
      filename,
      content: this.readFile(filename),
    }));
  }

  private readFile(filename: string): string {
    return fs.readFileSync(path.join(this.options.migrationsPath, filename), 'utf8');
  }
}

// =============================================================================
// CLI
// =============================================================================

function createMigrationFiles(name: string): string[] {
  const migrationsPath = path.join(__dirname, 'migrations');
  fs.mkdirSync(migrationsPath, { recursive: true });

  const maxId = fs.readdirSync(migrationsPath).reduce((max, f) => {
    const match = /^(\d+)/.exec(f);
    return match ? Math.max(max, parseInt(match[1], 10)) : max;
  }, 0);

  const prefix = `${String(maxId + 1).padStart(4, '0')}_${name.toLowerCase().replace(/[^a-z0-9]+/g, '_')}`;
  const created = new Date().toISOString();
  fs.writeFileSync(path.join(migrationsPath, `${prefix}.sql`), `-- Migration: ${name}\n-- Created: ${created}\n\n`);
  fs.writeFileSync(path.join(migrationsPath, `${prefix}.down.sql`), `-- Rollback: ${name}\n-- Created: ${created}\n\n`);
  return [`${prefix}.sql`, `${prefix}.down.sql`];
}

async function main(): Promise<void> {
  const command = process.argv[2];

  if (command === 'create') {
    const name = process.argv[3];
    if (!name) {
      console.error('Usage: migrator create <migration_name>');
      process.exit(1);
    }
    console.log(`Created migration files:\n  ${createMigrationFiles(name).join('\n  ')}`);
    return;
  }

  const pool = createPool(config.database, 2);
  const migrator = new DatabaseMigrator(pool);

  try {
    switch (command) {
      case 'migrate':
      case 'up': {
        const result = await migrator.migrate();
        if (!result.success) process.exitCode = 1;
        break;
      }

      case 'rollback':
      case 'down': {
        const result = await migrator.rollback(parseInt(process.argv[3] || '1', 10));
        if (!result.success) process.exitCode = 1;
        break;
      }

      case 'status': {
        const status = await migrator.status();
        console.log('\n=== Applied Migrations ===');
        for (const m of status.applied) {
          console.log(`  [${m.id}] ${m.name} (${m.appliedAt?.toISOString()})`);
        }
        if (status.applied.length === 0) console.log('  (none)');
        console.log('\n=== Pending Migrations ===');
        for (const m of status.pending) {
          console.log(`  [${m.id}] ${m.name}`);
        }
        if (status.pending.length === 0) console.log('  (none)');
        break;
      }

      default:
        console.log('Usage: migrator <command>');
        console.log('');
        console.log('Commands:');
        console.log('  migrate, up    Run pending migrations');
        console.log('  rollback, down Rollback the last migration (or specify count)');
        console.log('  status         Show migration status');
        console.log('  create <name>  Create a new migration');
    }
  } finally {
    await pool.end();
  }
}

if (require.main === module) {
  main().catch(error => {
    console.error(error);
    process.exit(1);
  });
}
