import fs from 'fs';
import path from 'path';
import { Pool } from 'pg';
import { z } from 'zod';
import { drizzle } from 'drizzle-orm/node-postgres';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import * as schema from '../db/schema';
import { EXPECTED_COLUMNS, TABLE_NAMES } from '../db/schema';
import { errorMessage } from '../errors';

/** Any Postgres driver's drizzle handle over this schema. */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>;
export type Transaction = Parameters<Parameters<Database['transaction']>[0]>[0];

/**
 * Process-wide storage handle. Created once at startup, handed to every
 * service that needs storage, and closed on shutdown.
 */
export interface DatabaseHandle {
  db: Database;
  pool: Pool;
  close(): Promise<void>;
}

export function createDatabase(options: { url: string; poolSize: number }): DatabaseHandle {
  const pool = new Pool({
    connectionString: options.url,
    max: options.poolSize,
  });

  // An idle client losing its connection must not crash the process.
  pool.on('error', (error) => {
    console.error('[Database] Idle client error:', error.message);
  });

  const db = drizzle(pool, { schema });

  return {
    db,
    pool,
    async close() {
      await pool.end();
      console.log('[Database] Connection pool closed');
    },
  };
}

function resolveSchemaFile(): string {
  const candidates = [
    path.join(process.cwd(), 'sql', 'schema.sql'),
    path.join(__dirname, '..', '..', 'sql', 'schema.sql'),
  ];
  const found = candidates.find((candidate) => fs.existsSync(candidate));
  if (!found) {
    throw new Error(`schema.sql not found; looked in ${candidates.join(', ')}`);
  }
  return found;
}

export async function readSchemaSql(): Promise<string> {
  return fs.promises.readFile(resolveSchemaFile(), 'utf8');
}

/**
 * Create any missing tables and indexes.
 */
export async function applySchema(pool: Pool): Promise<void> {
  const startTime = Date.now();
  await pool.query(await readSchemaSql());
  console.log(`[Database] Schema applied, time: ${Date.now() - startTime}ms`);
}

export interface DatabaseHealthReport {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  checks: {
    connection?: { status: 'ok'; response_time_ms: number };
    tables?: { status: 'ok' | 'error'; existing: string[]; missing: string[] };
    columns?: { status: 'ok' | 'error'; missing: Record<string, string[]> };
    row_counts?: Record<string, number>;
  };
  error?: string;
}

export interface IDatabaseProbe {
  check(): Promise<DatabaseHealthReport>;
}

/** Runs one SQL statement and resolves to its rows. */
export type RowQuery = (text: string) => Promise<unknown[]>;

const TableRowsSchema = z.array(z.object({ table_name: z.string() }));
const ColumnRowsSchema = z.array(z.object({ table_name: z.string(), column_name: z.string() }));
const CountRowsSchema = z.array(z.object({ count: z.coerce.number() }));

export class PostgresHealthProbe implements IDatabaseProbe {
  constructor(private readonly query: RowQuery) {}

  async check(): Promise<DatabaseHealthReport> {
    const report: DatabaseHealthReport = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      checks: {},
    };

    try {
      const start = Date.now();
      await this.query('SELECT 1');
      report.checks.connection = { status: 'ok', response_time_ms: Date.now() - start };

      const tableRows = TableRowsSchema.parse(
        await this.query('SELECT table_name FROM information_schema.tables WHERE table_schema = current_schema()')
      );
      const existing = tableRows.map((row) => row.table_name);
      const missing = TABLE_NAMES.filter((table) => !existing.includes(table));
      report.checks.tables = {
        status: missing.length === 0 ? 'ok' : 'error',
        existing,
        missing,
      };
      if (missing.length > 0) {
        report.status = 'unhealthy';
      }

      const columnRows = ColumnRowsSchema.parse(
        await this.query(
          'SELECT table_name, column_name FROM information_schema.columns WHERE table_schema = current_schema()'
        )
      );
      const missingColumns: Record<string, string[]> = {};
      for (const table of TABLE_NAMES) {
        if (!existing.includes(table)) continue;
        const present = new Set(columnRows.filter((row) => row.table_name === table).map((row) => row.column_name));
        const absent = (EXPECTED_COLUMNS[table] ?? []).filter((column) => !present.has(column));
        if (absent.length > 0) {
          missingColumns[table] = absent;
        }
      }
      const columnsOk = Object.keys(missingColumns).length === 0;
      report.checks.columns = { status: columnsOk ? 'ok' : 'error', missing: missingColumns };
      if (!columnsOk) {
        report.status = 'unhealthy';
      }

      const rowCounts: Record<string, number> = {};
      for (const table of TABLE_NAMES) {
        if (!existing.includes(table)) continue;
        // Table names come from the fixed TABLE_NAMES list.
        const [row] = CountRowsSchema.parse(await this.query(`SELECT COUNT(*)::int AS count FROM ${table}`));
        rowCounts[table] = row?.count ?? 0;
      }
      report.checks.row_counts = rowCounts;
    } catch (error) {
      console.error('[Database] Health check failed:', errorMessage(error));
      report.status = 'unhealthy';
      report.error = errorMessage(error);
    }

    return report;
  }
}
