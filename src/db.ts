import { Pool } from 'pg';
import sqlite3 from 'sqlite3';
import { open, Database as SQLiteDatabase } from 'sqlite';
import path from 'path';
import fs from 'fs';
import { config } from './config';
import { ensureFilePrivate, ensureParentDirectoryPrivate } from './security/filesystem';

export interface DBRunResult {
    lastID?: number;
    changes?: number;
}

// ------------------------------------------------------------------
// DB ABSTRACTION
// ------------------------------------------------------------------
export interface DatabaseManager {
    readonly dialect: 'sqlite' | 'postgres';
    query<T = unknown>(sql: string, params?: unknown[]): Promise<T[]>;
    get<T = unknown>(sql: string, params?: unknown[]): Promise<T | undefined>;
    exec(sql: string, params?: unknown[]): Promise<void>;
    run(sql: string, params?: unknown[]): Promise<DBRunResult>;
    close(): Promise<void>;
}

// ------------------------------------------------------------------
// SQLITE WRAPPER
// ------------------------------------------------------------------
class SQLiteManager implements DatabaseManager {
    readonly dialect = 'sqlite' as const;
    private db: SQLiteDatabase;

    constructor(db: SQLiteDatabase) {
        this.db = db;
    }

    async query<T = unknown>(sql: string, params?: unknown[]): Promise<T[]> {
        return this.db.all<T[]>(sql, params);
    }

    async get<T = unknown>(sql: string, params?: unknown[]): Promise<T | undefined> {
        return this.db.get<T>(sql, params);
    }

    async exec(sql: string, params?: unknown[]): Promise<void> {
        // multi-statement scripts go through exec, parametrised single statements through run
        if (params && params.length > 0) {
            await this.db.run(sql, params);
        } else {
            await this.db.exec(sql);
        }
    }

    async run(sql: string, params?: unknown[]): Promise<DBRunResult> {
        const result = await this.db.run(sql, params);
        return {
            lastID: result.lastID,
            changes: result.changes,
        };
    }

    async close(): Promise<void> {
        await this.db.close();
    }
}

// ------------------------------------------------------------------
// POSTGRES WRAPPER
// ------------------------------------------------------------------
class PostgresManager implements DatabaseManager {
    readonly dialect = 'postgres' as const;
    private pool: Pool;

    constructor(connectionString: string) {
        this.pool = new Pool({ connectionString });
    }

    // SQLite `?` placeholders become `$1`, `$2`, ...
    private adaptParams(sql: string): string {
        let count = 1;
        return sql.replace(/\?/g, () => `$${count++}`);
    }

    private normalizeSql(sql: string): string {
        let normalized = this.adaptParams(sql);
        const hadInsertOrIgnore = /\bINSERT\s+OR\s+IGNORE\s+INTO\b/i.test(normalized);
        normalized = normalized.replace(/\bINSERT\s+OR\s+IGNORE\s+INTO\b/gi, 'INSERT INTO');
        if (hadInsertOrIgnore && !/\bON\s+CONFLICT\b/i.test(normalized)) {
            normalized = normalized.replace(/;\s*$/, '');
            normalized = `${normalized} ON CONFLICT DO NOTHING`;
        }
        return normalized;
    }

    async query<T = unknown>(sql: string, params?: unknown[]): Promise<T[]> {
        const result = await this.pool.query(this.normalizeSql(sql), params);
        return result.rows;
    }

    async get<T = unknown>(sql: string, params?: unknown[]): Promise<T | undefined> {
        const result = await this.pool.query(this.normalizeSql(sql), params);
        return result.rows[0];
    }

    async exec(sql: string, params?: unknown[]): Promise<void> {
        await this.pool.query(this.normalizeSql(sql), params);
    }

    async run(sql: string, params?: unknown[]): Promise<DBRunResult> {
        const result = await this.pool.query(this.normalizeSql(sql), params);
        return {
            changes: result.rowCount ?? undefined,
        };
    }

    async close(): Promise<void> {
        await this.pool.end();
    }
}

// ------------------------------------------------------------------
// INSTANCE AND INITIALISATION
// ------------------------------------------------------------------
let dbInstance: DatabaseManager | null = null;

function resolveMigrationDirectory(): string {
    const cwdMigrations = path.resolve(process.cwd(), 'src', 'db', 'migrations');
    if (fs.existsSync(cwdMigrations)) {
        return cwdMigrations;
    }
    const compiledMigrations = path.resolve(__dirname, 'db', 'migrations');
    if (fs.existsSync(compiledMigrations)) {
        return compiledMigrations;
    }
    throw new Error('Migrations directory not found.');
}

function translateForPostgres(sql: string): string {
    return sql
        .replace(/INTEGER PRIMARY KEY AUTOINCREMENT/ig, 'SERIAL PRIMARY KEY')
        .replace(/\bDATETIME\b(?!\s*\()/ig, 'TIMESTAMP');
}

async function applyMigrations(database: DatabaseManager): Promise<void> {
    const isPostgres = database.dialect === 'postgres';
    await database.exec(isPostgres
        ? `CREATE TABLE IF NOT EXISTS _migrations (
                id SERIAL PRIMARY KEY,
                name TEXT NOT NULL UNIQUE,
                applied_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
            );`
        : `CREATE TABLE IF NOT EXISTS _migrations (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                name TEXT NOT NULL UNIQUE,
                applied_at DATETIME DEFAULT CURRENT_TIMESTAMP
            );`);

    const migrationDir = resolveMigrationDirectory();
    const files = fs
        .readdirSync(migrationDir)
        .filter((file) => file.endsWith('.sql'))
        .sort((a, b) => a.localeCompare(b));

    for (const fileName of files) {
        const alreadyApplied = await database.get<{ count: string | number }>(
            `SELECT COUNT(*) as count FROM _migrations WHERE name = ?`,
            [fileName]
        );
        // Postgres returns COUNT(*) as a string (int8)
        if (Number(alreadyApplied?.count ?? 0) > 0) {
            continue;
        }

        const raw = fs.readFileSync(path.join(migrationDir, fileName), 'utf8');
        const sql = isPostgres ? translateForPostgres(raw) : raw;

        if (isPostgres) {
            // a multi-statement simple query already runs as one implicit transaction
            await database.exec(sql);
            await database.run(`INSERT OR IGNORE INTO _migrations (name) VALUES (?)`, [fileName]);
            continue;
        }

        await database.exec('BEGIN');
        try {
            await database.exec(sql);
            await database.run(`INSERT OR IGNORE INTO _migrations (name) VALUES (?)`, [fileName]);
            await database.exec('COMMIT');
        } catch (error) {
            await database.exec('ROLLBACK');
            console.error(`Migration error on file ${fileName}`);
            throw error;
        }
    }
}

export async function getDatabase(): Promise<DatabaseManager> {
    if (dbInstance) return dbInstance;

    if (config.databaseUrl && config.databaseUrl.startsWith('postgres')) {
        console.log('Connecting to PostgreSQL database...');
        const postgres = new PostgresManager(config.databaseUrl);
        await postgres.query('SELECT 1');
        dbInstance = postgres;
        return dbInstance;
    }

    if (process.env.NODE_ENV === 'production' && !config.allowSqliteInProduction) {
        throw new Error(
            'SQLite is blocked in production. Provide a DATABASE_URL (PostgreSQL) or set ALLOW_SQLITE_IN_PRODUCTION=true explicitly.'
        );
    }

    const inMemory = config.dbPath === ':memory:';
    if (!inMemory) {
        ensureParentDirectoryPrivate(config.dbPath);
    }

    const sqliteDb = await open({
        filename: config.dbPath,
        driver: sqlite3.Database,
    });

    if (!inMemory) {
        await sqliteDb.exec(`PRAGMA journal_mode = WAL;`);
        ensureFilePrivate(config.dbPath);
    }
    await sqliteDb.exec(`PRAGMA busy_timeout = 5000;`);
    await sqliteDb.exec(`PRAGMA synchronous = NORMAL;`);

    dbInstance = new SQLiteManager(sqliteDb);
    return dbInstance;
}

export async function initDatabase(): Promise<void> {
    const database = await getDatabase();
    await applyMigrations(database);
}

export async function closeDatabase(): Promise<void> {
    if (dbInstance) {
        await dbInstance.close();
        dbInstance = null;
    }
}
