import Database from 'better-sqlite3';

/**
 * Minimal `sqlite3`-style facade over better-sqlite3, passed to Sequelize as
 * `dialectModule` so the sqlite dialect runs without the sqlite3 package.
 */

type SQLiteCallback = (...args: unknown[]) => void;
type BindValue = string | number | bigint | Buffer | null;
type BindRecord = Record<string, BindValue>;
type BindParam = BindValue | BindRecord;

interface RunContext {
  lastID: number;
  changes: number;
}

function isCallback(value: unknown): value is SQLiteCallback {
  return typeof value === 'function';
}

function toError(err: unknown): Error {
  // node-sqlite3 reports the primary result code, which the dialect maps to UniqueConstraintError
  if (err instanceof Database.SqliteError && err.code.startsWith('SQLITE_CONSTRAINT')) {
    return Object.assign(new Error(err.message), { code: 'SQLITE_CONSTRAINT' });
  }
  return err instanceof Error ? err : new Error(String(err));
}

function toBindValue(value: unknown): BindValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'bigint') return value;
  if (value instanceof Date) return value.getTime();
  if (Buffer.isBuffer(value)) return value;
  if (value instanceof Uint8Array) return Buffer.from(value);
  return String(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return (
    value !== null &&
    typeof value === 'object' &&
    !Array.isArray(value) &&
    !(value instanceof Date) &&
    !(value instanceof Uint8Array)
  );
}

/** Split trailing callback from bind parameters; named parameters lose their `$`, `:` or `@` prefix. */
function normalizeArgs(params: readonly unknown[]): { args: BindParam[]; callback?: SQLiteCallback } {
  const last = params[params.length - 1];
  const callback = isCallback(last) ? last : undefined;
  const values = callback ? params.slice(0, -1) : [...params];

  const [first] = values;
  if (values.length === 1 && isRecord(first)) {
    const named: BindRecord = {};
    for (const [key, value] of Object.entries(first)) {
      named[/^[$:@]/.test(key) ? key.slice(1) : key] = toBindValue(value);
    }
    return { args: [named], ...(callback ? { callback } : {}) };
  }

  if (values.length === 1 && first === undefined) return { args: [], ...(callback ? { callback } : {}) };
  const flat = values.length === 1 && Array.isArray(first) ? first : values;
  return { args: flat.map(toBindValue), ...(callback ? { callback } : {}) };
}

export class SQLite3Wrapper {
  private readonly db: Database.Database | null = null;
  private readonly openError: Error | null = null;

  constructor(filename: string, mode?: number | SQLiteCallback, callback?: SQLiteCallback) {
    const done = isCallback(mode) ? mode : callback;
    try {
      this.db = new Database(filename);
    } catch (err) {
      if (!done) throw err;
      this.openError = toError(err);
    }
    if (done) {
      const error = this.openError;
      setTimeout(() => done(error), 0);
    }
  }

  private get connection(): Database.Database {
    if (!this.db) throw this.openError ?? new Error('Database is not open');
    return this.db;
  }

  run(sql: string, ...params: unknown[]): this {
    const { args, callback } = normalizeArgs(params);
    try {
      const info = this.connection.prepare(sql).run(...args);
      const context: RunContext = { lastID: Number(info.lastInsertRowid), changes: info.changes };
      callback?.call(context, null);
    } catch (err) {
      if (!callback) throw err;
      callback(toError(err));
    }
    return this;
  }

  all(sql: string, ...params: unknown[]): this {
    const { args, callback } = normalizeArgs(params);
    try {
      const stmt = this.connection.prepare(sql);
      if (stmt.reader) {
        const rows = stmt.all(...args);
        callback?.(null, rows);
      } else {
        stmt.run(...args);
        callback?.(null, []);
      }
    } catch (err) {
      if (!callback) throw err;
      callback(toError(err));
    }
    return this;
  }

  exec(sql: string, callback?: SQLiteCallback): this {
    try {
      this.connection.exec(sql);
      callback?.(null);
    } catch (err) {
      if (!callback) throw err;
      callback(toError(err));
    }
    return this;
  }

  close(callback?: SQLiteCallback): void {
    try {
      if (this.db?.open) this.db.close();
      callback?.(null);
    } catch (err) {
      if (!callback) throw err;
      callback(toError(err));
    }
  }

  serialize(callback?: SQLiteCallback): void {
    callback?.();
  }

  parallelize(callback?: SQLiteCallback): void {
    callback?.();
  }
}
