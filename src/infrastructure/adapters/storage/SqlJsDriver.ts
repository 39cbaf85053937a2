import fs from 'node:fs';
import path from 'node:path';
import sqlJs from 'sql.js';
import type { Database, SqlValue } from 'sql.js';

export type SqlRow = Record<string, SqlValue>;
export type SqlParams = Record<string, SqlValue> | SqlValue[];

export interface RunResult {
  changes: number;
  lastInsertRowid: number;
}

export const IN_MEMORY = ':memory:';

// The bundle exports the init function both as the module and as its `default`.
const engine = await sqlJs.default();

/**
 * Synchronous SQLite over the WebAssembly build of sql.js. The database lives in memory;
 * a file-backed store is written out, via a temp file and rename, after every outermost
 * commit and every write made outside a transaction.
 */
export class SqlJsDriver {
  private readonly db: Database;
  private depth = 0;
  private open = true;

  private constructor(
    readonly location: string,
    data?: Uint8Array,
  ) {
    this.db = new engine.Database(data);
    this.applyPragmas();
  }

  static open(location: string): SqlJsDriver {
    if (location === IN_MEMORY) {
      return new SqlJsDriver(location);
    }

    fs.accessSync(path.dirname(path.resolve(location)), fs.constants.W_OK);
    return new SqlJsDriver(location, fs.existsSync(location) ? fs.readFileSync(location) : undefined);
  }

  get isOpen(): boolean {
    return this.open;
  }

  exec(sql: string): void {
    this.db.exec(sql);
    this.persistOutsideTransaction();
  }

  run(sql: string, params: SqlParams = []): RunResult {
    const statement = this.db.prepare(sql);
    try {
      statement.run(this.bindable(params));
    } finally {
      statement.free();
    }

    const changes = this.db.getRowsModified();
    const lastInsertRowid = changes > 0 ? this.scalar('SELECT last_insert_rowid() AS id') : 0;
    this.persistOutsideTransaction();
    return { changes, lastInsertRowid };
  }

  all(sql: string, params: SqlParams = []): SqlRow[] {
    const statement = this.db.prepare(sql);
    try {
      statement.bind(this.bindable(params));
      const rows: SqlRow[] = [];
      while (statement.step()) {
        rows.push(statement.getAsObject());
      }
      return rows;
    } finally {
      statement.free();
    }
  }

  get(sql: string, params: SqlParams = []): SqlRow | undefined {
    return this.all(sql, params)[0];
  }

  /** Runs `work` atomically. A nested call becomes a savepoint inside the outer transaction. */
  transaction<T>(work: () => T): T {
    const outermost = this.depth === 0;
    const savepoint = `sp_${this.depth}`;

    this.db.exec(outermost ? 'BEGIN' : `SAVEPOINT ${savepoint}`);
    this.depth += 1;

    let result: T;
    try {
      result = work();
    } catch (error) {
      this.depth -= 1;
      this.db.exec(outermost ? 'ROLLBACK' : `ROLLBACK TO ${savepoint}; RELEASE ${savepoint}`);
      throw error;
    }

    this.depth -= 1;
    this.db.exec(outermost ? 'COMMIT' : `RELEASE ${savepoint}`);
    if (outermost) {
      this.persist();
    }
    return result;
  }

  close(): void {
    if (this.open) {
      this.db.close();
      this.open = false;
    }
  }

  private scalar(sql: string): number {
    const value = this.get(sql)?.id;
    return typeof value === 'number' ? value : 0;
  }

  // sql.js matches named parameters including their prefix.
  private bindable(params: SqlParams): SqlParams {
    if (Array.isArray(params)) {
      return params;
    }
    return Object.fromEntries(Object.entries(params).map(([name, value]) => [`@${name}`, value]));
  }

  private applyPragmas(): void {
    this.db.exec('PRAGMA foreign_keys = ON');
  }

  private persistOutsideTransaction(): void {
    if (this.depth === 0) {
      this.persist();
    }
  }

  private persist(): void {
    if (this.location === IN_MEMORY) {
      return;
    }

    // export() reopens the connection, which resets connection pragmas.
    const data = this.db.export();
    this.applyPragmas();

    const pending = `${this.location}.tmp`;
    fs.writeFileSync(pending, data);
    fs.renameSync(pending, this.location);
  }
}
