import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { SCHEMA_SQL } from './schema';
import { UnitOfWork } from './unit-of-work';

export const IN_MEMORY = ':memory:';

@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  readonly db: Database.Database;

  constructor(config: ConfigService) {
    const dbPath = config.get<string>('DATABASE_PATH', './data/vpn-engine.db');
    if (dbPath !== IN_MEMORY) fs.mkdirSync(path.dirname(dbPath), { recursive: true });

    this.db = new Database(dbPath);
    if (dbPath !== IN_MEMORY) this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.db.exec(SCHEMA_SQL);
    this.logger.log(`SQLite ready at ${dbPath}`);
  }

  unitOfWork(): UnitOfWork {
    return new UnitOfWork(this.db);
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  onModuleDestroy(): void {
    if (this.db.open) this.db.close();
  }
}

/** better-sqlite3 хранит boolean как 0/1. */
export const toSqlBool = (v: boolean): number => (v ? 1 : 0);
export const fromSqlBool = (v: number): boolean => v === 1;

export const toSqlTriState = (v: boolean | null): number | null => (v == null ? null : toSqlBool(v));
export const fromSqlTriState = (v: number | null): boolean | null => (v == null ? null : v === 1);

export function isUniqueViolation(e: unknown): boolean {
  return e instanceof Database.SqliteError && e.code === 'SQLITE_CONSTRAINT_UNIQUE';
}
