import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../database/database.service';

/** Key/value для состояния, которое переживает процесс (курсоры round-robin). */
@Injectable()
export class SettingsRepository {
  constructor(private readonly database: DatabaseService) {}

  get(key: string): string | null {
    const row = this.database.db
      .prepare<[string], { value: string | null }>('SELECT value FROM settings WHERE key = ?')
      .get(key);
    return row?.value ?? null;
  }

  set(key: string, value: string | null): void {
    this.database.db
      .prepare<[string, string | null, number]>(
        `INSERT INTO settings (key, value, updated_at) VALUES (?, ?, ?)
         ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`,
      )
      .run(key, value, Date.now());
  }
}
