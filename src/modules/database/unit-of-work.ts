import type BetterSqlite3 from 'better-sqlite3';

type StagedWrite = { label: string; apply: () => void };

/**
 * Копит записи и применяет их одной транзакцией SQLite.
 * Сервисы только ставят записи в очередь, коммитит вызывающий.
 */
export class UnitOfWork {
  private staged: StagedWrite[] = [];

  constructor(private readonly db: BetterSqlite3.Database) {}

  stage(label: string, apply: () => void): void {
    this.staged.push({ label, apply });
  }

  get size(): number {
    return this.staged.length;
  }

  /** Применяет всё накопленное, возвращает число записей. При ошибке не применяется ничего. */
  commit(): number {
    const writes = this.staged;
    this.staged = [];
    if (writes.length === 0) return 0;
    this.db.transaction(() => {
      for (const w of writes) w.apply();
    })();
    return writes.length;
  }
}
