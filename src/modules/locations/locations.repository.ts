import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../database/database.service';
import { Location, LocationWithCounts } from './location.types';

type LocationRow = { id: number; name: string; flag: string | null; created_at: number };
type LocationCountsRow = LocationRow & { panels_count: number; active_panels_count: number };

const toLocation = (r: LocationRow): Location => ({
  id: r.id,
  name: r.name,
  flag: r.flag,
  createdAt: new Date(r.created_at),
});

@Injectable()
export class LocationsRepository {
  constructor(private readonly database: DatabaseService) {}

  private get db() {
    return this.database.db;
  }

  create(data: { name: string; flag?: string | null }): Location {
    const res = this.db
      .prepare<[string, string | null, number]>('INSERT INTO locations (name, flag, created_at) VALUES (?, ?, ?)')
      .run(data.name, data.flag ?? null, Date.now());
    const created = this.findById(Number(res.lastInsertRowid));
    if (!created) throw new Error('Location insert did not persist');
    return created;
  }

  findById(id: number): Location | null {
    const row = this.db.prepare<[number], LocationRow>('SELECT * FROM locations WHERE id = ?').get(id);
    return row ? toLocation(row) : null;
  }

  findByName(name: string): Location | null {
    const row = this.db
      .prepare<[string], LocationRow>('SELECT * FROM locations WHERE name = ? COLLATE NOCASE')
      .get(name);
    return row ? toLocation(row) : null;
  }

  listWithCounts(): LocationWithCounts[] {
    const rows = this.db
      .prepare<[], LocationCountsRow>(
        `SELECT l.*,
                COUNT(p.id) AS panels_count,
                COALESCE(SUM(CASE WHEN p.is_active = 1 THEN 1 ELSE 0 END), 0) AS active_panels_count
           FROM locations l
           LEFT JOIN panels p ON p.location_id = l.id
          GROUP BY l.id
          ORDER BY l.name`,
      )
      .all();
    return rows.map((r) => ({ ...toLocation(r), panelsCount: r.panels_count, activePanelsCount: r.active_panels_count }));
  }

  countActivePanels(locationId: number): number {
    const row = this.db
      .prepare<[number], { n: number }>('SELECT COUNT(*) AS n FROM panels WHERE location_id = ? AND is_active = 1')
      .get(locationId);
    return row?.n ?? 0;
  }

  countPanels(locationId: number): number {
    const row = this.db
      .prepare<[number], { n: number }>('SELECT COUNT(*) AS n FROM panels WHERE location_id = ?')
      .get(locationId);
    return row?.n ?? 0;
  }

  // panels.location_id ON DELETE RESTRICT: сервис проверяет ссылки до удаления
  delete(id: number): boolean {
    return this.db.prepare<[number]>('DELETE FROM locations WHERE id = ?').run(id).changes > 0;
  }
}
