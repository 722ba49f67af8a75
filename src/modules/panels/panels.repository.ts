import { Injectable } from '@nestjs/common';
import {
  DatabaseService,
  fromSqlBool,
  fromSqlTriState,
  toSqlBool,
  toSqlTriState,
} from '../database/database.service';
import { Panel, PanelPatch, PanelType } from './panel.types';

type PanelRow = {
  id: number;
  name: string;
  base_url: string;
  panel_type: PanelType;
  location_id: number;
  username_enc: string;
  password_enc: string;
  priority: number;
  is_premium: number;
  is_active: number;
  is_healthy: number | null;
  last_checked: number | null;
  created_at: number;
  updated_at: number;
};

type PanelStatsRow = PanelRow & { location_name: string; inbounds_count: number; active_clients_count: number };

const toPanel = (r: PanelRow): Panel => ({
  id: r.id,
  name: r.name,
  baseUrl: r.base_url,
  panelType: r.panel_type,
  locationId: r.location_id,
  usernameEnc: r.username_enc,
  passwordEnc: r.password_enc,
  priority: r.priority,
  isPremium: fromSqlBool(r.is_premium),
  isActive: fromSqlBool(r.is_active),
  isHealthy: fromSqlTriState(r.is_healthy),
  lastChecked: r.last_checked == null ? null : new Date(r.last_checked),
  createdAt: new Date(r.created_at),
  updatedAt: new Date(r.updated_at),
});

const PATCH_COLUMNS: ReadonlyArray<readonly [keyof PanelPatch, string]> = [
  ['name', 'name'],
  ['baseUrl', 'base_url'],
  ['locationId', 'location_id'],
  ['usernameEnc', 'username_enc'],
  ['passwordEnc', 'password_enc'],
  ['priority', 'priority'],
  ['isPremium', 'is_premium'],
  ['isActive', 'is_active'],
];

/** Порядок кандидатов: приоритет по убыванию, затем id — стабильно для tie-break. */
const CANDIDATE_ORDER = 'ORDER BY p.priority DESC, p.id ASC';

export type CandidateFilter = {
  excludeIds?: number[];
  protocol?: string;
  premiumRequired?: boolean;
};

export type NewPanel = Pick<
  Panel,
  'name' | 'baseUrl' | 'panelType' | 'locationId' | 'usernameEnc' | 'passwordEnc' | 'priority' | 'isPremium' | 'isActive'
>;

@Injectable()
export class PanelsRepository {
  constructor(private readonly database: DatabaseService) {}

  private get db() {
    return this.database.db;
  }

  create(data: NewPanel): Panel {
    const now = Date.now();
    const res = this.db
      .prepare(
        `INSERT INTO panels (name, base_url, panel_type, location_id, username_enc, password_enc,
                             priority, is_premium, is_active, is_healthy, created_at, updated_at)
         VALUES (@name, @baseUrl, @panelType, @locationId, @usernameEnc, @passwordEnc,
                 @priority, @isPremium, @isActive, NULL, @now, @now)`,
      )
      .run({ ...data, isPremium: toSqlBool(data.isPremium), isActive: toSqlBool(data.isActive), now });
    const created = this.findById(Number(res.lastInsertRowid));
    if (!created) throw new Error('Panel insert did not persist');
    return created;
  }

  findById(id: number): Panel | null {
    const row = this.db.prepare<[number], PanelRow>('SELECT * FROM panels WHERE id = ?').get(id);
    return row ? toPanel(row) : null;
  }

  findByBaseUrl(baseUrl: string): Panel | null {
    const row = this.db.prepare<[string], PanelRow>('SELECT * FROM panels WHERE base_url = ?').get(baseUrl);
    return row ? toPanel(row) : null;
  }

  list(): Panel[] {
    return this.db.prepare<[], PanelRow>('SELECT * FROM panels ORDER BY id').all().map(toPanel);
  }

  /** Панели с именем локации и счётчиками — для списка в админке. */
  listWithStats(locationId?: number): Array<{ panel: Panel; locationName: string; inboundsCount: number; activeClientsCount: number }> {
    const rows = this.db
      .prepare<[number | null, number | null], PanelStatsRow>(
        `SELECT p.*,
                l.name AS location_name,
                (SELECT COUNT(*) FROM panel_inbounds i WHERE i.panel_id = p.id AND i.is_active = 1) AS inbounds_count,
                (SELECT COUNT(*) FROM client_accounts c WHERE c.panel_id = p.id AND c.status = 'ACTIVE') AS active_clients_count
           FROM panels p
           JOIN locations l ON l.id = p.location_id
          WHERE (? IS NULL OR p.location_id = ?)
          ${CANDIDATE_ORDER}`,
      )
      .all(locationId ?? null, locationId ?? null);
    return rows.map((r) => ({
      panel: toPanel(r),
      locationName: r.location_name,
      inboundsCount: r.inbounds_count,
      activeClientsCount: r.active_clients_count,
    }));
  }

  listActive(): Panel[] {
    return this.db.prepare<[], PanelRow>('SELECT * FROM panels WHERE is_active = 1 ORDER BY id').all().map(toPanel);
  }

  listActiveAndHealthy(): Panel[] {
    return this.db
      .prepare<[], PanelRow>('SELECT * FROM panels WHERE is_active = 1 AND is_healthy = 1 ORDER BY id')
      .all()
      .map(toPanel);
  }

  /** Активные и здоровые панели локации в порядке выбора. */
  findCandidates(locationId: number, filter: CandidateFilter = {}): Panel[] {
    const where = ['p.location_id = ?', 'p.is_active = 1', 'p.is_healthy = 1'];
    const params: Array<number | string> = [locationId];

    const exclude = (filter.excludeIds ?? []).filter((id) => Number.isInteger(id));
    if (exclude.length > 0) {
      where.push(`p.id NOT IN (${exclude.map(() => '?').join(', ')})`);
      params.push(...exclude);
    }
    if (filter.premiumRequired) where.push('p.is_premium = 1');
    if (filter.protocol) {
      where.push(
        `EXISTS (SELECT 1 FROM panel_inbounds i
                  WHERE i.panel_id = p.id AND i.is_active = 1 AND i.panel_enabled = 1 AND i.protocol = ?)`,
      );
      params.push(filter.protocol.toLowerCase());
    }

    return this.db
      .prepare<Array<number | string>, PanelRow>(`SELECT p.* FROM panels p WHERE ${where.join(' AND ')} ${CANDIDATE_ORDER}`)
      .all(...params)
      .map(toPanel);
  }

  update(id: number, patch: PanelPatch): Panel | null {
    const sets: string[] = [];
    const params: Array<string | number> = [];
    for (const [key, column] of PATCH_COLUMNS) {
      const value = patch[key];
      if (value === undefined) continue;
      sets.push(`${column} = ?`);
      params.push(typeof value === 'boolean' ? toSqlBool(value) : value);
    }
    if (sets.length > 0) {
      sets.push('updated_at = ?');
      params.push(Date.now(), id);
      this.db.prepare(`UPDATE panels SET ${sets.join(', ')} WHERE id = ?`).run(...params);
    }
    return this.findById(id);
  }

  setHealth(id: number, healthy: boolean | null, checkedAt: Date = new Date()): void {
    this.db
      .prepare<[number | null, number, number, number]>(
        'UPDATE panels SET is_healthy = ?, last_checked = ?, updated_at = ? WHERE id = ?',
      )
      .run(toSqlTriState(healthy), checkedAt.getTime(), Date.now(), id);
  }

  delete(id: number): boolean {
    return this.db.prepare<[number]>('DELETE FROM panels WHERE id = ?').run(id).changes > 0;
  }
}
