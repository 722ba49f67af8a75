import { SettingsRepository } from './settings.repository';

export const roundRobinKey = (locationId: number): string => `round_robin_last_panel_${locationId}`;

/**
 * Курсор «последняя выбранная панель» на локацию, хранится в таблице settings.
 * `advance` вызывается внутри транзакции: чтение и запись атомарны.
 */
export class RoundRobinCursor {
  constructor(
    private readonly settings: SettingsRepository,
    private readonly locationId: number,
  ) {}

  lastId(): number | null {
    const raw = this.settings.get(roundRobinKey(this.locationId));
    const id = raw == null ? NaN : Number(raw);
    return Number.isInteger(id) ? id : null;
  }

  /** Следующий после последнего выбранного (по кругу); 0, если последнего уже нет среди кандидатов. */
  advance<T extends { id: number }>(candidates: readonly T[]): T {
    if (candidates.length === 0) throw new RangeError('No candidates to rotate');
    const last = this.lastId();
    const index = last === null ? -1 : candidates.findIndex((c) => c.id === last);
    const next = candidates[index < 0 ? 0 : (index + 1) % candidates.length];
    this.settings.set(roundRobinKey(this.locationId), String(next.id));
    return next;
  }
}
