import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

/** Cookie и/или bearer-токен, выданные панелью при логине. */
export type PanelSession = { cookie?: string; token?: string };

type Entry = { session: PanelSession; expiresAt: number };

/**
 * Сессии панелей в памяти процесса: panelId → cookie/token с TTL.
 * Отсутствие записи — не ошибка, клиент просто логинится заново.
 */
@Injectable()
export class SessionTokenCache {
  private readonly entries = new Map<number, Entry>();
  private readonly ttlMs: number;

  constructor(config: ConfigService) {
    this.ttlMs = config.get<number>('PANEL_SESSION_TTL_SECONDS', 21_600) * 1000;
  }

  get(panelId: number): PanelSession | null {
    const entry = this.entries.get(panelId);
    if (!entry) return null;
    if (entry.expiresAt <= Date.now()) {
      this.entries.delete(panelId);
      return null;
    }
    return entry.session;
  }

  set(panelId: number, session: PanelSession): void {
    this.entries.set(panelId, { session, expiresAt: Date.now() + this.ttlMs });
  }

  invalidate(panelId: number): void {
    this.entries.delete(panelId);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
