import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../database/database.service';
import { isPanelProtocol } from '../xui/client-identifier';
import { ClientAccount, ClientAccountStatus, NewClientAccount } from './client-account.types';

type ClientAccountRow = {
  id: number;
  panel_id: number;
  inbound_id: number | null;
  remote_inbound_id: number;
  protocol: string;
  identifier: string;
  email: string;
  subscription_url: string | null;
  status: ClientAccountStatus;
  external_ref: string | null;
  created_at: number;
  updated_at: number;
};

function toClientAccount(r: ClientAccountRow): ClientAccount {
  if (!isPanelProtocol(r.protocol)) throw new Error(`client_accounts#${r.id}: unknown protocol ${r.protocol}`);
  return {
    id: r.id,
    panelId: r.panel_id,
    inboundId: r.inbound_id,
    remoteInboundId: r.remote_inbound_id,
    protocol: r.protocol,
    identifier: r.identifier,
    email: r.email,
    subscriptionUrl: r.subscription_url,
    status: r.status,
    externalRef: r.external_ref,
    createdAt: new Date(r.created_at),
    updatedAt: new Date(r.updated_at),
  };
}

@Injectable()
export class ClientAccountsRepository {
  constructor(private readonly database: DatabaseService) {}

  private get db() {
    return this.database.db;
  }

  insert(data: NewClientAccount): ClientAccount {
    const now = Date.now();
    const res = this.db
      .prepare(
        `INSERT INTO client_accounts (panel_id, inbound_id, remote_inbound_id, protocol, identifier, email,
                                      subscription_url, status, external_ref, created_at, updated_at)
         VALUES (@panelId, @inboundId, @remoteInboundId, @protocol, @identifier, @email,
                 @subscriptionUrl, 'ACTIVE', @externalRef, @now, @now)`,
      )
      .run({ ...data, now });
    const row = this.db
      .prepare<[number], ClientAccountRow>('SELECT * FROM client_accounts WHERE id = ?')
      .get(Number(res.lastInsertRowid));
    if (!row) throw new Error('Client account insert did not persist');
    return toClientAccount(row);
  }

  findByIdentifier(panelId: number, identifier: string): ClientAccount | null {
    const row = this.db
      .prepare<[number, string], ClientAccountRow>(
        'SELECT * FROM client_accounts WHERE panel_id = ? AND identifier = ? ORDER BY id DESC',
      )
      .get(panelId, identifier);
    return row ? toClientAccount(row) : null;
  }

  listByPanel(panelId: number): ClientAccount[] {
    return this.db
      .prepare<[number], ClientAccountRow>('SELECT * FROM client_accounts WHERE panel_id = ? ORDER BY id')
      .all(panelId)
      .map(toClientAccount);
  }

  countActive(panelId: number): number {
    const row = this.db
      .prepare<[number], { n: number }>("SELECT COUNT(*) AS n FROM client_accounts WHERE panel_id = ? AND status = 'ACTIVE'")
      .get(panelId);
    return row?.n ?? 0;
  }

  /** Один GROUP BY на всех кандидатов; панелей без клиентов в map нет. */
  countActiveByPanels(panelIds: number[]): Map<number, number> {
    const counts = new Map<number, number>();
    if (panelIds.length === 0) return counts;
    const rows = this.db
      .prepare<number[], { panel_id: number; n: number }>(
        `SELECT panel_id, COUNT(*) AS n FROM client_accounts
          WHERE status = 'ACTIVE' AND panel_id IN (${panelIds.map(() => '?').join(', ')})
          GROUP BY panel_id`,
      )
      .all(...panelIds);
    for (const r of rows) counts.set(r.panel_id, r.n);
    return counts;
  }

  setStatus(panelId: number, identifier: string, status: ClientAccountStatus): number {
    return this.db
      .prepare<[ClientAccountStatus, number, number, string]>(
        'UPDATE client_accounts SET status = ?, updated_at = ? WHERE panel_id = ? AND identifier = ?',
      )
      .run(status, Date.now(), panelId, identifier).changes;
  }

  /** У shadowsocks ключ — email, поэтому новый email становится и новым идентификатором. */
  setEmail(panelId: number, identifier: string, email: string, newIdentifier: string = identifier): number {
    return this.db
      .prepare<[string, string, number, number, string]>(
        'UPDATE client_accounts SET email = ?, identifier = ?, updated_at = ? WHERE panel_id = ? AND identifier = ?',
      )
      .run(email, newIdentifier, Date.now(), panelId, identifier).changes;
  }
}
