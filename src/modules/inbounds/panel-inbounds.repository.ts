import { Injectable } from '@nestjs/common';
import { parseJsonObject } from '../../common/json';
import { DatabaseService, fromSqlBool, toSqlBool } from '../database/database.service';
import { InboundListener, InboundMirror } from './inbound.types';

type InboundRow = {
  id: number;
  panel_id: number;
  remote_inbound_id: number;
  tag: string | null;
  remark: string | null;
  protocol: string;
  port: number;
  listen_ip: string | null;
  panel_enabled: number;
  is_active: number;
  settings: string;
  stream_settings: string;
  total_gb: number;
  expiry_time: number | null;
  created_at: number;
  updated_at: number;
};

const toInbound = (r: InboundRow): InboundListener => ({
  id: r.id,
  panelId: r.panel_id,
  remoteInboundId: r.remote_inbound_id,
  tag: r.tag,
  remark: r.remark,
  protocol: r.protocol,
  port: r.port,
  listenIp: r.listen_ip,
  panelEnabled: fromSqlBool(r.panel_enabled),
  isActive: fromSqlBool(r.is_active),
  settings: parseJsonObject(r.settings, 'settings'),
  streamSettings: parseJsonObject(r.stream_settings, 'stream_settings'),
  totalGb: r.total_gb,
  expiryTime: r.expiry_time,
  createdAt: new Date(r.created_at),
  updatedAt: new Date(r.updated_at),
});

const toParams = (m: InboundMirror) => ({
  tag: m.tag,
  remark: m.remark,
  protocol: m.protocol,
  port: m.port,
  listenIp: m.listenIp,
  panelEnabled: toSqlBool(m.panelEnabled),
  settings: JSON.stringify(m.settings),
  streamSettings: JSON.stringify(m.streamSettings),
  totalGb: m.totalGb,
  expiryTime: m.expiryTime,
});

@Injectable()
export class PanelInboundsRepository {
  constructor(private readonly database: DatabaseService) {}

  private get db() {
    return this.database.db;
  }

  listByPanel(panelId: number, opts: { activeOnly?: boolean } = {}): InboundListener[] {
    const sql = opts.activeOnly
      ? 'SELECT * FROM panel_inbounds WHERE panel_id = ? AND is_active = 1 ORDER BY remote_inbound_id'
      : 'SELECT * FROM panel_inbounds WHERE panel_id = ? ORDER BY remote_inbound_id';
    return this.db.prepare<[number], InboundRow>(sql).all(panelId).map(toInbound);
  }

  findByRemoteId(panelId: number, remoteInboundId: number): InboundListener | null {
    const row = this.db
      .prepare<[number, number], InboundRow>('SELECT * FROM panel_inbounds WHERE panel_id = ? AND remote_inbound_id = ?')
      .get(panelId, remoteInboundId);
    return row ? toInbound(row) : null;
  }

  insert(panelId: number, mirror: InboundMirror): void {
    const now = Date.now();
    this.db
      .prepare(
        `INSERT INTO panel_inbounds (panel_id, remote_inbound_id, tag, remark, protocol, port, listen_ip,
                                     panel_enabled, is_active, settings, stream_settings, total_gb, expiry_time,
                                     created_at, updated_at)
         VALUES (@panelId, @remoteInboundId, @tag, @remark, @protocol, @port, @listenIp,
                 @panelEnabled, 1, @settings, @streamSettings, @totalGb, @expiryTime, @now, @now)`,
      )
      .run({ ...toParams(mirror), panelId, remoteInboundId: mirror.remoteInboundId, now });
  }

  /** Перезаписывает зеркальные поля и заново активирует строку. */
  update(id: number, mirror: InboundMirror): void {
    this.db
      .prepare(
        `UPDATE panel_inbounds
            SET tag = @tag, remark = @remark, protocol = @protocol, port = @port, listen_ip = @listenIp,
                panel_enabled = @panelEnabled, is_active = 1, settings = @settings,
                stream_settings = @streamSettings, total_gb = @totalGb, expiry_time = @expiryTime,
                updated_at = @now
          WHERE id = @id`,
      )
      .run({ ...toParams(mirror), id, now: Date.now() });
  }

  deactivate(id: number): void {
    this.db
      .prepare<[number, number]>('UPDATE panel_inbounds SET is_active = 0, updated_at = ? WHERE id = ?')
      .run(Date.now(), id);
  }
}
