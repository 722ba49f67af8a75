import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { settleWithConcurrency } from '../../common/async/settle-with-concurrency';
import { NotFoundError, errorMessage } from '../../common/errors/panel.errors';
import { jsonEqual } from '../../common/json';
import { DatabaseService } from '../database/database.service';
import { UnitOfWork } from '../database/unit-of-work';
import { PanelsRepository } from '../panels/panels.repository';
import { XuiClientFactory } from '../xui/xui-client.factory';
import { InboundListener, InboundMirror, MIRRORED_FIELDS } from './inbound.types';
import { PanelInboundsRepository } from './panel-inbounds.repository';
import { remoteInboundIdOf, transformRemoteInbound } from './remote-inbound.dto';

export type SyncResult = {
  fetched: number;
  /** added + updated + deactivated */
  processed: number;
  added: number;
  updated: number;
  deactivated: number;
  skipped: number;
};

export type PanelSyncSummary = {
  panelId: number;
  panelName: string;
  ok: boolean;
  fetched: number;
  processed: number;
  error?: string;
};

const EMPTY_RESULT: SyncResult = { fetched: 0, processed: 0, added: 0, updated: 0, deactivated: 0, skipped: 0 };

function differs(current: InboundListener, mirror: InboundMirror): boolean {
  return MIRRORED_FIELDS.some((field) => !jsonEqual(current[field], mirror[field]));
}

@Injectable()
export class InboundSyncService {
  private readonly logger = new Logger(InboundSyncService.name);

  constructor(
    private readonly config: ConfigService,
    private readonly database: DatabaseService,
    private readonly panels: PanelsRepository,
    private readonly inbounds: PanelInboundsRepository,
    private readonly clients: XuiClientFactory,
  ) {}

  /**
   * Зеркалит инбаунды панели в panel_inbounds.
   * С `uow` записи только ставятся в очередь (коммитит вызывающий), иначе коммит здесь.
   */
  async syncPanelInbounds(panelId: number, uow?: UnitOfWork): Promise<SyncResult> {
    const panel = this.panels.findById(panelId);
    if (!panel) throw new NotFoundError(`Panel ${panelId} not found`);
    if (!panel.isActive) {
      this.logger.warn(`Panel ${panelId} is inactive, sync skipped`);
      return { ...EMPTY_RESULT };
    }

    const client = this.clients.forPanel(panel);
    const work = uow ?? this.database.unitOfWork();

    let raw: unknown[];
    try {
      raw = await client.getInbounds();
    } catch (e) {
      this.logger.error(`Inbound fetch failed for panel ${panel.name} (${panelId}): ${errorMessage(e)}`);
      work.stage(`panel ${panelId} unhealthy`, () => this.panels.setHealth(panelId, false));
      if (!uow) work.commit();
      throw e;
    }

    const existing = new Map(this.inbounds.listByPanel(panelId).map((i) => [i.remoteInboundId, i]));
    const seen = new Set<number>();
    const result: SyncResult = { ...EMPTY_RESULT, fetched: raw.length };

    for (const item of raw) {
      const remoteId = remoteInboundIdOf(item);
      if (remoteId !== null) seen.add(remoteId);

      let mirror: InboundMirror;
      try {
        mirror = transformRemoteInbound(item);
      } catch (e) {
        result.skipped++;
        this.logger.warn(`Panel ${panelId}: inbound ${remoteId ?? '?'} skipped: ${errorMessage(e)}`);
        continue;
      }

      const current = existing.get(mirror.remoteInboundId);
      if (!current) {
        work.stage(`add inbound ${panelId}/${mirror.remoteInboundId}`, () => this.inbounds.insert(panelId, mirror));
        result.added++;
      } else if (!current.isActive || differs(current, mirror)) {
        work.stage(`update inbound ${panelId}/${mirror.remoteInboundId}`, () => this.inbounds.update(current.id, mirror));
        result.updated++;
      }
    }

    for (const local of existing.values()) {
      if (!local.isActive || seen.has(local.remoteInboundId)) continue;
      work.stage(`deactivate inbound ${panelId}/${local.remoteInboundId}`, () => this.inbounds.deactivate(local.id));
      result.deactivated++;
    }

    result.processed = result.added + result.updated + result.deactivated;
    work.stage(`panel ${panelId} healthy`, () => this.panels.setHealth(panelId, true));
    if (!uow) work.commit();

    this.logger.log(
      `Panel ${panel.name} (${panelId}) sync: fetched=${result.fetched} added=${result.added} ` +
        `updated=${result.updated} deactivated=${result.deactivated} skipped=${result.skipped}`,
    );
    return result;
  }

  /** Все активные и здоровые панели, ограниченный параллелизм, один коммит на цикл. */
  async syncInboundsFromPanels(): Promise<PanelSyncSummary[]> {
    const panels = this.panels.listActiveAndHealthy();
    if (panels.length === 0) {
      this.logger.log('No active and healthy panels to sync');
      return [];
    }

    const uow = this.database.unitOfWork();
    const limit = this.config.get<number>('SYNC_CONCURRENCY', 3);
    const settled = await settleWithConcurrency(panels, limit, (p) => this.syncPanelInbounds(p.id, uow));

    const summaries = settled.map((outcome, i): PanelSyncSummary => {
      const panel = panels[i];
      if (outcome.status === 'fulfilled') {
        return {
          panelId: panel.id,
          panelName: panel.name,
          ok: true,
          fetched: outcome.value.fetched,
          processed: outcome.value.processed,
        };
      }
      return {
        panelId: panel.id,
        panelName: panel.name,
        ok: false,
        fetched: 0,
        processed: 0,
        error: errorMessage(outcome.reason),
      };
    });

    if (uow.size > 0) {
      const writes = uow.commit();
      this.logger.log(`Inbound sync cycle committed ${writes} writes for ${panels.length} panels`);
    }
    const failed = summaries.filter((s) => !s.ok).length;
    if (failed > 0) this.logger.warn(`Inbound sync cycle: ${failed}/${panels.length} panels failed`);
    return summaries;
  }

  listInbounds(panelId: number): InboundListener[] {
    if (!this.panels.findById(panelId)) throw new NotFoundError(`Panel ${panelId} not found`);
    return this.inbounds.listByPanel(panelId);
  }
}
