import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { settleWithConcurrency } from '../../common/async/settle-with-concurrency';
import { errorMessage } from '../../common/errors/panel.errors';
import { DatabaseService } from '../database/database.service';
import { UnitOfWork } from '../database/unit-of-work';
import { PanelsRepository } from '../panels/panels.repository';
import { XuiClientFactory } from '../xui/xui-client.factory';

export type HealthCheckResult = { healthy: boolean; error: string | null };

export type PanelHealthSummary = HealthCheckResult & { panelId: number; panelName: string };

@Injectable()
export class PanelHealthService {
  private readonly logger = new Logger(PanelHealthService.name);

  constructor(
    private readonly config: ConfigService,
    private readonly database: DatabaseService,
    private readonly panels: PanelsRepository,
    private readonly clients: XuiClientFactory,
  ) {}

  /**
   * Свежий логин на панель. Отсутствующие и неактивные панели не проверяются, только репортятся.
   * Флаг здоровья ставится в `uow`, если он передан, иначе коммитится здесь.
   */
  async checkPanelHealth(panelId: number, uow?: UnitOfWork): Promise<HealthCheckResult> {
    const panel = this.panels.findById(panelId);
    if (!panel) return { healthy: false, error: `Panel ${panelId} not found` };
    if (!panel.isActive) return { healthy: false, error: `Panel ${panel.name} (${panelId}) is inactive` };

    let result: HealthCheckResult;
    try {
      await this.clients.forPanel(panel).login();
      result = { healthy: true, error: null };
    } catch (e) {
      result = { healthy: false, error: errorMessage(e) };
      this.clients.invalidateSession(panelId);
    }

    const checkedAt = new Date();
    const work = uow ?? this.database.unitOfWork();
    work.stage(`panel ${panelId} health=${result.healthy}`, () => this.panels.setHealth(panelId, result.healthy, checkedAt));
    if (!uow) work.commit();

    if (result.healthy) {
      if (panel.isHealthy !== true) this.logger.log(`Panel ${panel.name} (${panelId}) is healthy`);
    } else {
      this.logger.warn(`Panel ${panel.name} (${panelId}) health check failed: ${result.error}`);
    }
    return result;
  }

  /** Все активные панели, ограниченный параллелизм, один коммит на цикл. */
  async runHealthCheckCycle(): Promise<PanelHealthSummary[]> {
    const panels = this.panels.listActive();
    if (panels.length === 0) return [];

    const uow = this.database.unitOfWork();
    const limit = this.config.get<number>('HEALTH_CHECK_CONCURRENCY', 5);
    const settled = await settleWithConcurrency(panels, limit, (p) => this.checkPanelHealth(p.id, uow));

    const summaries = settled.map((outcome, i): PanelHealthSummary => {
      const panel = panels[i];
      const result =
        outcome.status === 'fulfilled' ? outcome.value : { healthy: false, error: errorMessage(outcome.reason) };
      return { panelId: panel.id, panelName: panel.name, ...result };
    });

    uow.commit();
    const unhealthy = summaries.filter((s) => !s.healthy).length;
    this.logger.log(`Health check cycle: ${panels.length - unhealthy}/${panels.length} panels healthy`);
    return summaries;
  }
}
