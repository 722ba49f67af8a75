import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { errorMessage } from '../../common/errors/panel.errors';
import { PanelHealthService } from '../health/panel-health.service';
import { InboundSyncService } from '../inbounds/inbound-sync.service';

export const HEALTH_CHECK_JOB = 'panel-health-check';
export const INBOUND_SYNC_JOB = 'inbound-sync';

/**
 * Два фоновых цикла: проверка здоровья панелей и синхронизация инбаундов.
 * Интервал 0 отключает цикл. Новый проход не стартует, пока не закончился предыдущий.
 */
@Injectable()
export class SchedulerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(SchedulerService.name);
  private readonly running = new Set<string>();

  constructor(
    private readonly config: ConfigService,
    private readonly registry: SchedulerRegistry,
    private readonly health: PanelHealthService,
    private readonly sync: InboundSyncService,
  ) {}

  onModuleInit(): void {
    this.schedule(HEALTH_CHECK_JOB, this.config.get<number>('HEALTH_CHECK_INTERVAL_SECONDS', 300), () =>
      this.health.runHealthCheckCycle(),
    );
    this.schedule(INBOUND_SYNC_JOB, this.config.get<number>('INBOUND_SYNC_INTERVAL_SECONDS', 900), () =>
      this.sync.syncInboundsFromPanels(),
    );
  }

  onModuleDestroy(): void {
    for (const name of this.registry.getIntervals()) this.registry.deleteInterval(name);
  }

  private schedule(name: string, seconds: number, cycle: () => Promise<unknown>): void {
    if (!seconds || seconds <= 0) {
      this.logger.log(`${name}: disabled`);
      return;
    }
    const handle = setInterval(() => void this.runExclusive(name, cycle), seconds * 1000);
    this.registry.addInterval(name, handle);
    this.logger.log(`${name}: every ${seconds}s`);
  }

  /** Пропускает тик, пока предыдущий проход той же задачи не закончился. */
  async runExclusive(name: string, cycle: () => Promise<unknown>): Promise<boolean> {
    if (this.running.has(name)) {
      this.logger.warn(`${name}: previous cycle still running, tick skipped`);
      return false;
    }
    this.running.add(name);
    try {
      await cycle();
      return true;
    } catch (e) {
      this.logger.error(`${name} failed: ${errorMessage(e)}`);
      return false;
    } finally {
      this.running.delete(name);
    }
  }
}
