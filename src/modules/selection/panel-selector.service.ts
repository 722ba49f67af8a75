import { Injectable, Logger } from '@nestjs/common';
import { NotFoundError } from '../../common/errors/panel.errors';
import { DatabaseService } from '../database/database.service';
import { LocationsRepository } from '../locations/locations.repository';
import type { Panel } from '../panels/panel.types';
import { PanelsRepository } from '../panels/panels.repository';
import { ClientAccountsRepository } from '../provisioning/client-accounts.repository';
import { RoundRobinCursor } from './round-robin-cursor';
import { SelectionStrategy, isSelectionStrategy } from './selection-strategy';
import { SettingsRepository } from './settings.repository';

export type SelectionOptions = {
  /** только панели с активным включённым инбаундом этого протокола */
  protocol?: string;
  premiumRequired?: boolean;
  excludeIds?: number[];
};

@Injectable()
export class PanelSelectorService {
  private readonly logger = new Logger(PanelSelectorService.name);

  constructor(
    private readonly database: DatabaseService,
    private readonly locations: LocationsRepository,
    private readonly panels: PanelsRepository,
    private readonly clientAccounts: ClientAccountsRepository,
    private readonly settings: SettingsRepository,
  ) {}

  /**
   * Выбирает панель в локации; `null`, если подходящих нет.
   * Локацию можно передать id или именем.
   */
  selectPanelForLocation(
    location: number | string,
    strategy: SelectionStrategy | string = SelectionStrategy.BALANCED,
    opts: SelectionOptions = {},
  ): Panel | null {
    const locationId = this.resolveLocation(location);

    let effective: SelectionStrategy;
    if (isSelectionStrategy(strategy)) {
      effective = strategy;
    } else {
      this.logger.warn(`Unknown selection strategy "${strategy}", falling back to PRIORITY`);
      effective = SelectionStrategy.PRIORITY;
    }

    return this.database.transaction(() => {
      const candidates = this.panels.findCandidates(locationId, opts);
      if (candidates.length === 0) {
        this.logger.warn(`No panel available at location ${locationId} (${JSON.stringify(opts)})`);
        return null;
      }

      const chosen = this.pick(effective, candidates, locationId);
      this.logger.log(`Selected panel ${chosen.name} (${chosen.id}) at location ${locationId} via ${effective}`);
      return chosen;
    });
  }

  private pick(strategy: SelectionStrategy, candidates: Panel[], locationId: number): Panel {
    switch (strategy) {
      case SelectionStrategy.ROUND_ROBIN:
        return new RoundRobinCursor(this.settings, locationId).advance(candidates);
      case SelectionStrategy.PRIORITY:
        return candidates[0];
      case SelectionStrategy.LEAST_LOAD:
      case SelectionStrategy.BALANCED:
        return this.leastLoaded(candidates);
    }
  }

  private resolveLocation(location: number | string): number {
    if (typeof location === 'number') return location;
    const found = this.locations.findByName(location);
    if (!found) throw new NotFoundError(`Location "${location}" not found`);
    return found.id;
  }

  /** Минимум ACTIVE клиентов; при равенстве — порядок кандидатов. */
  private leastLoaded(candidates: Panel[]): Panel {
    const counts = this.clientAccounts.countActiveByPanels(candidates.map((c) => c.id));
    let best = candidates[0];
    let bestLoad = counts.get(best.id) ?? 0;
    for (const candidate of candidates.slice(1)) {
      const load = counts.get(candidate.id) ?? 0;
      if (load < bestLoad) {
        best = candidate;
        bestLoad = load;
      }
    }
    return best;
  }
}
