import { Injectable, Logger } from '@nestjs/common';
import { CredentialVault } from '../../common/crypto/credential-vault';
import { NotFoundError, ServiceError } from '../../common/errors/panel.errors';
import { isUniqueViolation } from '../database/database.service';
import { LocationsRepository } from '../locations/locations.repository';
import { ClientAccountsRepository } from '../provisioning/client-accounts.repository';
import { SessionTokenCache } from '../xui/session-token.cache';
import { CreatePanelDto } from './dto/create-panel.dto';
import { UpdatePanelDto } from './dto/update-panel.dto';
import { Panel, PanelListItem, PanelPatch, PublicPanel, normalizeBaseUrl, toPublicPanel } from './panel.types';
import { PanelsRepository } from './panels.repository';

@Injectable()
export class PanelsService {
  private readonly logger = new Logger(PanelsService.name);

  constructor(
    private readonly panels: PanelsRepository,
    private readonly locations: LocationsRepository,
    private readonly clientAccounts: ClientAccountsRepository,
    private readonly vault: CredentialVault,
    private readonly sessions: SessionTokenCache,
  ) {}

  private require(id: number): Panel {
    const panel = this.panels.findById(id);
    if (!panel) throw new NotFoundError(`Panel ${id} not found`);
    return panel;
  }

  private requireLocation(locationId: number): void {
    if (!this.locations.findById(locationId)) throw new NotFoundError(`Location ${locationId} not found`);
  }

  private assertUrlFree(baseUrl: string, selfId?: number): void {
    const other = this.panels.findByBaseUrl(baseUrl);
    if (other && other.id !== selfId) throw new ServiceError(`Panel with URL ${baseUrl} already exists (${other.name})`);
  }

  createPanel(dto: CreatePanelDto): PublicPanel {
    this.requireLocation(dto.locationId);
    const baseUrl = normalizeBaseUrl(dto.baseUrl);
    this.assertUrlFree(baseUrl);

    let panel: Panel;
    try {
      panel = this.panels.create({
        name: dto.name.trim(),
        baseUrl,
        panelType: dto.panelType ?? 'XUI',
        locationId: dto.locationId,
        ...this.vault.sealCredentials({ username: dto.username, password: dto.password }),
        priority: dto.priority ?? 0,
        isPremium: dto.isPremium ?? false,
        isActive: dto.isActive ?? true,
      });
    } catch (e) {
      if (isUniqueViolation(e)) throw new ServiceError(`Panel with URL ${baseUrl} already exists`);
      throw e;
    }
    this.logger.log(`Panel created: ${panel.name} (${panel.id}) at ${panel.baseUrl}`);
    return toPublicPanel(panel);
  }

  /** Смена URL, кредов или активности сбрасывает закешированную сессию. */
  updatePanel(id: number, dto: UpdatePanelDto): PublicPanel {
    const current = this.require(id);
    const patch: PanelPatch = {
      name: dto.name?.trim(),
      priority: dto.priority,
      isPremium: dto.isPremium,
      isActive: dto.isActive,
    };

    if (dto.locationId !== undefined && dto.locationId !== current.locationId) {
      this.requireLocation(dto.locationId);
      patch.locationId = dto.locationId;
    }
    if (dto.baseUrl !== undefined) {
      const baseUrl = normalizeBaseUrl(dto.baseUrl);
      if (baseUrl !== current.baseUrl) {
        this.assertUrlFree(baseUrl, id);
        patch.baseUrl = baseUrl;
      }
    }
    if (dto.username !== undefined) patch.usernameEnc = this.vault.seal(dto.username);
    if (dto.password !== undefined) patch.passwordEnc = this.vault.seal(dto.password);

    const updated = this.panels.update(id, patch);
    if (!updated) throw new NotFoundError(`Panel ${id} not found`);

    const connectionChanged =
      patch.baseUrl !== undefined || patch.usernameEnc !== undefined || patch.passwordEnc !== undefined;
    if (connectionChanged || (current.isActive && !updated.isActive)) this.sessions.invalidate(id);

    this.logger.log(`Panel updated: ${updated.name} (${id})`);
    return toPublicPanel(updated);
  }

  /** Нельзя, пока на панели есть ACTIVE клиенты. Зеркальные инбаунды удаляются вместе с ней. */
  deletePanel(id: number): PublicPanel {
    const panel = this.require(id);
    const active = this.clientAccounts.countActive(id);
    if (active > 0) {
      throw new ServiceError(`Panel ${panel.name} still has ${active} active client(s)`);
    }
    this.panels.delete(id);
    this.sessions.invalidate(id);
    this.logger.log(`Panel deleted: ${panel.name} (${id})`);
    return toPublicPanel(panel);
  }

  listPanels(locationId?: number): PanelListItem[] {
    return this.panels.listWithStats(locationId).map((row) => ({
      ...toPublicPanel(row.panel),
      locationName: row.locationName,
      inboundsCount: row.inboundsCount,
      activeClientsCount: row.activeClientsCount,
    }));
  }

  getPanel(id: number): PublicPanel {
    return toPublicPanel(this.require(id));
  }
}
