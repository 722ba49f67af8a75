import { Injectable, Logger } from '@nestjs/common';
import { NotFoundError, ServiceError } from '../../common/errors/panel.errors';
import { generateConfigLink } from '../config-links/config-link.generator';
import { PanelInboundsRepository } from '../inbounds/panel-inbounds.repository';
import type { Panel } from '../panels/panel.types';
import { PanelsRepository } from '../panels/panels.repository';
import { ClientIdentifier, PanelProtocol, describeIdentifier } from '../xui/client-identifier';
import { XuiClientFactory } from '../xui/xui-client.factory';
import type { ClientDetails, ClientSpec, ClientTraffic, ClientUpdate, XuiPanelClient } from '../xui/xui-panel.client';
import type { ClientAccount } from './client-account.types';
import { ClientAccountsRepository } from './client-accounts.repository';

export type ProvisionRequest = {
  panelId: number;
  /** id инбаунда на панели */
  inboundId: number;
  protocol: PanelProtocol;
  client: ClientSpec;
  externalRef?: string;
};

export type ProvisionedClient = {
  account: ClientAccount;
  nativeIdentifier: ClientIdentifier;
  subscriptionUrl: string | null;
};

/**
 * Клиенты на панелях. Протокол всегда приходит вместе с идентификатором (ClientIdentifier),
 * по форме строки он не угадывается.
 */
@Injectable()
export class ClientProvisionerService {
  private readonly logger = new Logger(ClientProvisionerService.name);

  constructor(
    private readonly panels: PanelsRepository,
    private readonly inbounds: PanelInboundsRepository,
    private readonly accounts: ClientAccountsRepository,
    private readonly clients: XuiClientFactory,
  ) {}

  private activePanel(panelId: number): Panel {
    const panel = this.panels.findById(panelId);
    if (!panel) throw new NotFoundError(`Panel ${panelId} not found`);
    if (!panel.isActive) throw new ServiceError(`Panel ${panel.name} (${panelId}) is inactive`);
    return panel;
  }

  private remote(panelId: number): XuiPanelClient {
    return this.clients.forPanel(this.activePanel(panelId));
  }

  /** Только на панели, локально ничего не пишется. */
  async addClientToPanel(
    panelId: number,
    inboundId: number,
    spec: ClientSpec,
    protocol: PanelProtocol,
  ): Promise<{ nativeIdentifier: ClientIdentifier; subscriptionUrl: string | null }> {
    const added = await this.remote(panelId).addClient(inboundId, spec, protocol);
    return { nativeIdentifier: added.identifier, subscriptionUrl: added.subscriptionUrl };
  }

  /** Сначала клиент на панели, потом ClientAccount. Ошибка панели не оставляет локальной строки. */
  async provisionClient(req: ProvisionRequest): Promise<ProvisionedClient> {
    const panel = this.activePanel(req.panelId);
    const local = this.inbounds.findByRemoteId(panel.id, req.inboundId);
    if (local && local.protocol !== req.protocol) {
      throw new ServiceError(`Inbound ${req.inboundId} on panel ${panel.id} serves ${local.protocol}, not ${req.protocol}`);
    }

    const added = await this.clients.forPanel(panel).addClient(req.inboundId, req.client, req.protocol);
    const account = this.accounts.insert({
      panelId: panel.id,
      inboundId: local?.id ?? null,
      remoteInboundId: req.inboundId,
      protocol: req.protocol,
      identifier: added.identifier.value,
      email: req.client.email,
      subscriptionUrl: added.subscriptionUrl,
      externalRef: req.externalRef ?? null,
    });
    this.logger.log(`Provisioned ${describeIdentifier(added.identifier)} on panel ${panel.id} as account ${account.id}`);
    return { account, nativeIdentifier: added.identifier, subscriptionUrl: added.subscriptionUrl };
  }

  async updateClientOnPanel(
    panelId: number,
    identifier: ClientIdentifier,
    inboundId: number,
    updates: ClientUpdate,
    resetTraffic = false,
  ): Promise<boolean> {
    const remote = this.remote(panelId);
    const updated = await remote.updateClient(identifier, inboundId, updates);

    if (updates.email !== undefined) {
      const newIdentifier = identifier.keyField === 'email' ? updates.email : identifier.value;
      this.accounts.setEmail(panelId, identifier.value, updates.email, newIdentifier);
    }
    if (updates.enable !== undefined) {
      const key = identifier.keyField === 'email' && updates.email !== undefined ? updates.email : identifier.value;
      this.accounts.setStatus(panelId, key, updates.enable ? 'ACTIVE' : 'DISABLED');
    }

    if (resetTraffic) {
      const target =
        identifier.keyField === 'email' && updates.email !== undefined
          ? { ...identifier, value: updates.email }
          : identifier;
      const reset = await remote.resetClientTraffic(target, inboundId);
      if (!reset) this.logger.warn(`Traffic reset for ${describeIdentifier(target)} on panel ${panelId} did not apply`);
    }
    return updated;
  }

  /** Локальный аккаунт помечается DELETED, даже если панель клиента уже не знала. */
  async deleteClientFromPanel(panelId: number, inboundId: number, identifier: ClientIdentifier): Promise<boolean> {
    const deleted = await this.remote(panelId).deleteClient(inboundId, identifier);
    this.accounts.setStatus(panelId, identifier.value, 'DELETED');
    return deleted;
  }

  async getClientUsageFromPanel(panelId: number, identifier: ClientIdentifier): Promise<ClientTraffic | null> {
    return this.remote(panelId).getClientTraffics(identifier);
  }

  async resetClientTrafficOnPanel(panelId: number, identifier: ClientIdentifier, inboundId: number): Promise<boolean> {
    return this.remote(panelId).resetClientTraffic(identifier, inboundId);
  }

  async getClientConfigFromPanel(
    panelId: number,
    identifier: ClientIdentifier,
    inboundId: number,
  ): Promise<ClientDetails> {
    const details = await this.remote(panelId).getClientDetails(identifier, inboundId);
    if (!details) {
      throw new NotFoundError(`Client ${describeIdentifier(identifier)} not found in inbound ${inboundId} on panel ${panelId}`);
    }
    return details;
  }

  /** Ссылка из локальной копии инбаунда, без запроса к панели. */
  generateConfigLink(panelId: number, inboundId: number, identifier: ClientIdentifier, remark: string): string | null {
    const panel = this.panels.findById(panelId);
    if (!panel) throw new NotFoundError(`Panel ${panelId} not found`);
    const inbound = this.inbounds.findByRemoteId(panelId, inboundId);
    if (!inbound) throw new NotFoundError(`Inbound ${inboundId} of panel ${panelId} is not synced`);
    return generateConfigLink(panel, inbound, identifier, remark);
  }
}
