import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CredentialVault } from '../../common/crypto/credential-vault';
import { ServiceError } from '../../common/errors/panel.errors';
import type { Panel } from '../panels/panel.types';
import { PANEL_HTTP, PanelHttp } from './panel-http';
import { SessionTokenCache } from './session-token.cache';
import { XuiPanelClient } from './xui-panel.client';

/** Клиент панели на каждую операцию. Креды расшифровываются здесь, на каждый вызов. */
@Injectable()
export class XuiClientFactory {
  constructor(
    private readonly config: ConfigService,
    private readonly vault: CredentialVault,
    private readonly sessions: SessionTokenCache,
    @Inject(PANEL_HTTP) private readonly http: PanelHttp,
  ) {}

  forPanel(panel: Panel): XuiPanelClient {
    if (panel.panelType !== 'XUI') throw new ServiceError(`Unsupported panel type ${panel.panelType}`);
    return new XuiPanelClient({
      panelId: panel.id,
      baseUrl: panel.baseUrl,
      credentials: this.vault.openCredentials(panel),
      http: this.http,
      sessions: this.sessions,
      timeoutMs: this.config.get<number>('PANEL_API_TIMEOUT_MS', 15_000),
      subscriptionBaseUrl: this.config.get<string>('PANEL_SUBSCRIPTION_BASE_URL'),
    });
  }

  invalidateSession(panelId: number): void {
    this.sessions.invalidate(panelId);
  }
}
