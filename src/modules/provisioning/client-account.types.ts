import type { PanelProtocol } from '../xui/client-identifier';

export type ClientAccountStatus = 'ACTIVE' | 'DISABLED' | 'DELETED';

/** Локальная запись о клиенте, созданном на панели. */
export interface ClientAccount {
  id: number;
  panelId: number;
  inboundId: number | null;
  remoteInboundId: number;
  protocol: PanelProtocol;
  identifier: string;
  email: string;
  subscriptionUrl: string | null;
  status: ClientAccountStatus;
  externalRef: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export type NewClientAccount = Pick<
  ClientAccount,
  'panelId' | 'inboundId' | 'remoteInboundId' | 'protocol' | 'identifier' | 'email' | 'subscriptionUrl' | 'externalRef'
>;
