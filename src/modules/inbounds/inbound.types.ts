import type { JsonObject } from '../../common/json';

export interface InboundListener {
  id: number;
  panelId: number;
  remoteInboundId: number;
  tag: string | null;
  remark: string | null;
  protocol: string;
  port: number;
  listenIp: string | null;
  /** `enable` на панели */
  panelEnabled: boolean;
  /** локально: false, когда инбаунд пропал с панели */
  isActive: boolean;
  settings: JsonObject;
  streamSettings: JsonObject;
  /** 0 = unlimited */
  totalGb: number;
  expiryTime: number | null;
  createdAt: Date;
  updatedAt: Date;
}

/** Поля, которые копируются с панели при каждой синхронизации. */
export type InboundMirror = Pick<
  InboundListener,
  | 'remoteInboundId'
  | 'tag'
  | 'remark'
  | 'protocol'
  | 'port'
  | 'listenIp'
  | 'panelEnabled'
  | 'settings'
  | 'streamSettings'
  | 'totalGb'
  | 'expiryTime'
>;

export const MIRRORED_FIELDS: ReadonlyArray<keyof InboundMirror> = [
  'tag',
  'remark',
  'protocol',
  'port',
  'listenIp',
  'panelEnabled',
  'settings',
  'streamSettings',
  'totalGb',
  'expiryTime',
];
