export const PANEL_TYPES = ['XUI'] as const;

/** One remote-API dialect per value. */
export type PanelType = (typeof PANEL_TYPES)[number];

export interface Panel {
  id: number;
  name: string;
  baseUrl: string;
  panelType: PanelType;
  locationId: number;
  usernameEnc: string;
  passwordEnc: string;
  priority: number;
  isPremium: boolean;
  isActive: boolean;
  /** null — ещё не проверялась */
  isHealthy: boolean | null;
  lastChecked: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

/** То, что отдаётся наружу: без зашифрованных кредов. */
export type PublicPanel = Omit<Panel, 'usernameEnc' | 'passwordEnc'>;

export type PanelListItem = PublicPanel & {
  locationName: string;
  inboundsCount: number;
  activeClientsCount: number;
};

export type PanelPatch = Partial<
  Pick<Panel, 'name' | 'baseUrl' | 'locationId' | 'usernameEnc' | 'passwordEnc' | 'priority' | 'isPremium' | 'isActive'>
>;

export function toPublicPanel(panel: Panel): PublicPanel {
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  const { usernameEnc, passwordEnc, ...rest } = panel;
  return rest;
}

export function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.trim().replace(/\/+$/, '');
}
