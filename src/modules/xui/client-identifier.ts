export const PANEL_PROTOCOLS = ['vless', 'vmess', 'trojan', 'shadowsocks'] as const;

export type PanelProtocol = (typeof PANEL_PROTOCOLS)[number];

/** Field of a 3x-ui client object the panel addresses it by. `id` holds the client UUID. */
export type ClientKeyField = 'id' | 'password' | 'email';

/**
 * Нативный идентификатор клиента на панели. Протокол едет вместе со значением,
 * чтобы каждый вызов выбрал правильное поле: uuid для vless/vmess, password для trojan,
 * email для shadowsocks.
 */
export type ClientIdentifier =
  | { protocol: 'vless' | 'vmess'; keyField: 'id'; value: string }
  | { protocol: 'trojan'; keyField: 'password'; value: string }
  | { protocol: 'shadowsocks'; keyField: 'email'; value: string };

export function isPanelProtocol(value: unknown): value is PanelProtocol {
  return PANEL_PROTOCOLS.some((p) => p === value);
}

export function keyFieldFor(protocol: PanelProtocol): ClientKeyField {
  switch (protocol) {
    case 'vless':
    case 'vmess':
      return 'id';
    case 'trojan':
      return 'password';
    case 'shadowsocks':
      return 'email';
  }
}

export function clientIdentifier(protocol: PanelProtocol, value: string): ClientIdentifier {
  if (!value) throw new TypeError(`Empty ${protocol} client identifier`);
  switch (protocol) {
    case 'vless':
    case 'vmess':
      return { protocol, keyField: 'id', value };
    case 'trojan':
      return { protocol, keyField: 'password', value };
    case 'shadowsocks':
      return { protocol, keyField: 'email', value };
  }
}

/** Для логов: пароль trojan маскируется. */
export function describeIdentifier(identifier: ClientIdentifier): string {
  const shown = identifier.keyField === 'password' ? `${identifier.value.slice(0, 2)}***` : identifier.value;
  return `${identifier.protocol}:${identifier.keyField}=${shown}`;
}
