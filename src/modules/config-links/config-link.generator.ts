import { Logger } from '@nestjs/common';
import { ConfigGenerationError } from '../../common/errors/panel.errors';
import { JsonObject, asArray, asNumber, asObject, asString } from '../../common/json';
import type { InboundListener } from '../inbounds/inbound.types';
import type { Panel } from '../panels/panel.types';
import type { ClientIdentifier } from '../xui/client-identifier';

const logger = new Logger('ConfigLinkGenerator');

export type LinkPanel = Pick<Panel, 'id' | 'baseUrl'>;
export type LinkInbound = Pick<InboundListener, 'remoteInboundId' | 'protocol' | 'port' | 'settings' | 'streamSettings'>;

type Endpoint = { host: string; port: number };

/** Типизированный взгляд на streamSettings: только то, из чего строится ссылка. */
type StreamView = {
  network: string;
  security: string;
  section(name: string): JsonObject;
};

function streamView(stream: JsonObject): StreamView {
  return {
    network: asString(stream.network) || 'tcp',
    security: asString(stream.security) || 'none',
    section: (name) => asObject(stream[name]) ?? {},
  };
}

function first(value: unknown): string {
  if (typeof value === 'string') return value;
  const head = asArray(value).find((v): v is string => typeof v === 'string');
  return head ?? '';
}

const withSlash = (path: string): string => (path.startsWith('/') ? path : `/${path}`);

function endpointOf(panel: LinkPanel, inbound: LinkInbound, stream: JsonObject): Endpoint {
  const proxy = asArray(stream.externalProxy).map(asObject).find((p) => p && asString(p.dest));
  if (proxy) {
    return { host: asString(proxy.dest) ?? '', port: asNumber(proxy.port) ?? inbound.port };
  }
  let host: string;
  try {
    host = new URL(panel.baseUrl).hostname;
  } catch {
    throw new ConfigGenerationError(`Panel ${panel.id} base URL is not a valid URL`);
  }
  return { host, port: inbound.port };
}

const formatHost = (host: string): string => (host.includes(':') && !host.startsWith('[') ? `[${host}]` : host);

function matchingClient(inbound: LinkInbound, identifier: ClientIdentifier): JsonObject | undefined {
  return asArray(inbound.settings.clients)
    .map(asObject)
    .find((c): c is JsonObject => !!c && c[identifier.keyField] === identifier.value);
}

/** `headerType=http` без блока request — ошибка: в ссылку нечего положить как path. */
function httpHeader(stream: StreamView, inbound: LinkInbound): { path: string; host: string } | null {
  const header = asObject(stream.section('tcpSettings').header);
  if (asString(header?.type) !== 'http') return null;
  const request = asObject(header?.request);
  if (!request) {
    throw new ConfigGenerationError(`Inbound ${inbound.remoteInboundId}: tcp http header has no request settings`);
  }
  const headers = asObject(request.headers) ?? {};
  return { path: withSlash(first(request.path) || '/'), host: first(headers.Host) };
}

function wsParams(stream: StreamView): { path: string; host: string } {
  const ws = stream.section('wsSettings');
  const headers = asObject(ws.headers) ?? {};
  return { path: withSlash(asString(ws.path) || '/'), host: asString(ws.host) || first(headers.Host) };
}

function grpcParams(stream: StreamView): { serviceName: string; mode: 'gun' | 'multi' } {
  const grpc = stream.section('grpcSettings');
  return { serviceName: asString(grpc.serviceName) ?? '', mode: grpc.multiMode === true ? 'multi' : 'gun' };
}

function tlsParams(stream: StreamView, fallbackSni: string): { sni: string; fp: string; alpn: string } {
  const tls = stream.section('tlsSettings');
  const inner = asObject(tls.settings) ?? {};
  return {
    sni: asString(tls.serverName) || asString(tls.sni) || fallbackSni,
    fp: asString(inner.fingerprint) || asString(tls.fingerprint) || '',
    alpn: asArray(tls.alpn)
      .filter((a): a is string => typeof a === 'string')
      .join(','),
  };
}

function realityParams(stream: StreamView, inbound: LinkInbound, fallbackSni: string) {
  const reality = stream.section('realitySettings');
  // в новых версиях панели ключи клиента лежат в realitySettings.settings
  const inner = asObject(reality.settings) ?? reality;
  const pbk = asString(inner.publicKey) || asString(reality.publicKey);
  if (!pbk) throw new ConfigGenerationError(`Inbound ${inbound.remoteInboundId}: reality settings have no publicKey`);
  return {
    sni: first(reality.serverNames) || asString(inner.serverName) || fallbackSni,
    fp: asString(inner.fingerprint) || 'chrome',
    pbk,
    sid: first(reality.shortIds),
    spx: asString(inner.spiderX) ?? '',
  };
}

function vlessLink(inbound: LinkInbound, identifier: ClientIdentifier, remark: string, endpoint: Endpoint, stream: StreamView): string {
  const params = new URLSearchParams();
  const set = (key: string, value: string): void => {
    if (value) params.set(key, value);
  };
  set('type', stream.network);
  set('security', stream.security);

  switch (stream.network) {
    case 'tcp': {
      const http = httpHeader(stream, inbound);
      if (http) {
        set('headerType', 'http');
        set('path', http.path);
        set('host', http.host);
      }
      break;
    }
    case 'ws': {
      const ws = wsParams(stream);
      set('path', ws.path);
      set('host', ws.host);
      break;
    }
    case 'grpc': {
      const grpc = grpcParams(stream);
      set('serviceName', grpc.serviceName);
      set('mode', grpc.mode);
      break;
    }
  }

  if (stream.security === 'tls') {
    const tls = tlsParams(stream, endpoint.host);
    set('sni', tls.sni);
    set('fp', tls.fp);
    set('alpn', tls.alpn);
  } else if (stream.security === 'reality') {
    const reality = realityParams(stream, inbound, endpoint.host);
    set('sni', reality.sni);
    set('fp', reality.fp);
    set('pbk', reality.pbk);
    set('sid', reality.sid);
    set('spx', reality.spx);
  }

  if (stream.security === 'tls' || stream.security === 'reality') {
    set('flow', asString(matchingClient(inbound, identifier)?.flow) ?? '');
  }

  const query = params.toString();
  return (
    `vless://${identifier.value}@${formatHost(endpoint.host)}:${endpoint.port}` +
    `${query ? `?${query}` : ''}#${encodeURIComponent(remark)}`
  );
}

function vmessLink(inbound: LinkInbound, identifier: ClientIdentifier, remark: string, endpoint: Endpoint, stream: StreamView): string {
  const client = matchingClient(inbound, identifier);
  const vmess: Record<string, string> = {
    v: '2',
    ps: remark,
    add: endpoint.host,
    port: String(endpoint.port),
    id: identifier.value,
    aid: String(asNumber(client?.alterId) ?? 0),
    scy: asString(client?.security) || 'auto',
    net: stream.network,
    type: 'none',
    host: '',
    path: '',
    tls: '',
    sni: '',
    alpn: '',
    fp: '',
  };

  switch (stream.network) {
    case 'tcp': {
      const http = httpHeader(stream, inbound);
      if (http) {
        vmess.type = 'http';
        vmess.path = http.path;
        vmess.host = http.host;
      }
      break;
    }
    case 'ws': {
      const ws = wsParams(stream);
      vmess.path = ws.path;
      vmess.host = ws.host;
      break;
    }
    case 'grpc': {
      const grpc = grpcParams(stream);
      vmess.path = grpc.serviceName;
      vmess.type = grpc.mode;
      break;
    }
  }

  if (stream.security === 'tls') {
    const tls = tlsParams(stream, endpoint.host);
    vmess.tls = 'tls';
    vmess.sni = tls.sni;
    vmess.fp = tls.fp;
    vmess.alpn = tls.alpn;
  }

  const compact = Object.fromEntries(Object.entries(vmess).filter(([, v]) => v !== ''));
  return `vmess://${Buffer.from(JSON.stringify(compact), 'utf8').toString('base64')}`;
}

/**
 * URI подключения для клиента инбаунда. `null` для протоколов без формата ссылки.
 * Битые настройки инбаунда → ConfigGenerationError.
 */
export function generateConfigLink(
  panel: LinkPanel,
  inbound: LinkInbound,
  identifier: ClientIdentifier,
  remark: string,
): string | null {
  const protocol = inbound.protocol.toLowerCase();
  if (protocol !== 'vless' && protocol !== 'vmess') {
    logger.warn(`Panel ${panel.id} inbound ${inbound.remoteInboundId}: no link format for protocol "${protocol}"`);
    return null;
  }
  if (identifier.protocol !== protocol) {
    throw new ConfigGenerationError(
      `Identifier protocol ${identifier.protocol} does not match inbound ${inbound.remoteInboundId} (${protocol})`,
    );
  }

  const endpoint = endpointOf(panel, inbound, inbound.streamSettings);
  const stream = streamView(inbound.streamSettings);
  return protocol === 'vless'
    ? vlessLink(inbound, identifier, remark, endpoint, stream)
    : vmessLink(inbound, identifier, remark, endpoint, stream);
}
