import { Logger } from '@nestjs/common';
import { randomBytes, randomUUID } from 'crypto';
import type { PanelCredentials } from '../../common/crypto/credential-vault';
import {
  NotFoundError,
  PanelApiError,
  PanelAuthenticationError,
  PanelConnectionError,
  errorMessage,
} from '../../common/errors/panel.errors';
import { JsonObject, asArray, asNumber, asObject, asString, isJsonObject, parseJsonObject } from '../../common/json';
import {
  ClientIdentifier,
  PanelProtocol,
  clientIdentifier,
  describeIdentifier,
  keyFieldFor,
} from './client-identifier';
import { PanelHttp, PanelHttpResponse, headerValues } from './panel-http';
import { PanelSession, SessionTokenCache } from './session-token.cache';

const API = '/panel/api/inbounds';

export const BYTES_PER_GB = 1024 ** 3;

/** Что просит вызывающий; недостающие uuid / password / subId генерируются. */
export type ClientSpec = {
  email: string;
  uuid?: string;
  password?: string;
  flow?: string;
  /** shadowsocks cipher */
  method?: string;
  enable?: boolean;
  limitIp?: number;
  /** 0 = unlimited */
  totalGb?: number;
  /** мс с epoch, 0 = бессрочно */
  expiryTime?: number;
  subId?: string;
  tgId?: string | number;
  reset?: number;
};

export type ClientUpdate = Partial<Pick<ClientSpec, 'email' | 'enable' | 'limitIp' | 'totalGb' | 'expiryTime' | 'flow' | 'subId' | 'tgId' | 'reset'>>;

export type ClientTraffic = { up: number; down: number; total: number; expiryTime: number };

export type AddedClient = {
  identifier: ClientIdentifier;
  subscriptionUrl: string | null;
  client: JsonObject;
};

export type ClientDetails = {
  client: JsonObject;
  inboundId: number;
  protocol: PanelProtocol;
  traffic: ClientTraffic | null;
  subscriptionUrl: string | null;
};

export type XuiPanelClientOptions = {
  panelId: number;
  baseUrl: string;
  credentials: PanelCredentials;
  http: PanelHttp;
  sessions: SessionTokenCache;
  timeoutMs: number;
  subscriptionBaseUrl?: string;
};

type Envelope = { success: boolean; msg: string; obj: unknown };

function toEnvelope(data: unknown): Envelope | null {
  if (!isJsonObject(data) || typeof data.success !== 'boolean') return null;
  return { success: data.success, msg: asString(data.msg) ?? '', obj: data.obj };
}

/** 401/403, редирект на страницу логина или `success:false` про истёкшую сессию. */
function authSymptom(res: PanelHttpResponse): string | null {
  if (res.status === 401 || res.status === 403) return `HTTP ${res.status}`;
  if (res.status >= 300 && res.status < 400 && headerValues(res.headers, 'location').some((l) => l.includes('/login'))) {
    return 'redirect to login';
  }
  const body = toEnvelope(res.data);
  if (res.status === 200 && body && !body.success && body.msg.toLowerCase().includes('expire')) return body.msg;
  return null;
}

function isNotFound(e: unknown): boolean {
  if (!(e instanceof PanelApiError) || e instanceof PanelConnectionError) return false;
  return e.remoteStatus === 404 || /not found/i.test(e.message);
}

const gbToBytes = (gb: number): number => Math.round(gb * BYTES_PER_GB);

function toTraffic(stats: JsonObject): ClientTraffic {
  return {
    up: asNumber(stats.up) ?? 0,
    down: asNumber(stats.down) ?? 0,
    total: asNumber(stats.total) ?? 0,
    expiryTime: asNumber(stats.expiryTime) ?? 0,
  };
}

function buildClientPayload(spec: ClientSpec, protocol: PanelProtocol): JsonObject {
  const common: JsonObject = {
    email: spec.email,
    enable: spec.enable ?? true,
    limitIp: spec.limitIp ?? 0,
    totalGB: gbToBytes(spec.totalGb ?? 0),
    expiryTime: spec.expiryTime ?? 0,
    subId: spec.subId || randomBytes(8).toString('hex'),
    tgId: spec.tgId ?? '',
    reset: spec.reset ?? 0,
  };
  switch (protocol) {
    case 'vless':
      return { id: spec.uuid || randomUUID(), flow: spec.flow ?? '', ...common };
    case 'vmess':
      return { id: spec.uuid || randomUUID(), security: 'auto', ...common };
    case 'trojan':
      return { password: spec.password || randomBytes(12).toString('hex'), ...common };
    case 'shadowsocks': {
      const client: JsonObject = { password: spec.password || randomBytes(16).toString('base64'), ...common };
      if (spec.method) client.method = spec.method;
      return client;
    }
  }
}

function clientPatch(updates: ClientUpdate): JsonObject {
  const patch: JsonObject = {};
  if (updates.email !== undefined) patch.email = updates.email;
  if (updates.enable !== undefined) patch.enable = updates.enable;
  if (updates.limitIp !== undefined) patch.limitIp = updates.limitIp;
  if (updates.totalGb !== undefined) patch.totalGB = gbToBytes(updates.totalGb);
  if (updates.expiryTime !== undefined) patch.expiryTime = updates.expiryTime;
  if (updates.flow !== undefined) patch.flow = updates.flow;
  if (updates.subId !== undefined) patch.subId = updates.subId;
  if (updates.tgId !== undefined) patch.tgId = updates.tgId;
  if (updates.reset !== undefined) patch.reset = updates.reset;
  return patch;
}

/**
 * Авторизованный канал к одной панели 3x-ui.
 * Живёт одну операцию (создаёт XuiClientFactory), сессия переживает его в SessionTokenCache.
 */
export class XuiPanelClient {
  private readonly logger = new Logger(XuiPanelClient.name);

  constructor(private readonly opts: XuiPanelClientOptions) {}

  get panelId(): number {
    return this.opts.panelId;
  }

  private get tag(): string {
    return `[panel ${this.opts.panelId}]`;
  }

  /** Всегда свежий логин; новая сессия заменяет закешированную. */
  async login(): Promise<PanelSession> {
    const { username, password } = this.opts.credentials;
    const res = await this.send('POST', '/login', { username, password }, {});
    const body = toEnvelope(res.data);
    if (!body || res.status !== 200 || !body.success) {
      const reason = body?.msg || `HTTP ${res.status}`;
      this.logger.warn(`${this.tag} login failed: ${reason}`);
      throw new PanelAuthenticationError(`Login to panel ${this.opts.panelId} failed: ${reason}`, res.status);
    }

    const session: PanelSession = {};
    const cookie = headerValues(res.headers, 'set-cookie')
      .map((c) => c.split(';')[0].trim())
      .filter(Boolean)
      .join('; ');
    if (cookie) session.cookie = cookie;
    const token = asString(asObject(body.obj)?.token);
    if (token) session.token = token;

    this.opts.sessions.set(this.opts.panelId, session);
    this.logger.log(`${this.tag} logged in`);
    return session;
  }

  private async send(method: 'GET' | 'POST', path: string, data: unknown, session: PanelSession): Promise<PanelHttpResponse> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (session.cookie) headers.Cookie = session.cookie;
    if (session.token) headers.Authorization = `Bearer ${session.token}`;
    try {
      return await this.opts.http.request({
        method,
        url: `${this.opts.baseUrl}${path}`,
        headers,
        data,
        timeout: this.opts.timeoutMs,
      });
    } catch (e) {
      this.logger.error(`${this.tag} ${method} ${path}: ${errorMessage(e)}`);
      throw new PanelConnectionError(`Panel ${this.opts.panelId} unreachable (${method} ${path}): ${errorMessage(e)}`);
    }
  }

  private unwrap(method: string, path: string, res: PanelHttpResponse): Envelope {
    const body = toEnvelope(res.data);
    if (res.status < 200 || res.status >= 300) {
      const detail = body?.msg ? `: ${body.msg}` : '';
      throw new PanelApiError(`${method} ${path} failed with HTTP ${res.status}${detail}`, res.status);
    }
    if (!body) throw new PanelApiError(`${method} ${path}: unexpected response from panel`, res.status);
    if (!body.success) throw new PanelApiError(body.msg || `${method} ${path} rejected by panel`, res.status);
    return body;
  }

  /**
   * Две попытки: протухшая сессия на первой → invalidate, повторный логин, ровно один повтор.
   * Тот же симптом на второй — PanelAuthenticationError. Сетевые ошибки не повторяются.
   */
  private async request(method: 'GET' | 'POST', path: string, data?: unknown): Promise<Envelope> {
    const panelId = this.opts.panelId;
    const cached = this.opts.sessions.get(panelId);
    const session = cached ?? (await this.login());

    const first = await this.send(method, path, data, session);
    const firstSymptom = authSymptom(first);
    if (!firstSymptom) return this.unwrap(method, path, first);

    this.logger.warn(`${this.tag} session rejected on ${method} ${path} (${firstSymptom}), logging in again`);
    this.opts.sessions.invalidate(panelId);
    const fresh = await this.login();

    const second = await this.send(method, path, data, fresh);
    const secondSymptom = authSymptom(second);
    if (secondSymptom) {
      this.opts.sessions.invalidate(panelId);
      throw new PanelAuthenticationError(
        `Panel ${panelId} rejected a fresh session on ${method} ${path}: ${secondSymptom}`,
        second.status,
      );
    }
    return this.unwrap(method, path, second);
  }

  private subscriptionUrl(subId: unknown): string | null {
    if (typeof subId !== 'string' || !subId) return null;
    const base = (this.opts.subscriptionBaseUrl || this.opts.baseUrl).replace(/\/+$/, '');
    return `${base}/sub/${encodeURIComponent(subId)}`;
  }

  async getInbounds(): Promise<unknown[]> {
    const body = await this.request('GET', `${API}/list`);
    if (!Array.isArray(body.obj)) throw new PanelApiError(`Panel ${this.opts.panelId}: inbound list is not an array`);
    const inbounds: unknown[] = body.obj;
    this.logger.debug(`${this.tag} fetched ${inbounds.length} inbounds`);
    return inbounds;
  }

  async getInbound(inboundId: number): Promise<JsonObject | null> {
    try {
      const body = await this.request('GET', `${API}/get/${inboundId}`);
      return asObject(body.obj) ?? null;
    } catch (e) {
      if (!isNotFound(e)) throw e;
      this.logger.warn(`${this.tag} inbound ${inboundId} not found`);
      return null;
    }
  }

  private async findClient(
    inboundId: number,
    identifier: ClientIdentifier,
  ): Promise<{ inbound: JsonObject; client: JsonObject } | null> {
    const inbound = await this.getInbound(inboundId);
    if (!inbound) return null;
    let settings: JsonObject;
    try {
      settings = parseJsonObject(inbound.settings, 'settings');
    } catch (e) {
      throw new PanelApiError(`Inbound ${inboundId} on panel ${this.opts.panelId} has unreadable settings: ${errorMessage(e)}`);
    }
    const client = asArray(settings.clients)
      .filter(isJsonObject)
      .find((c) => c[identifier.keyField] === identifier.value);
    return client ? { inbound, client } : null;
  }

  async addClient(inboundId: number, spec: ClientSpec, protocol: PanelProtocol): Promise<AddedClient> {
    if (!spec.email) throw new TypeError('Client email is required');
    const client = buildClientPayload(spec, protocol);
    const identifier = clientIdentifier(protocol, String(client[keyFieldFor(protocol)]));

    await this.request('POST', `${API}/addClient`, {
      id: inboundId,
      settings: JSON.stringify({ clients: [client] }),
    });
    this.logger.log(`${this.tag} added ${describeIdentifier(identifier)} (${spec.email}) to inbound ${inboundId}`);
    return { identifier, subscriptionUrl: this.subscriptionUrl(client.subId), client };
  }

  async updateClient(identifier: ClientIdentifier, inboundId: number, updates: ClientUpdate): Promise<boolean> {
    const found = await this.findClient(inboundId, identifier);
    if (!found) {
      throw new NotFoundError(
        `Client ${describeIdentifier(identifier)} not found in inbound ${inboundId} on panel ${this.opts.panelId}`,
      );
    }
    const merged: JsonObject = { ...found.client, ...clientPatch(updates) };
    await this.request('POST', `${API}/updateClient/${encodeURIComponent(identifier.value)}`, {
      id: inboundId,
      settings: JSON.stringify({ clients: [merged] }),
    });
    this.logger.log(`${this.tag} updated ${describeIdentifier(identifier)} in inbound ${inboundId}`);
    return true;
  }

  /** false, если панель не знает клиента. */
  async deleteClient(inboundId: number, identifier: ClientIdentifier): Promise<boolean> {
    const key = encodeURIComponent(identifier.value);
    const path =
      identifier.keyField === 'email'
        ? `${API}/${inboundId}/delClientByEmail/${key}`
        : `${API}/${inboundId}/delClient/${key}`;
    try {
      await this.request('POST', path);
    } catch (e) {
      if (!isNotFound(e)) throw e;
      this.logger.warn(`${this.tag} delete: ${describeIdentifier(identifier)} not found in inbound ${inboundId}`);
      return false;
    }
    this.logger.log(`${this.tag} deleted ${describeIdentifier(identifier)} from inbound ${inboundId}`);
    return true;
  }

  /** Ищем email клиента по всем inbound'ам (для trojan, у которого нет `id`). */
  private async findEmailInInbounds(identifier: ClientIdentifier): Promise<string | null> {
    for (const raw of await this.getInbounds()) {
      const inbound = asObject(raw);
      if (!inbound) continue;
      let settings: JsonObject;
      try {
        settings = parseJsonObject(inbound.settings, 'settings');
      } catch (e) {
        this.logger.debug(`${this.tag} skip inbound ${String(inbound.id)}: ${errorMessage(e)}`);
        continue;
      }
      const client = asArray(settings.clients)
        .filter(isJsonObject)
        .find((c) => c[identifier.keyField] === identifier.value);
      const email = client ? asString(client.email) : undefined;
      if (email) return email;
    }
    return null;
  }

  /**
   * getClientTrafficsById ищет только по `$.id` (vless/vmess uuid);
   * trojan-пароль сначала резолвится в email.
   */
  async getClientTraffics(identifier: ClientIdentifier): Promise<ClientTraffic | null> {
    let path: string;
    if (identifier.keyField === 'id') {
      path = `${API}/getClientTrafficsById/${encodeURIComponent(identifier.value)}`;
    } else {
      const email =
        identifier.keyField === 'email' ? identifier.value : await this.findEmailInInbounds(identifier);
      if (!email) {
        this.logger.warn(`${this.tag} traffic: ${describeIdentifier(identifier)} not found`);
        return null;
      }
      path = `${API}/getClientTraffics/${encodeURIComponent(email)}`;
    }
    let body: Envelope;
    try {
      body = await this.request('GET', path);
    } catch (e) {
      if (!isNotFound(e)) throw e;
      this.logger.warn(`${this.tag} traffic: ${describeIdentifier(identifier)} not found`);
      return null;
    }
    // ById отдаёт массив, по email — объект
    const obj: unknown = Array.isArray(body.obj) ? body.obj[0] : body.obj;
    const stats = asObject(obj);
    return stats ? toTraffic(stats) : null;
  }

  /** Эндпоинт принимает email; uuid/password сначала резолвятся через инбаунд. */
  async resetClientTraffic(identifier: ClientIdentifier, inboundId: number): Promise<boolean> {
    let email = identifier.value;
    if (identifier.keyField !== 'email') {
      const found = await this.findClient(inboundId, identifier);
      const resolved = found ? asString(found.client.email) : undefined;
      if (!resolved) {
        this.logger.warn(`${this.tag} reset: ${describeIdentifier(identifier)} not found in inbound ${inboundId}`);
        return false;
      }
      email = resolved;
    }
    try {
      await this.request('POST', `${API}/${inboundId}/resetClientTraffic/${encodeURIComponent(email)}`);
    } catch (e) {
      if (!isNotFound(e)) throw e;
      this.logger.warn(`${this.tag} reset: ${email} not found in inbound ${inboundId}`);
      return false;
    }
    return true;
  }

  async getClientDetails(identifier: ClientIdentifier, inboundId: number): Promise<ClientDetails | null> {
    const found = await this.findClient(inboundId, identifier);
    if (!found) return null;
    const email = asString(found.client.email);
    const stats =
      email === undefined
        ? undefined
        : asArray(found.inbound.clientStats)
            .filter(isJsonObject)
            .find((s) => s.email === email);
    return {
      client: found.client,
      inboundId,
      protocol: identifier.protocol,
      traffic: stats ? toTraffic(stats) : null,
      subscriptionUrl: this.subscriptionUrl(found.client.subId),
    };
  }
}
