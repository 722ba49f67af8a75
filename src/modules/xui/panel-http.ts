import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import * as http from 'http';
import * as https from 'https';

export const PANEL_HTTP = Symbol('PANEL_HTTP');

export type PanelHttpRequest = {
  method: 'GET' | 'POST';
  url: string;
  headers: Record<string, string>;
  data?: unknown;
  timeout: number;
};

export type PanelHttpResponse = {
  status: number;
  headers: Record<string, unknown>;
  data: unknown;
};

/** Raw transport to a panel. Every status comes back as a response; only transport failures reject. */
export interface PanelHttp {
  request(req: PanelHttpRequest): Promise<PanelHttpResponse>;
}

export function createPanelHttp(config: ConfigService): PanelHttp {
  const verifySsl = config.get<boolean>('PANEL_VERIFY_SSL', false);
  const instance = axios.create({
    httpAgent: new http.Agent({ keepAlive: true }),
    httpsAgent: new https.Agent({ keepAlive: true, rejectUnauthorized: verifySsl }),
    // редиректы на /login — симптом протухшей сессии, их разбирает клиент
    maxRedirects: 0,
    validateStatus: () => true,
  });

  return {
    async request(req) {
      const res = await instance.request<unknown>({
        method: req.method,
        url: req.url,
        headers: req.headers,
        data: req.data,
        timeout: req.timeout,
      });
      return { status: res.status, headers: res.headers, data: res.data };
    },
  };
}

export function headerValues(headers: Record<string, unknown>, name: string): string[] {
  const raw = headers[name] ?? headers[name.toLowerCase()];
  if (typeof raw === 'string') return [raw];
  if (Array.isArray(raw)) return raw.filter((v): v is string => typeof v === 'string');
  return [];
}
