import { ConfigGenerationError } from '../../common/errors/panel.errors';
import type { JsonObject } from '../../common/json';
import { clientIdentifier } from '../xui/client-identifier';
import { LinkInbound, generateConfigLink } from './config-link.generator';

const panel = { id: 1, baseUrl: 'https://panel.example.test:2053' };

function inbound(protocol: string, streamSettings: JsonObject, clients: JsonObject[] = []): LinkInbound {
  return { remoteInboundId: 7, protocol, port: 443, settings: { clients }, streamSettings };
}

const vlessId = clientIdentifier('vless', 'uuid-1');

describe('generateConfigLink', () => {
  describe('vless', () => {
    it('carries ws path and host and the tls sni', () => {
      const ws = inbound(
        'vless',
        {
          network: 'ws',
          security: 'tls',
          wsSettings: { path: '/ray', headers: { Host: 'cdn.test' } },
          tlsSettings: { serverName: 'vpn.test', alpn: ['h2', 'http/1.1'], settings: { fingerprint: 'chrome' } },
        },
        [{ id: 'uuid-1', email: 'a@test', flow: '' }],
      );

      const link = generateConfigLink(panel, ws, vlessId, 'DE main');

      expect(link).toBe(
        'vless://uuid-1@panel.example.test:443?type=ws&security=tls&path=%2Fray&host=cdn.test' +
          '&sni=vpn.test&fp=chrome&alpn=h2%2Chttp%2F1.1#DE%20main',
      );
      const query = new URLSearchParams((link ?? '').split('?')[1].split('#')[0]);
      expect(query.get('path')).toBe('/ray');
      expect(query.get('host')).toBe('cdn.test');
      expect(query.get('sni')).toBe('vpn.test');
    });

    it('builds reality links with the client flow', () => {
      const reality = inbound(
        'vless',
        {
          network: 'tcp',
          security: 'reality',
          realitySettings: {
            serverNames: ['www.example.test'],
            shortIds: ['ab12'],
            settings: { publicKey: 'pub-key', fingerprint: 'firefox', spiderX: '/' },
          },
        },
        [{ id: 'uuid-1', email: 'a@test', flow: 'xtls-rprx-vision' }],
      );

      expect(generateConfigLink(panel, reality, vlessId, 'r')).toBe(
        'vless://uuid-1@panel.example.test:443?type=tcp&security=reality&sni=www.example.test&fp=firefox' +
          '&pbk=pub-key&sid=ab12&spx=%2F&flow=xtls-rprx-vision#r',
      );
    });

    it('adds grpc service name and mode', () => {
      const grpc = inbound('vless', { network: 'grpc', grpcSettings: { serviceName: 'svc', multiMode: true } });

      expect(generateConfigLink(panel, grpc, vlessId, 'g')).toBe(
        'vless://uuid-1@panel.example.test:443?type=grpc&security=none&serviceName=svc&mode=multi#g',
      );
    });

    it('adds the http header obfuscation for tcp', () => {
      const http = inbound('vless', {
        network: 'tcp',
        tcpSettings: { header: { type: 'http', request: { path: ['/index'], headers: { Host: ['example.test'] } } } },
      });

      expect(generateConfigLink(panel, http, vlessId, 'h')).toBe(
        'vless://uuid-1@panel.example.test:443?type=tcp&security=none&headerType=http&path=%2Findex&host=example.test#h',
      );
    });

    it('keeps unknown network and security values without their specific params', () => {
      const kcp = inbound('vless', {
        network: 'kcp',
        security: 'xtls',
        kcpSettings: { seed: 'seed-1', header: { type: 'wechat-video' } },
        xtlsSettings: { serverName: 'x.test' },
      });

      expect(generateConfigLink(panel, kcp, vlessId, 'k')).toBe(
        'vless://uuid-1@panel.example.test:443?type=kcp&security=xtls#k',
      );
    });

    it('prefers the external proxy endpoint and brackets ipv6 hosts', () => {
      const proxied = inbound('vless', { network: 'tcp', externalProxy: [{ dest: '2001:db8::2', port: 8443 }] });

      expect(generateConfigLink(panel, proxied, vlessId, 'p')).toBe(
        'vless://uuid-1@[2001:db8::2]:8443?type=tcp&security=none#p',
      );
    });
  });

  describe('vmess', () => {
    it('encodes the standard json blob without empty fields', () => {
      const vmessId = clientIdentifier('vmess', 'uuid-2');
      const ws = inbound('vmess', { network: 'ws', security: 'none', wsSettings: { path: 'vm', host: 'h.test' } }, [
        { id: 'uuid-2', alterId: 0, email: 'b@test' },
      ]);

      const link = generateConfigLink(panel, ws, vmessId, 'vm') ?? '';
      expect(link.startsWith('vmess://')).toBe(true);
      const decoded: unknown = JSON.parse(Buffer.from(link.slice('vmess://'.length), 'base64').toString('utf8'));

      expect(decoded).toEqual({
        v: '2',
        ps: 'vm',
        add: 'panel.example.test',
        port: '443',
        id: 'uuid-2',
        aid: '0',
        scy: 'auto',
        net: 'ws',
        type: 'none',
        host: 'h.test',
        path: '/vm',
      });
    });
  });

  it('returns null for protocols without a link format', () => {
    const trojan = inbound('trojan', { network: 'tcp' });
    expect(generateConfigLink(panel, trojan, clientIdentifier('trojan', 'secret-pass'), 't')).toBeNull();
  });

  describe('errors', () => {
    it('rejects reality settings without a public key', () => {
      const reality = inbound('vless', { network: 'tcp', security: 'reality', realitySettings: { shortIds: ['ab'] } });
      expect(() => generateConfigLink(panel, reality, vlessId, 'r')).toThrow(ConfigGenerationError);
    });

    it('rejects an http header without request settings', () => {
      const http = inbound('vless', { network: 'tcp', tcpSettings: { header: { type: 'http' } } });
      expect(() => generateConfigLink(panel, http, vlessId, 'h')).toThrow(ConfigGenerationError);
    });

    it('rejects an identifier of another protocol', () => {
      const vless = inbound('vless', { network: 'tcp' });
      expect(() => generateConfigLink(panel, vless, clientIdentifier('vmess', 'uuid-1'), 'x')).toThrow(
        ConfigGenerationError,
      );
    });

    it('rejects a panel without a valid base url', () => {
      const vless = inbound('vless', { network: 'tcp' });
      expect(() => generateConfigLink({ id: 2, baseUrl: 'not a url' }, vless, vlessId, 'x')).toThrow(
        ConfigGenerationError,
      );
    });
  });
});
