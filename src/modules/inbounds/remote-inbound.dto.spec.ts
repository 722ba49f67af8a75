import { RemoteInboundError, remoteInboundIdOf, transformRemoteInbound } from './remote-inbound.dto';

describe('transformRemoteInbound', () => {
  const raw = {
    id: 5,
    protocol: 'VLESS',
    port: 443,
    enable: true,
    remark: 'main',
    tag: 'inbound-443',
    listen: '',
    total: 1610612736,
    expiryTime: 0,
    settings: '{"clients":[],"decryption":"none"}',
    streamSettings: '{"network":"ws","security":"tls"}',
    clientStats: [],
  };

  it('maps the panel representation to the local mirror', () => {
    expect(transformRemoteInbound(raw)).toEqual({
      remoteInboundId: 5,
      tag: 'inbound-443',
      remark: 'main',
      protocol: 'vless',
      port: 443,
      listenIp: null,
      panelEnabled: true,
      settings: { clients: [], decryption: 'none' },
      streamSettings: { network: 'ws', security: 'tls' },
      totalGb: 1.5,
      expiryTime: null,
    });
  });

  it('accepts settings that are already objects', () => {
    const mirror = transformRemoteInbound({ ...raw, settings: { clients: [] }, streamSettings: null });
    expect(mirror.settings).toEqual({ clients: [] });
    expect(mirror.streamSettings).toEqual({});
  });

  it('treats a missing enable flag as disabled', () => {
    const { enable: _enable, ...withoutEnable } = raw;
    expect(transformRemoteInbound(withoutEnable).panelEnabled).toBe(false);
  });

  it('keeps a non-zero expiry', () => {
    expect(transformRemoteInbound({ ...raw, expiryTime: 1700000000000 }).expiryTime).toBe(1700000000000);
  });

  it.each([
    ['a port out of range', { ...raw, port: 0 }],
    ['a string id', { ...raw, id: '5' }],
    ['an empty protocol', { ...raw, protocol: '' }],
    ['unparseable settings', { ...raw, settings: '{broken' }],
    ['array settings', { ...raw, streamSettings: '[]' }],
  ])('rejects %s', (_label, input) => {
    expect(() => transformRemoteInbound(input)).toThrow(RemoteInboundError);
  });

  it('rejects non-objects', () => {
    expect(() => transformRemoteInbound('inbound')).toThrow(RemoteInboundError);
  });
});

describe('remoteInboundIdOf', () => {
  it('reads the id even from an invalid inbound', () => {
    expect(remoteInboundIdOf({ id: 7, port: -1 })).toBe(7);
    expect(remoteInboundIdOf({ id: '8' })).toBe(8);
  });

  it('returns null without a usable id', () => {
    expect(remoteInboundIdOf({ id: 0 })).toBeNull();
    expect(remoteInboundIdOf({ id: 1.5 })).toBeNull();
    expect(remoteInboundIdOf(null)).toBeNull();
  });
});
