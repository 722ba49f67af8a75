import { clientIdentifier, describeIdentifier, isPanelProtocol, keyFieldFor } from './client-identifier';

describe('client identifiers', () => {
  it('keys each protocol by its native field', () => {
    expect(keyFieldFor('vless')).toBe('id');
    expect(keyFieldFor('vmess')).toBe('id');
    expect(keyFieldFor('trojan')).toBe('password');
    expect(keyFieldFor('shadowsocks')).toBe('email');
  });

  it('builds tagged identifiers', () => {
    expect(clientIdentifier('trojan', 'pw')).toEqual({ protocol: 'trojan', keyField: 'password', value: 'pw' });
    expect(() => clientIdentifier('vless', '')).toThrow(TypeError);
  });

  it('masks trojan passwords in descriptions', () => {
    expect(describeIdentifier(clientIdentifier('trojan', 'secret-pass'))).toBe('trojan:password=se***');
    expect(describeIdentifier(clientIdentifier('vless', 'uuid-1'))).toBe('vless:id=uuid-1');
  });

  it('recognizes supported protocols only', () => {
    expect(isPanelProtocol('shadowsocks')).toBe(true);
    expect(isPanelProtocol('wireguard')).toBe(false);
    expect(isPanelProtocol(undefined)).toBe(false);
  });
});
