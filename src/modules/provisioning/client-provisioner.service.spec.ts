import { NotFoundError, PanelApiError, PanelConnectionError, ServiceError } from '../../common/errors/panel.errors';
import { FakeXuiPanel } from '../../testing/fake-xui-panel';
import { TestHarness, createHarness, fakePanel, seedPanel } from '../../testing/test-harness';
import type { InboundMirror } from '../inbounds/inbound.types';
import type { Panel } from '../panels/panel.types';
import { PanelProtocol, clientIdentifier } from '../xui/client-identifier';
import { ClientProvisionerService } from './client-provisioner.service';

const INBOUND_BY_PROTOCOL: Record<PanelProtocol, number> = { vless: 1, vmess: 2, trojan: 3, shadowsocks: 4 };

function mirror(remoteInboundId: number, protocol: string): InboundMirror {
  return {
    remoteInboundId,
    tag: null,
    remark: null,
    protocol,
    port: 443,
    listenIp: null,
    panelEnabled: true,
    settings: { clients: [] },
    streamSettings: { network: 'tcp', security: 'none' },
    totalGb: 0,
    expiryTime: null,
  };
}

describe('ClientProvisionerService', () => {
  let h: TestHarness;
  let fake: FakeXuiPanel;
  let panel: Panel;
  let service: ClientProvisionerService;

  beforeEach(() => {
    h = createHarness();
    const location = h.locations.create({ name: 'DE' });
    fake = fakePanel(h, 'panel-a.test')
      .addInbound({ id: 1, protocol: 'vless', port: 443, enable: true })
      .addInbound({ id: 2, protocol: 'vmess', port: 8443, enable: true })
      .addInbound({ id: 3, protocol: 'trojan', port: 9443, enable: true })
      .addInbound({ id: 4, protocol: 'shadowsocks', port: 8388, enable: true, settings: { method: 'aes-256-gcm' } });
    panel = seedPanel(h, location, fake, { isHealthy: true });
    service = new ClientProvisionerService(h.panels, h.inbounds, h.accounts, h.clients);
  });

  afterEach(() => h.close());

  it.each(['vless', 'vmess', 'trojan', 'shadowsocks'] as const)(
    'provisions a %s client whose usage is readable right away',
    async (protocol) => {
      const provisioned = await service.provisionClient({
        panelId: panel.id,
        inboundId: INBOUND_BY_PROTOCOL[protocol],
        protocol,
        client: { email: `${protocol}@test` },
        externalRef: 'order-1',
      });

      expect(provisioned.nativeIdentifier.protocol).toBe(protocol);
      expect(provisioned.account).toMatchObject({
        panelId: panel.id,
        remoteInboundId: INBOUND_BY_PROTOCOL[protocol],
        identifier: provisioned.nativeIdentifier.value,
        email: `${protocol}@test`,
        status: 'ACTIVE',
        externalRef: 'order-1',
        inboundId: null,
      });
      await expect(service.getClientUsageFromPanel(panel.id, provisioned.nativeIdentifier)).resolves.toEqual({
        up: 0,
        down: 0,
        total: 0,
        expiryTime: 0,
      });
    },
  );

  it('keys shadowsocks clients by email', async () => {
    const provisioned = await service.provisionClient({
      panelId: panel.id,
      inboundId: 4,
      protocol: 'shadowsocks',
      client: { email: 'ss@test' },
    });

    expect(provisioned.nativeIdentifier).toEqual({ protocol: 'shadowsocks', keyField: 'email', value: 'ss@test' });
  });

  it('links the account to the mirrored inbound', async () => {
    h.inbounds.insert(panel.id, mirror(1, 'vless'));
    const local = h.inbounds.findByRemoteId(panel.id, 1);

    const provisioned = await service.provisionClient({
      panelId: panel.id,
      inboundId: 1,
      protocol: 'vless',
      client: { email: 'alice@test' },
    });

    expect(provisioned.account.inboundId).toBe(local?.id);
  });

  describe('failures leave no local state', () => {
    it('on an unreachable panel', async () => {
      fake.unreachable = true;

      await expect(
        service.provisionClient({ panelId: panel.id, inboundId: 1, protocol: 'vless', client: { email: 'a@test' } }),
      ).rejects.toBeInstanceOf(PanelConnectionError);
      expect(h.accounts.listByPanel(panel.id)).toEqual([]);
    });

    it('when the panel rejects the client', async () => {
      await service.provisionClient({ panelId: panel.id, inboundId: 1, protocol: 'vless', client: { email: 'a@test' } });

      await expect(
        service.provisionClient({ panelId: panel.id, inboundId: 2, protocol: 'vmess', client: { email: 'a@test' } }),
      ).rejects.toBeInstanceOf(PanelApiError);
      expect(h.accounts.listByPanel(panel.id)).toHaveLength(1);
    });

    it('when the protocol does not match the mirrored inbound', async () => {
      h.inbounds.insert(panel.id, mirror(1, 'vless'));

      await expect(
        service.provisionClient({ panelId: panel.id, inboundId: 1, protocol: 'trojan', client: { email: 'a@test' } }),
      ).rejects.toBeInstanceOf(ServiceError);
      expect(fake.calls).toEqual([]);
    });
  });

  it('refuses inactive and unknown panels', async () => {
    await expect(service.addClientToPanel(999, 1, { email: 'a@test' }, 'vless')).rejects.toBeInstanceOf(NotFoundError);

    h.panels.update(panel.id, { isActive: false });
    await expect(service.addClientToPanel(panel.id, 1, { email: 'a@test' }, 'vless')).rejects.toBeInstanceOf(
      ServiceError,
    );
  });

  it('adds remotely without a local account', async () => {
    const added = await service.addClientToPanel(panel.id, 1, { email: 'a@test', uuid: 'uuid-a', subId: 'sub-a' }, 'vless');

    expect(added).toEqual({
      nativeIdentifier: { protocol: 'vless', keyField: 'id', value: 'uuid-a' },
      subscriptionUrl: 'http://panel-a.test:2053/sub/sub-a',
    });
    expect(h.accounts.listByPanel(panel.id)).toEqual([]);
  });

  describe('updates', () => {
    it('disables the client on the panel and locally', async () => {
      const { nativeIdentifier } = await service.provisionClient({
        panelId: panel.id,
        inboundId: 1,
        protocol: 'vless',
        client: { email: 'a@test' },
      });

      await expect(service.updateClientOnPanel(panel.id, nativeIdentifier, 1, { enable: false })).resolves.toBe(true);

      expect(fake.clients(1)[0].enable).toBe(false);
      expect(h.accounts.findByIdentifier(panel.id, nativeIdentifier.value)?.status).toBe('DISABLED');
    });

    it('renames a shadowsocks client and resets its traffic under the new email', async () => {
      const { nativeIdentifier } = await service.provisionClient({
        panelId: panel.id,
        inboundId: 4,
        protocol: 'shadowsocks',
        client: { email: 'ss@test' },
      });
      fake.setTraffic('ss@test', 100, 200);

      await service.updateClientOnPanel(panel.id, nativeIdentifier, 4, { email: 'ss2@test' }, true);

      expect(fake.calls).toContain('POST /panel/api/inbounds/4/resetClientTraffic/ss2%40test');
      const renamed = clientIdentifier('shadowsocks', 'ss2@test');
      await expect(service.getClientUsageFromPanel(panel.id, renamed)).resolves.toMatchObject({ up: 0, down: 0 });
      expect(h.accounts.findByIdentifier(panel.id, 'ss2@test')?.email).toBe('ss2@test');
      expect(h.accounts.findByIdentifier(panel.id, 'ss@test')).toBeNull();
    });

    it('fails for a client the inbound does not have', async () => {
      await expect(
        service.updateClientOnPanel(panel.id, clientIdentifier('vless', 'ghost'), 1, { enable: false }),
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  it('marks the account deleted whether or not the panel still had the client', async () => {
    const { nativeIdentifier } = await service.provisionClient({
      panelId: panel.id,
      inboundId: 3,
      protocol: 'trojan',
      client: { email: 't@test' },
    });

    await expect(service.deleteClientFromPanel(panel.id, 3, nativeIdentifier)).resolves.toBe(true);
    await expect(service.deleteClientFromPanel(panel.id, 3, nativeIdentifier)).resolves.toBe(false);

    expect(fake.clients(3)).toEqual([]);
    expect(h.accounts.findByIdentifier(panel.id, nativeIdentifier.value)?.status).toBe('DELETED');
  });

  it('resets traffic and reports unknown clients as not reset', async () => {
    const { nativeIdentifier } = await service.provisionClient({
      panelId: panel.id,
      inboundId: 2,
      protocol: 'vmess',
      client: { email: 'v@test' },
    });
    fake.setTraffic('v@test', 5, 6);

    await expect(service.resetClientTrafficOnPanel(panel.id, nativeIdentifier, 2)).resolves.toBe(true);
    await expect(service.getClientUsageFromPanel(panel.id, nativeIdentifier)).resolves.toMatchObject({ up: 0, down: 0 });
    await expect(service.resetClientTrafficOnPanel(panel.id, clientIdentifier('vmess', 'ghost'), 2)).resolves.toBe(false);
  });

  it('returns the client config or NotFoundError', async () => {
    const { nativeIdentifier } = await service.provisionClient({
      panelId: panel.id,
      inboundId: 1,
      protocol: 'vless',
      client: { email: 'a@test', subId: 'sub-a' },
    });

    const details = await service.getClientConfigFromPanel(panel.id, nativeIdentifier, 1);
    expect(details).toMatchObject({ inboundId: 1, protocol: 'vless', subscriptionUrl: 'http://panel-a.test:2053/sub/sub-a' });
    await expect(
      service.getClientConfigFromPanel(panel.id, clientIdentifier('vless', 'ghost'), 1),
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it('generates links from the mirrored inbound', () => {
    h.inbounds.insert(panel.id, mirror(1, 'vless'));

    expect(service.generateConfigLink(panel.id, 1, clientIdentifier('vless', 'uuid-a'), 'DE')).toBe(
      'vless://uuid-a@panel-a.test:443?type=tcp&security=none#DE',
    );
    expect(() => service.generateConfigLink(panel.id, 2, clientIdentifier('vmess', 'uuid-a'), 'DE')).toThrow(
      NotFoundError,
    );
  });
});
