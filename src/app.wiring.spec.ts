import { ConfigModule } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { CryptoModule } from './common/crypto/crypto.module';
import { DatabaseModule } from './modules/database/database.module';
import { HealthModule } from './modules/health/health.module';
import { PanelHealthService } from './modules/health/panel-health.service';
import { InboundSyncService } from './modules/inbounds/inbound-sync.service';
import { InboundsModule } from './modules/inbounds/inbounds.module';
import { LocationsModule } from './modules/locations/locations.module';
import { LocationsService } from './modules/locations/locations.service';
import { PanelsModule } from './modules/panels/panels.module';
import { PanelsService } from './modules/panels/panels.service';
import { ClientProvisionerService } from './modules/provisioning/client-provisioner.service';
import { ProvisioningModule } from './modules/provisioning/provisioning.module';
import { PanelSelectorService } from './modules/selection/panel-selector.service';
import { SelectionModule } from './modules/selection/selection.module';
import { SelectionStrategy } from './modules/selection/selection-strategy';
import { PANEL_HTTP } from './modules/xui/panel-http';
import { FakePanelNetwork, FakeXuiPanel } from './testing/fake-xui-panel';
import { TEST_ENV } from './testing/test-harness';

describe('engine wiring', () => {
  let moduleRef: TestingModule;
  let fake: FakeXuiPanel;

  beforeEach(async () => {
    const network = new FakePanelNetwork();
    fake = network.add(new FakeXuiPanel('https://fra.test:2053'));
    fake.addInbound({
      id: 1,
      protocol: 'vless',
      port: 443,
      enable: true,
      remark: 'vless-ws',
      streamSettings: {
        network: 'ws',
        security: 'tls',
        wsSettings: { path: '/ray', headers: { Host: 'cdn.test' } },
        tlsSettings: { serverName: 'vpn.test' },
      },
    });

    moduleRef = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({ isGlobal: true, ignoreEnvFile: true, load: [() => TEST_ENV] }),
        DatabaseModule,
        CryptoModule,
        InboundsModule,
        HealthModule,
        SelectionModule,
        ProvisioningModule,
        LocationsModule,
        PanelsModule,
      ],
    })
      .overrideProvider(PANEL_HTTP)
      .useValue(network)
      .compile();
  });

  afterEach(() => moduleRef.close());

  it('takes a panel from registration to a client config link', async () => {
    const location = moduleRef.get(LocationsService).createLocation({ name: 'DE' });
    const panel = moduleRef.get(PanelsService).createPanel({
      name: 'Frankfurt 1',
      baseUrl: 'https://fra.test:2053',
      locationId: location.id,
      username: 'admin',
      password: 'test-secret',
    });

    await expect(moduleRef.get(PanelHealthService).checkPanelHealth(panel.id)).resolves.toEqual({
      healthy: true,
      error: null,
    });
    const [summary] = await moduleRef.get(InboundSyncService).syncInboundsFromPanels();
    expect(summary).toMatchObject({ panelId: panel.id, ok: true, fetched: 1, processed: 1 });

    const selected = moduleRef
      .get(PanelSelectorService)
      .selectPanelForLocation('DE', SelectionStrategy.LEAST_LOAD, { protocol: 'vless' });
    expect(selected?.id).toBe(panel.id);

    const provisioner = moduleRef.get(ClientProvisionerService);
    const { nativeIdentifier, account } = await provisioner.provisionClient({
      panelId: panel.id,
      inboundId: 1,
      protocol: 'vless',
      client: { email: 'alice@test', uuid: 'uuid-alice' },
    });
    expect(account.inboundId).not.toBeNull();

    expect(provisioner.generateConfigLink(panel.id, 1, nativeIdentifier, 'DE')).toBe(
      'vless://uuid-alice@fra.test:443?type=ws&security=tls&path=%2Fray&host=cdn.test&sni=vpn.test#DE',
    );
    expect(moduleRef.get(PanelsService).listPanels()[0]).toMatchObject({
      isHealthy: true,
      inboundsCount: 1,
      activeClientsCount: 1,
    });
    // сессия из health check переиспользуется sync и provisioning
    expect(fake.loginCount).toBe(1);
  });
});
