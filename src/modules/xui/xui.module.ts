import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PANEL_HTTP, createPanelHttp } from './panel-http';
import { SessionTokenCache } from './session-token.cache';
import { XuiClientFactory } from './xui-client.factory';

@Module({
  providers: [
    SessionTokenCache,
    XuiClientFactory,
    { provide: PANEL_HTTP, useFactory: createPanelHttp, inject: [ConfigService] },
  ],
  exports: [XuiClientFactory, SessionTokenCache],
})
export class XuiModule {}
