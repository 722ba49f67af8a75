import { Global, Module } from '@nestjs/common';
import { PanelInboundsRepository } from '../inbounds/panel-inbounds.repository';
import { LocationsRepository } from '../locations/locations.repository';
import { PanelsRepository } from '../panels/panels.repository';
import { ClientAccountsRepository } from '../provisioning/client-accounts.repository';
import { SettingsRepository } from '../selection/settings.repository';
import { DatabaseService } from './database.service';

const REPOSITORIES = [
  LocationsRepository,
  PanelsRepository,
  PanelInboundsRepository,
  ClientAccountsRepository,
  SettingsRepository,
];

/** Подключение к SQLite и репозитории таблиц, глобально для всех модулей. */
@Global()
@Module({
  providers: [DatabaseService, ...REPOSITORIES],
  exports: [DatabaseService, ...REPOSITORIES],
})
export class DatabaseModule {}
