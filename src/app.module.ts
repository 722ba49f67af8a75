import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CryptoModule } from './common/crypto/crypto.module';
import { validateEnv } from './config/env.validation';
import { DatabaseModule } from './modules/database/database.module';
import { HealthModule } from './modules/health/health.module';
import { InboundsModule } from './modules/inbounds/inbounds.module';
import { LocationsModule } from './modules/locations/locations.module';
import { LogsModule } from './modules/logs/logs.module';
import { PanelsModule } from './modules/panels/panels.module';
import { ProvisioningModule } from './modules/provisioning/provisioning.module';
import { SchedulerModule } from './modules/scheduler/scheduler.module';
import { SelectionModule } from './modules/selection/selection.module';
import { XuiModule } from './modules/xui/xui.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
    DatabaseModule,
    CryptoModule,
    XuiModule,
    InboundsModule,
    SelectionModule,
    ProvisioningModule,
    HealthModule,
    LocationsModule,
    PanelsModule,
    SchedulerModule,
    LogsModule,
  ],
})
export class AppModule {}
