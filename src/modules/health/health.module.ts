import { Module } from '@nestjs/common';
import { XuiModule } from '../xui/xui.module';
import { PanelHealthService } from './panel-health.service';

@Module({
  imports: [XuiModule],
  providers: [PanelHealthService],
  exports: [PanelHealthService],
})
export class HealthModule {}
