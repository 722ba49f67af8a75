import { Module } from '@nestjs/common';
import { HealthModule } from '../health/health.module';
import { InboundsModule } from '../inbounds/inbounds.module';
import { SelectionModule } from '../selection/selection.module';
import { XuiModule } from '../xui/xui.module';
import { PanelsController } from './panels.controller';
import { PanelsService } from './panels.service';

@Module({
  imports: [XuiModule, InboundsModule, HealthModule, SelectionModule],
  controllers: [PanelsController],
  providers: [PanelsService],
  exports: [PanelsService],
})
export class PanelsModule {}
