import { Module } from '@nestjs/common';
import { PanelSelectorService } from './panel-selector.service';

@Module({
  providers: [PanelSelectorService],
  exports: [PanelSelectorService],
})
export class SelectionModule {}
