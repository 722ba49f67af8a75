import { Module } from '@nestjs/common';
import { XuiModule } from '../xui/xui.module';
import { InboundSyncService } from './inbound-sync.service';

@Module({
  imports: [XuiModule],
  providers: [InboundSyncService],
  exports: [InboundSyncService],
})
export class InboundsModule {}
