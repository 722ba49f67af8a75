import { Module } from '@nestjs/common';
import { XuiModule } from '../xui/xui.module';
import { ClientProvisionerService } from './client-provisioner.service';

@Module({
  imports: [XuiModule],
  providers: [ClientProvisionerService],
  exports: [ClientProvisionerService],
})
export class ProvisioningModule {}
